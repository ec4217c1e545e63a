/**
 * CLI tests: commands run in process against the mock runtime.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { describe, it, expect, beforeEach, afterEach, vi, type Mock, type MockInstance } from 'vitest';
import { createProgram } from '../program.js';

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);
const PROMPT = 'Is there a visible error banner?';

describe('sightcheck CLI', () => {
  let dir: string;
  let modelPath: string;
  let imagePath: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  let onExit: Mock<(code: number) => void>;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'sightcheck-cli-'));
    modelPath = path.join(dir, 'vision.bin');
    imagePath = path.join(dir, 'login.png');
    await writeFile(modelPath, 'weights');
    await writeFile(imagePath, PNG);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
    onExit = vi.fn<(code: number) => void>();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    await createProgram({ env: {}, onExit }).parseAsync(['node', 'sightcheck', ...args]);
  }

  function printed(spy: MockInstance<typeof console.log>): string[] {
    return spy.mock.calls.map((call) => call.map(String).join(' '));
  }

  function check(response: string, ...extra: string[]): Promise<void> {
    return run('check', imagePath, PROMPT, '--model', modelPath, '--runtime', 'mock', '--mock-response', response, ...extra);
  }

  describe('check', () => {
    it('should print a passing verdict and exit 0', async () => {
      await check('No, the page looks fine.', '--expect', 'no');

      expect(printed(log)).toEqual([`✓ ${PROMPT} = false`, '  model: No, the page looks fine.']);
      expect(onExit).toHaveBeenCalledWith(0);
    });

    it('should exit 1 when the verdict does not pass', async () => {
      await check('Yes, a red banner is shown.', '--expect', 'no');

      expect(printed(log)[0]).toBe(`✗ ${PROMPT} = true`);
      expect(onExit).toHaveBeenCalledWith(1);
    });

    it('should compare free text with --expect and --tolerance', async () => {
      await run(
        'check', imagePath, 'What does the submit button say?',
        '--model', modelPath, '--runtime', 'mock', '--mock-response', 'Sign in now',
        '--expect', 'Sign in', '--tolerance', '0.5'
      );

      expect(printed(log)[0]).toBe('✓ What does the submit button say? = true');
      expect(onExit).toHaveBeenCalledWith(0);
    });

    it('should print the verdict as JSON', async () => {
      await check('No', '--expect', 'no', '--json');

      const verdict: unknown = JSON.parse(printed(log)[0] ?? '');
      expect(verdict).toMatchObject({ value: false, passed: true, rawResponse: 'No', prompt: PROMPT });
    });

    it('should report uninterpretable answers', async () => {
      await check('uncertain, maybe?');

      expect(printed(error)[0]).toBe(
        'Error [uninterpretable] Cannot read a yes-no answer from "uncertain, maybe?": no yes/no word found'
      );
      expect(onExit).toHaveBeenCalledWith(1);
    });

    it('should reuse verdicts from the cache file', async () => {
      const cacheFile = path.join(dir, 'verdicts.json');

      await check('No', '--cache', cacheFile);
      await check('Yes', '--cache', cacheFile);

      expect(printed(log).filter((line) => line.startsWith('✗'))).toEqual([`✗ ${PROMPT} = false`, `✗ ${PROMPT} = false`]);
      const document: unknown = JSON.parse(await readFile(cacheFile, 'utf8'));
      expect(document).toMatchObject({ version: 1 });
    });

    it('should exit 2 without a model', async () => {
      await run('check', imagePath, PROMPT, '--runtime', 'mock');

      expect(printed(error)).toEqual(['Error [setup] No model path configured', '  Pass --model <path> or set SIGHTCHECK_MODEL_PATH']);
      expect(onExit).toHaveBeenCalledWith(2);
    });

    it('should exit 2 when the model file is missing', async () => {
      await run('check', imagePath, PROMPT, '--model', path.join(dir, 'missing.bin'), '--runtime', 'mock');

      expect(printed(error)[0]).toBe(`Error [model-load] Model file not found: ${path.join(dir, 'missing.bin')}`);
      expect(onExit).toHaveBeenCalledWith(2);
    });

    it('should exit 2 for an unknown runtime', async () => {
      await run('check', imagePath, PROMPT, '--model', modelPath, '--runtime', 'tensorflow');

      expect(printed(error)[0]).toBe('Error [setup] Unknown runtime "tensorflow"');
      expect(onExit).toHaveBeenCalledWith(2);
    });
  });

  describe('decompress', () => {
    it('should decompress once and then reuse the output', async () => {
      const archive = path.join(dir, 'vision.gguf.gz');
      await writeFile(archive, gzipSync(Buffer.from('model-weights')));
      const output = path.join(dir, 'vision.gguf');

      await run('decompress', archive);
      await run('decompress', archive);

      const lines = printed(log);
      expect(lines[0]).toMatch(new RegExp(`^Decompressed to ${output.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')} \\(13 bytes in \\d+ms\\)$`));
      expect(lines[1]).toBe(`Already decompressed: ${output}`);
      expect(onExit).toHaveBeenNthCalledWith(2, 0);
    });

    it('should exit 2 for a file that is not a .gz archive', async () => {
      await run('decompress', modelPath);

      expect(printed(error)[0]).toBe(`Error [model-load] Not a .gz model archive: ${modelPath}`);
      expect(onExit).toHaveBeenCalledWith(2);
    });
  });
});
