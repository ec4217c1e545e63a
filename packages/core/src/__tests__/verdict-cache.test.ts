/**
 * Tests for the in-memory and file-backed verdict caches.
 */

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createFileVerdictCache } from '../storage/file-verdict-cache.js';
import { createMemoryVerdictCache } from '../storage/verdict-cache.js';
import type { Verdict } from '../types/verdict.js';
import { createTempDir } from './helpers.js';

function createVerdict(cacheKey: string, value = false): Verdict {
  return {
    value,
    passed: !value,
    rawResponse: value ? 'Yes.' : 'No, the page looks fine.',
    captureHash: 'a'.repeat(64),
    prompt: 'Is there a visible error banner?',
    answer: { kind: 'yes-no', expected: false },
    modelTag: 'mock:0123456789abcdef',
    cacheKey,
    evaluatedAtMs: 1_700_000_000_000,
  };
}

describe('createMemoryVerdictCache', () => {
  it('should store, replace and delete verdicts', async () => {
    const cache = createMemoryVerdictCache();
    const first = createVerdict('k1');
    const replacement = createVerdict('k1', true);

    await cache.put('k1', first);
    await cache.put('k1', replacement);

    await expect(cache.get('k1')).resolves.toBe(replacement);
    await expect(cache.size()).resolves.toBe(1);
    await expect(cache.delete('k1')).resolves.toBe(true);
    await expect(cache.delete('k1')).resolves.toBe(false);
    await expect(cache.get('k1')).resolves.toBeUndefined();
  });

  it('should clear every entry', async () => {
    const cache = createMemoryVerdictCache();
    await cache.put('k1', createVerdict('k1'));
    await cache.put('k2', createVerdict('k2'));

    await cache.clear();

    await expect(cache.size()).resolves.toBe(0);
  });
});

describe('createFileVerdictCache', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let filePath: string;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    filePath = path.join(dir, 'cache', 'verdicts.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanup();
  });

  it('should start empty when the file does not exist', async () => {
    const cache = createFileVerdictCache(filePath);

    await expect(cache.size()).resolves.toBe(0);
    expect(cache.filePath).toBe(filePath);
  });

  it('should persist verdicts across instances', async () => {
    const verdict = createVerdict('k1');
    const cache = createFileVerdictCache(filePath);

    await cache.put('k1', verdict);
    await cache.flush();

    const document: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(document).toEqual({ version: 1, entries: { k1: verdict } });

    const reopened = createFileVerdictCache(filePath);
    await expect(reopened.get('k1')).resolves.toEqual(verdict);
  });

  it('should persist deletes and clears', async () => {
    const cache = createFileVerdictCache(filePath);
    await cache.put('k1', createVerdict('k1'));
    await cache.put('k2', createVerdict('k2'));

    await cache.delete('k1');
    await expect(createFileVerdictCache(filePath).size()).resolves.toBe(1);

    await cache.clear();
    await expect(createFileVerdictCache(filePath).size()).resolves.toBe(0);
  });

  it('should ignore an unreadable file and replace it on write', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(path.join(dir, 'broken.json'), '{ not json');
    const cache = createFileVerdictCache(path.join(dir, 'broken.json'));

    await expect(cache.size()).resolves.toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);

    await cache.put('k1', createVerdict('k1'));
    await expect(createFileVerdictCache(path.join(dir, 'broken.json')).size()).resolves.toBe(1);
  });

  it('should ignore a file with the wrong shape', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const other = path.join(dir, 'other.json');
    await writeFile(other, JSON.stringify({ version: 2, entries: {} }));

    await expect(createFileVerdictCache(other).size()).resolves.toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should drop entries stored under a different key', async () => {
    const mixed = path.join(dir, 'mixed.json');
    await writeFile(mixed, JSON.stringify({ version: 1, entries: { k1: createVerdict('k1'), k2: createVerdict('k3') } }));

    const cache = createFileVerdictCache(mixed);

    await expect(cache.size()).resolves.toBe(1);
    await expect(cache.get('k2')).resolves.toBeUndefined();
  });

  it('should keep working in memory when the file cannot be read or written', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const cache = createFileVerdictCache(path.join(blocker, 'verdicts.json'));
    const verdict = createVerdict('k1');

    await expect(cache.size()).resolves.toBe(0);
    await expect(cache.put('k1', verdict)).resolves.toBeUndefined();
    await cache.flush();

    await expect(cache.get('k1')).resolves.toBe(verdict);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\[VerdictCache\] Ignoring unreadable cache file /);
    expect(warn.mock.calls[1]?.[0]).toMatch(/^\[VerdictCache\] Could not write /);
  });
});
