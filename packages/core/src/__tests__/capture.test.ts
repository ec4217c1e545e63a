/**
 * Tests for capture records, the file adapter and frame capture.
 */

import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createCaptureRecord, detectMimeType } from '../capture/capture-record.js';
import { FileCaptureAdapter } from '../capture/file-capture.js';
import { captureFrames } from '../capture/frames.js';
import { isCaptureError } from '../types/errors.js';
import { sha256Hex } from '../utils/hashing.js';
import { createFakeClock, createTempDir } from './helpers.js';

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);
const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 4, 5, 6]);

describe('createCaptureRecord', () => {
  it('should hash only the image bytes', () => {
    const a = createCaptureRecord(PNG, 'first', 'image/png', createFakeClock(1));
    const b = createCaptureRecord(PNG, 'second', 'image/png', createFakeClock(2));

    expect(a.contentHash).toBe(sha256Hex(PNG));
    expect(b.contentHash).toBe(a.contentHash);
    expect(a.capturedAtMs).toBe(1);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('should detect image types from magic bytes', () => {
    expect(detectMimeType(PNG)).toBe('image/png');
    expect(detectMimeType(JPEG)).toBe('image/jpeg');
    expect(detectMimeType(new Uint8Array([1, 2, 3]))).toBeUndefined();
  });
});

describe('FileCaptureAdapter', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should capture an image file', async () => {
    const file = path.join(dir, 'login.jpg');
    await writeFile(file, JPEG);

    const record = await new FileCaptureAdapter({ clock: createFakeClock(42) }).capture(file);

    expect(record).toMatchObject({
      source: file,
      mimeType: 'image/jpeg',
      contentHash: sha256Hex(JPEG),
      capturedAtMs: 42,
    });
  });

  it('should reject missing files and non-images', async () => {
    const notImage = path.join(dir, 'notes.txt');
    await writeFile(notImage, 'hello');
    const adapter = new FileCaptureAdapter();

    const missing: unknown = await adapter.capture(path.join(dir, 'missing.png')).catch((e: unknown) => e);
    const invalid: unknown = await adapter.capture(notImage).catch((e: unknown) => e);

    expect(isCaptureError(missing)).toBe(true);
    expect(invalid).toMatchObject({ code: 'ERROR_CAPTURE_FAILED', message: `Not a PNG or JPEG image: ${notImage}` });
  });
});

describe('captureFrames', () => {
  it('should wait between frames but not before the first', async () => {
    const clock = createFakeClock();
    const adapter = { capture: vi.fn(async (target: string) => createCaptureRecord(PNG, target, 'image/png', clock)) };

    const frames = await captureFrames(adapter, 'spinner', { intervalMs: 100, count: 3, clock });

    expect(frames.map((frame) => frame.capturedAtMs)).toEqual([0, 100, 200]);
    expect(clock.sleeps).toEqual([100, 100]);
    expect(adapter.capture).toHaveBeenCalledTimes(3);
  });

  it('should reject a non-positive frame count', async () => {
    const adapter = { capture: vi.fn(async (target: string) => createCaptureRecord(PNG, target)) };

    await expect(captureFrames(adapter, 'spinner', { intervalMs: 100, count: 0 })).rejects.toMatchObject({
      code: 'ERROR_INVALID_QUERY',
    });
    expect(adapter.capture).not.toHaveBeenCalled();
  });
});
