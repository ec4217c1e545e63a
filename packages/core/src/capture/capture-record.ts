import type { CaptureRecord, ImageMimeType } from '../types/capture.js';
import { sha256Hex } from '../utils/hashing.js';
import { systemClock, type Clock } from '../utils/clock.js';

/**
 * Build a frozen CaptureRecord. Only the image bytes are hashed, so the
 * same pixels captured at different times share a content hash.
 */
export function createCaptureRecord(
  image: Uint8Array,
  source: string,
  mimeType: ImageMimeType = 'image/png',
  clock: Clock = systemClock
): CaptureRecord {
  return Object.freeze({
    image,
    contentHash: sha256Hex(image),
    capturedAtMs: clock.now(),
    source,
    mimeType,
  });
}

/**
 * Guess the image type from its magic bytes.
 */
export function detectMimeType(image: Uint8Array): ImageMimeType | undefined {
  if (image[0] === 0x89 && image[1] === 0x50 && image[2] === 0x4e && image[3] === 0x47) {
    return 'image/png';
  }
  if (image[0] === 0xff && image[1] === 0xd8 && image[2] === 0xff) {
    return 'image/jpeg';
  }
  return undefined;
}
