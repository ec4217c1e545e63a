/**
 * Capture adapter for images already on disk (saved screenshots, fixtures,
 * `sightcheck check`).
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { CaptureAdapter, CaptureRecord } from '../types/capture.js';
import { createError, errorMessage } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createCaptureRecord, detectMimeType } from './capture-record.js';

export interface FileCaptureOptions {
  clock?: Clock;
}

export class FileCaptureAdapter implements CaptureAdapter<string> {
  private readonly clock: Clock;

  constructor(options: FileCaptureOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async capture(filePath: string): Promise<CaptureRecord> {
    const source = path.resolve(filePath);

    let bytes: Buffer;
    try {
      bytes = await readFile(source);
    } catch (err) {
      throw createError('ERROR_CAPTURE_FAILED', `Cannot read image ${source}: ${errorMessage(err)}`, {
        cause: err,
        details: { source },
      });
    }

    const image = new Uint8Array(bytes);
    const mimeType = detectMimeType(image);
    if (!mimeType) {
      throw createError('ERROR_CAPTURE_FAILED', `Not a PNG or JPEG image: ${source}`, {
        details: { source },
        userAction: 'Provide a PNG or JPEG screenshot',
      });
    }

    return createCaptureRecord(image, source, mimeType, this.clock);
  }
}

export function createFileCaptureAdapter(options?: FileCaptureOptions): FileCaptureAdapter {
  return new FileCaptureAdapter(options);
}
