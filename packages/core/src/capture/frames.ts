import type { CaptureAdapter, CaptureRecord } from '../types/capture.js';
import { createError } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';

export interface CaptureFramesOptions {
  /** Wait between frames. */
  intervalMs: number;
  count: number;
  clock?: Clock;
  signal?: AbortSignal;
}

/**
 * Capture `count` frames of animated content, `intervalMs` apart.
 */
export async function captureFrames<TTarget>(
  adapter: CaptureAdapter<TTarget>,
  target: TTarget,
  options: CaptureFramesOptions
): Promise<CaptureRecord[]> {
  if (!Number.isInteger(options.count) || options.count < 1) {
    throw createError('ERROR_INVALID_QUERY', `Frame count must be a positive integer, got ${options.count}`);
  }
  const clock = options.clock ?? systemClock;

  const frames: CaptureRecord[] = [];
  for (let frame = 0; frame < options.count; frame++) {
    if (frame > 0 && options.intervalMs > 0) {
      await clock.sleep(options.intervalMs, options.signal);
    }
    frames.push(await adapter.capture(target));
  }
  return frames;
}
