import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Clock } from '../utils/clock.js';

export interface FakeClock extends Clock {
  /** Every requested sleep, in order. */
  sleeps: number[];
}

/**
 * Clock whose sleeps return immediately and advance `now`.
 */
export function createFakeClock(startMs = 0): FakeClock {
  let now = startMs;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
      if (signal?.aborted) {
        throw signal.reason;
      }
      sleeps.push(ms);
      now += ms;
    },
  };
}

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'sightcheck-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
