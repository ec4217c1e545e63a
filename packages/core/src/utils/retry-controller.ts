/**
 * Retry Controller: bounded retries with exponential backoff and jitter
 * around model inference.
 *
 * Only transient failures are retried (timeouts, transport hiccups,
 * malformed runtime output). Uninterpretable answers and model-load errors
 * are surfaced on the first attempt.
 */

import { isRecoverable } from '../types/errors.js';
import { systemClock, type Clock } from './clock.js';

export interface RetryPolicy {
  /** Total attempts including the first. Default: 3 */
  maxAttempts: number;
  /** Delay before the second attempt. Default: 1000 */
  initialDelayMs: number;
  /** Growth factor per attempt. Default: 2 */
  multiplier: number;
  /** Cap for a single delay. Default: 8000 */
  maxDelayMs: number;
  /** Fraction of each delay that is randomised (0-1). Default: 0.2 */
  jitter: number;
  /** Cap for the sum of all delays. Default: 15000 */
  maxTotalWaitMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryDeps {
  clock?: Clock;
  /** Returns a number in [0, 1). */
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryStats {
  calls: number;
  attempts: number;
  retries: number;
  exhausted: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1_000,
  multiplier: 2,
  maxDelayMs: 8_000,
  jitter: 0.2,
  maxTotalWaitMs: 15_000,
  isRetryable: isRecoverable,
};

export class RetryController {
  readonly policy: RetryPolicy;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly onRetry?: (event: RetryEvent) => void;
  private stats: RetryStats = { calls: 0, attempts: 0, retries: 0, exhausted: 0 };

  constructor(policy: Partial<RetryPolicy> = {}, deps: Omit<RetryDeps, 'signal'> = {}) {
    this.policy = {
      maxAttempts: policy.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      initialDelayMs: policy.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
      multiplier: policy.multiplier ?? DEFAULT_RETRY_POLICY.multiplier,
      maxDelayMs: policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
      jitter: policy.jitter ?? DEFAULT_RETRY_POLICY.jitter,
      maxTotalWaitMs: policy.maxTotalWaitMs ?? DEFAULT_RETRY_POLICY.maxTotalWaitMs,
      isRetryable: policy.isRetryable ?? DEFAULT_RETRY_POLICY.isRetryable,
    };
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.onRetry = deps.onRetry;

    if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${this.policy.maxAttempts}`);
    }
  }

  /**
   * Delay before attempt `attempt + 1`, before clamping to the wait budget.
   */
  computeDelay(attempt: number): number {
    const { initialDelayMs, multiplier, maxDelayMs, jitter } = this.policy;
    const base = Math.min(maxDelayMs, initialDelayMs * Math.pow(multiplier, attempt - 1));
    const spread = Math.min(Math.max(jitter, 0), 1);
    return Math.round(base * (1 - spread + spread * this.random()));
  }

  /**
   * Call `fn` until it succeeds, a permanent error occurs, or attempts or
   * the wait budget run out. Rejects with the last observed error.
   */
  async call<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    this.stats.calls++;
    let waitedMs = 0;

    for (let attempt = 1; ; attempt++) {
      this.stats.attempts++;
      try {
        return await fn(attempt);
      } catch (error) {
        if (!this.policy.isRetryable(error)) {
          throw error;
        }

        const remainingMs = this.policy.maxTotalWaitMs - waitedMs;
        if (attempt >= this.policy.maxAttempts || remainingMs <= 0 || signal?.aborted) {
          this.stats.exhausted++;
          throw error;
        }

        const delayMs = Math.min(this.computeDelay(attempt), remainingMs);
        this.stats.retries++;
        this.onRetry?.({ attempt, delayMs, error });

        await this.clock.sleep(delayMs, signal);
        waitedMs += delayMs;
      }
    }
  }

  getStats(): RetryStats {
    return { ...this.stats };
  }
}

/**
 * One-shot helper around RetryController.
 */
export function callWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  deps: RetryDeps = {}
): Promise<T> {
  const { signal, ...controllerDeps } = deps;
  return new RetryController(policy, controllerDeps).call(fn, signal);
}

/**
 * Create a RetryController instance.
 */
export function createRetryController(policy?: Partial<RetryPolicy>, deps?: Omit<RetryDeps, 'signal'>): RetryController {
  return new RetryController(policy, deps);
}
