/**
 * Assertion Evaluator: answers a Query about a CaptureRecord.
 *
 * Flow per evaluation:
 * 1. derive the cache key from the model tag, content hash, prompt and answer spec
 * 2. on a cache hit, return the stored verdict without inference
 * 3. on a miss, run inference through the retry controller
 * 4. interpret the raw answer; uninterpretable answers are never cached
 * 5. store the verdict
 * 6. check the query's minConfidence against the verdict, whichever path
 *    produced it, then return it
 */

import { interpret, validateAnswerSpec } from '../interpreters/index.js';
import type { ModelHandle, InferOptions } from '../models/model-session.js';
import { createMemoryVerdictCache, type VerdictCache } from '../storage/verdict-cache.js';
import type { CaptureAdapter, CaptureRecord } from '../types/capture.js';
import { createError, errorMessage, isUninterpretableResponseError } from '../types/errors.js';
import type { AnswerSpec, Interpretation, Query } from '../types/query.js';
import type { Verdict } from '../types/verdict.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { computeCacheKey } from '../utils/hashing.js';
import { RetryController, type RetryPolicy } from '../utils/retry-controller.js';

/**
 * The part of ModelSession the evaluator depends on.
 */
export interface InferenceSession {
  infer(handle: ModelHandle, image: Uint8Array, prompt: string, options?: InferOptions): Promise<string>;
}

export interface AssertionEvaluatorConfig {
  session: InferenceSession;
  handle: ModelHandle;
  /** Defaults to a fresh in-memory cache. */
  cache?: VerdictCache;
  /** A controller to share, or a policy for a new one. */
  retry?: RetryController | Partial<RetryPolicy>;
  /** Per-attempt inference deadline; the session default applies when unset. */
  inferenceTimeoutMs?: number;
  /**
   * Concurrent evaluations with the same cache key share one inference.
   * @default true
   */
  dedupeInFlight?: boolean;
  clock?: Clock;
  verbose?: boolean;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
}

interface SharedEvaluation {
  promise: Promise<Verdict>;
  controller: AbortController;
  /** Joined callers that can still abort. */
  waiters: number;
  /** A caller without a signal joined; the inference then always runs to the end. */
  pinned: boolean;
}

export interface EvaluatorStats {
  evaluations: number;
  cacheHits: number;
  cacheMisses: number;
  /** Inference attempts, retries included. */
  inferences: number;
  deduplicated: number;
  uninterpretable: number;
  failures: number;
}

export class AssertionEvaluator {
  readonly handle: ModelHandle;
  readonly cache: VerdictCache;
  private readonly session: InferenceSession;
  private readonly retry: RetryController;
  private readonly inferenceTimeoutMs?: number;
  private readonly dedupeInFlight: boolean;
  private readonly clock: Clock;
  private readonly verbose: boolean;
  private readonly inFlight = new Map<string, SharedEvaluation>();
  private stats: EvaluatorStats = {
    evaluations: 0,
    cacheHits: 0,
    cacheMisses: 0,
    inferences: 0,
    deduplicated: 0,
    uninterpretable: 0,
    failures: 0,
  };

  constructor(config: AssertionEvaluatorConfig) {
    this.session = config.session;
    this.handle = config.handle;
    this.cache = config.cache ?? createMemoryVerdictCache();
    this.inferenceTimeoutMs = config.inferenceTimeoutMs;
    this.dedupeInFlight = config.dedupeInFlight ?? true;
    this.clock = config.clock ?? systemClock;
    this.verbose = config.verbose ?? false;
    this.retry =
      config.retry instanceof RetryController
        ? config.retry
        : new RetryController(config.retry, {
            clock: this.clock,
            onRetry: ({ attempt, delayMs, error }) => {
              if (this.verbose) {
                console.log(`[Evaluator] Attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`);
              }
            },
          });
  }

  /**
   * Cache key the verdict for (`record`, `query`) is stored under.
   */
  cacheKeyFor(record: CaptureRecord, query: Query): string {
    return computeCacheKey({
      modelTag: this.handle.versionTag,
      contentHash: record.contentHash,
      prompt: query.prompt,
      answer: query.answer,
    });
  }

  /**
   * Evaluate `query` against `record`.
   * Throws typed errors for inference, timeout and interpretation failures;
   * a verdict that did not pass is returned, not thrown.
   */
  async evaluate(record: CaptureRecord, query: Query, options: EvaluateOptions = {}): Promise<Verdict> {
    this.stats.evaluations++;
    validateQuery(query);

    const key = this.cacheKeyFor(record, query);
    const cached = await this.cache.get(key);
    if (cached) {
      this.stats.cacheHits++;
      if (this.verbose) {
        console.log(`[Evaluator] Cache hit ${key.slice(0, 12)} for "${query.prompt}"`);
      }
      return checkConfidence(cached, query);
    }

    if (options.signal?.aborted) {
      throw createError('ERROR_ABORTED', 'Evaluation aborted before inference', { cause: options.signal.reason });
    }

    if (!this.dedupeInFlight) {
      return checkConfidence(await this.evaluateMiss(key, record, query, options.signal), query);
    }

    let shared = this.inFlight.get(key);
    if (shared) {
      this.stats.deduplicated++;
    } else {
      shared = this.startShared(key, record, query);
    }
    return checkConfidence(await joinShared(shared, options.signal), query);
  }

  /**
   * Capture `target` through `adapter`, then evaluate `query` against it.
   */
  async evaluateTarget<TTarget>(
    adapter: CaptureAdapter<TTarget>,
    target: TTarget,
    query: Query,
    options: EvaluateOptions = {}
  ): Promise<Verdict> {
    const record = await adapter.capture(target);
    return this.evaluate(record, query, options);
  }

  getStats(): EvaluatorStats {
    return { ...this.stats };
  }

  /**
   * Start one inference for `key` that concurrent callers can join. It has
   * its own abort controller, aborted only once every joined caller aborted.
   */
  private startShared(key: string, record: CaptureRecord, query: Query): SharedEvaluation {
    const controller = new AbortController();
    const shared: SharedEvaluation = {
      promise: this.evaluateMiss(key, record, query, controller.signal),
      controller,
      waiters: 0,
      pinned: false,
    };
    this.inFlight.set(key, shared);

    const remove = (): void => {
      if (this.inFlight.get(key) === shared) {
        this.inFlight.delete(key);
      }
    };
    controller.signal.addEventListener('abort', remove, { once: true });
    void shared.promise.then(remove, remove);
    return shared;
  }

  private async evaluateMiss(key: string, record: CaptureRecord, query: Query, signal?: AbortSignal): Promise<Verdict> {
    this.stats.cacheMisses++;
    const startTime = performance.now();

    let rawResponse: string;
    try {
      rawResponse = await this.retry.call(() => {
        this.stats.inferences++;
        return this.session.infer(this.handle, record.image, query.prompt, {
          timeoutMs: this.inferenceTimeoutMs,
          signal,
        });
      }, signal);
    } catch (err) {
      this.stats.failures++;
      throw err;
    }

    const interpretation = this.interpretResponse(query, rawResponse);

    const verdict: Verdict = Object.freeze({
      value: interpretation.value,
      passed: interpretation.passed,
      rawResponse,
      confidence: interpretation.confidence,
      captureHash: record.contentHash,
      prompt: query.prompt,
      answer: copyAnswer(query.answer),
      modelTag: this.handle.versionTag,
      cacheKey: key,
      evaluatedAtMs: this.clock.now(),
    });

    await this.cache.put(key, verdict);
    if (this.verbose) {
      console.log(
        `[Evaluator] "${query.prompt}" -> ${String(verdict.value)} (${verdict.passed ? 'pass' : 'fail'}) in ${Math.round(performance.now() - startTime)}ms`
      );
    }
    return verdict;
  }

  private interpretResponse(query: Query, rawResponse: string): Interpretation {
    try {
      return interpret(query.answer, rawResponse);
    } catch (err) {
      if (isUninterpretableResponseError(err)) {
        this.stats.uninterpretable++;
      }
      throw err;
    }
  }
}

/**
 * Wait for a shared evaluation, or reject with ERROR_ABORTED as soon as
 * `signal` aborts. The last waiter to abort cancels the inference.
 */
function joinShared(shared: SharedEvaluation, signal?: AbortSignal): Promise<Verdict> {
  if (!signal) {
    shared.pinned = true;
    return shared.promise;
  }
  const callerSignal = signal;
  shared.waiters++;

  return new Promise<Verdict>((resolve, reject) => {
    const onAbort = (): void => {
      shared.waiters--;
      if (shared.waiters === 0 && !shared.pinned) {
        shared.controller.abort(callerSignal.reason);
      }
      reject(createError('ERROR_ABORTED', 'Evaluation aborted by caller', { cause: callerSignal.reason }));
    };

    shared.promise.then(
      (verdict) => {
        callerSignal.removeEventListener('abort', onAbort);
        resolve(verdict);
      },
      (err: unknown) => {
        callerSignal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );

    if (callerSignal.aborted) {
      onAbort();
    } else {
      callerSignal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * minConfidence belongs to the query, not the cache key, so it is checked on
 * every verdict returned: fresh, shared or cached.
 */
function checkConfidence(verdict: Verdict, query: Query): Verdict {
  const { minConfidence } = query;
  const { confidence } = verdict;
  if (minConfidence !== undefined && confidence !== undefined && confidence < minConfidence) {
    throw createError('ERROR_LOW_CONFIDENCE', `Answer confidence ${confidence.toFixed(2)} is below the required ${minConfidence}`, {
      details: { rawResponse: verdict.rawResponse, confidence, minConfidence },
      userAction: 'Lower minConfidence or rephrase the prompt',
    });
  }
  return verdict;
}

function copyAnswer(answer: AnswerSpec): AnswerSpec {
  return Object.freeze(structuredClone(answer));
}

function validateQuery(query: Query): void {
  if (query.prompt.trim() === '') {
    throw createError('ERROR_INVALID_QUERY', 'Query prompt is empty', {
      devAction: 'Pass a natural-language question about the capture',
    });
  }
  validateAnswerSpec(query.answer);
  if (query.minConfidence !== undefined && !(query.minConfidence >= 0 && query.minConfidence <= 1)) {
    throw createError('ERROR_INVALID_QUERY', `minConfidence must be between 0 and 1, got ${query.minConfidence}`);
  }
}

/**
 * Create an AssertionEvaluator instance.
 */
export function createAssertionEvaluator(config: AssertionEvaluatorConfig): AssertionEvaluator {
  return new AssertionEvaluator(config);
}
