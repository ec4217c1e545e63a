/**
 * Test-author API: capture a target, ask a question, get a verdict or a
 * typed failure.
 *
 * @example
 * ```ts
 * const visual = createVisualAssert({ evaluator, capture: new FileCaptureAdapter() });
 * await visual.expect('shots/login.png', 'Is there a visible error banner?', { kind: 'yes-no', expected: false });
 * ```
 */

import type { CaptureAdapter } from '../types/capture.js';
import { createError, errorMessage, isSightcheckError, type ErrorKind, type SightcheckErrorCode } from '../types/errors.js';
import type { AnswerSpec, Query } from '../types/query.js';
import type { Verdict } from '../types/verdict.js';
import type { AssertionEvaluator } from './assertion-evaluator.js';

export interface VisualAssertConfig<TTarget> {
  evaluator: AssertionEvaluator;
  capture: CaptureAdapter<TTarget>;
}

export interface CheckOptions {
  minConfidence?: number;
  signal?: AbortSignal;
}

export interface VisualAssert<TTarget> {
  /**
   * Evaluate the question and return the verdict, passed or not.
   */
  check(target: TTarget, prompt: string, answer?: AnswerSpec, options?: CheckOptions): Promise<Verdict>;

  /**
   * Like `check`, but throws ERROR_ASSERTION_FAILED when the verdict did not pass.
   */
  expect(target: TTarget, prompt: string, answer?: AnswerSpec, options?: CheckOptions): Promise<Verdict>;
}

export interface FailureDescription {
  kind: ErrorKind;
  code: SightcheckErrorCode;
  message: string;
}

const DEFAULT_ANSWER: AnswerSpec = { kind: 'yes-no' };

export function createVisualAssert<TTarget>(config: VisualAssertConfig<TTarget>): VisualAssert<TTarget> {
  const { evaluator, capture } = config;

  async function check(
    target: TTarget,
    prompt: string,
    answer: AnswerSpec = DEFAULT_ANSWER,
    options: CheckOptions = {}
  ): Promise<Verdict> {
    const query: Query = { prompt, answer, minConfidence: options.minConfidence };
    return evaluator.evaluateTarget(capture, target, query, { signal: options.signal });
  }

  return {
    check,

    async expect(target, prompt, answer, options): Promise<Verdict> {
      const verdict = await check(target, prompt, answer, options);
      if (!verdict.passed) {
        throw createError(
          'ERROR_ASSERTION_FAILED',
          `Visual assertion failed: "${prompt}" was answered ${JSON.stringify(verdict.value)} (model said: "${verdict.rawResponse.trim()}")`,
          { details: { verdict } }
        );
      }
      return verdict;
    },
  };
}

/**
 * Classify a failure for reports. Distinguishes a model that answered "no"
 * from one that crashed and from a page that never rendered.
 */
export function describeFailure(error: unknown): FailureDescription {
  if (isSightcheckError(error)) {
    return { kind: error.kind, code: error.code, message: error.message };
  }
  return { kind: 'unknown', code: 'ERROR_UNKNOWN', message: errorMessage(error) };
}
