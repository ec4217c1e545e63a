import type { VerdictValue } from './common.js';
import type { AnswerSpec } from './query.js';

export interface Verdict {
  readonly value: VerdictValue;
  /** Whether `value` matches what the answer spec expects. */
  readonly passed: boolean;
  readonly rawResponse: string;
  readonly confidence?: number;
  readonly captureHash: string;
  readonly prompt: string;
  readonly answer: AnswerSpec;
  readonly modelTag: string;
  readonly cacheKey: string;
  readonly evaluatedAtMs: number;
}
