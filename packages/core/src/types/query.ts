/**
 * Queries and expected-answer specs.
 * Answer specs are plain data so they can be fingerprinted for cache keys
 * and written to suite files.
 */

import type { VerdictValue } from './common.js';

interface StructuredField {
  /**
   * Field read when the model answers with a JSON object.
   * @default 'answer'
   */
  field?: string;
}

export interface YesNoAnswerSpec extends StructuredField {
  kind: 'yes-no';
  /**
   * Answer that counts as a pass.
   * @default true
   */
  expected?: boolean;
}

export interface LabelAnswerSpec extends StructuredField {
  kind: 'label';
  /** Allowed labels, or labels mapped to accepted synonyms. */
  labels: string[] | Record<string, string[]>;
  /** Label that counts as a pass. Any recognised label passes when omitted. */
  expected?: string;
}

export interface ScoreAnswerSpec extends StructuredField {
  kind: 'score';
  /** Normalised score (0-1) at or above which the verdict is true. */
  threshold: number;
  /**
   * Upper bound of the model's scale.
   * @default 1
   */
  max?: number;
}

export interface MatchAnswerSpec extends StructuredField {
  kind: 'match';
  /** Reference answer the model's text is compared with. */
  expected: string;
  /**
   * Minimum word-set similarity (0-1).
   * @default 0.8
   */
  tolerance?: number;
}

export type AnswerSpec = YesNoAnswerSpec | LabelAnswerSpec | ScoreAnswerSpec | MatchAnswerSpec;

export type AnswerKind = AnswerSpec['kind'];

export interface Query {
  readonly prompt: string;
  readonly answer: AnswerSpec;
  /** Interpretations reporting a lower confidence raise ERROR_LOW_CONFIDENCE. */
  readonly minConfidence?: number;
}

export interface Interpretation {
  value: VerdictValue;
  passed: boolean;
  confidence?: number;
}
