import type { Interpretation, ScoreAnswerSpec } from '../types/query.js';
import { extractAnswerText, uninterpretable } from './structured.js';

const NUMBER_PATTERN = /(-?\d+(?:\.\d+)?)\s*(%)?/;

/**
 * Read a numeric score. The first number in the answer is used; a trailing
 * `%` reads it as a percentage, anything else is divided by `max`.
 * The normalised score must lie in [0, 1].
 */
export function interpretScore(spec: ScoreAnswerSpec, raw: string): Interpretation {
  const text = extractAnswerText('score', raw, spec.field);
  const match = NUMBER_PATTERN.exec(text);
  if (!match?.[1]) {
    return uninterpretable('score', raw, 'no number in answer');
  }

  const number = Number.parseFloat(match[1]);
  const score = match[2] === '%' ? number / 100 : number / (spec.max ?? 1);
  if (!Number.isFinite(score) || score < 0 || score > 1) {
    return uninterpretable('score', raw, `score ${number} is outside the expected range`);
  }

  const value = score >= spec.threshold;
  return { value, passed: value, confidence: score };
}
