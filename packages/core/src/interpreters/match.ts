import type { Interpretation, MatchAnswerSpec } from '../types/query.js';
import { extractAnswerText, uninterpretable, words } from './structured.js';

export const DEFAULT_MATCH_TOLERANCE = 0.8;

/**
 * Dice coefficient of the two texts' word sets (0-1).
 */
export function wordSimilarity(a: string, b: string): number {
  const left = new Set(words(a));
  const right = new Set(words(b));
  if (left.size === 0 && right.size === 0) return 1;

  let shared = 0;
  for (const word of left) {
    if (right.has(word)) shared++;
  }
  return (2 * shared) / (left.size + right.size);
}

/**
 * Compare a free-text answer with a reference answer.
 */
export function interpretMatch(spec: MatchAnswerSpec, raw: string): Interpretation {
  const text = extractAnswerText('match', raw, spec.field);
  if (words(text).length === 0) {
    return uninterpretable('match', raw, 'no words in answer');
  }

  const similarity = wordSimilarity(text, spec.expected);
  const value = similarity >= (spec.tolerance ?? DEFAULT_MATCH_TOLERANCE);
  return { value, passed: value, confidence: similarity };
}
