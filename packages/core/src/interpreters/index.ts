/**
 * Answer interpreters: turn raw model text into a typed value.
 * The set is closed; an AnswerSpec's `kind` selects the interpreter.
 */

import { createError } from '../types/errors.js';
import type { AnswerSpec, Interpretation } from '../types/query.js';
import { interpretLabel, labelPhrases } from './label.js';
import { interpretMatch } from './match.js';
import { interpretScore } from './score.js';
import { interpretYesNo } from './yes-no.js';

export { interpretYesNo } from './yes-no.js';
export { interpretLabel } from './label.js';
export { interpretScore } from './score.js';
export { interpretMatch, wordSimilarity, DEFAULT_MATCH_TOLERANCE } from './match.js';
export { extractAnswerText } from './structured.js';

/**
 * Interpret `raw` according to `spec`.
 * Throws ERROR_UNINTERPRETABLE_RESPONSE when the text does not fit.
 */
export function interpret(spec: AnswerSpec, raw: string): Interpretation {
  switch (spec.kind) {
    case 'yes-no':
      return interpretYesNo(spec, raw);
    case 'label':
      return interpretLabel(spec, raw);
    case 'score':
      return interpretScore(spec, raw);
    case 'match':
      return interpretMatch(spec, raw);
  }
}

function invalid(message: string): never {
  throw createError('ERROR_INVALID_QUERY', message, {
    devAction: 'Fix the answer spec passed to the evaluator',
  });
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Reject answer specs no answer could ever satisfy.
 */
export function validateAnswerSpec(spec: AnswerSpec): void {
  switch (spec.kind) {
    case 'yes-no':
      return;
    case 'label': {
      const labels = labelPhrases(spec);
      if (labels.size === 0) {
        invalid('Label answer spec needs at least one label');
      }
      if (spec.expected !== undefined && !labels.has(spec.expected)) {
        invalid(`Expected label "${spec.expected}" is not one of the allowed labels`);
      }
      return;
    }
    case 'score':
      if (!isUnitInterval(spec.threshold)) {
        invalid(`Score threshold must be between 0 and 1, got ${spec.threshold}`);
      }
      if (spec.max !== undefined && !(spec.max > 0)) {
        invalid(`Score max must be positive, got ${spec.max}`);
      }
      return;
    case 'match':
      if (spec.expected.trim() === '') {
        invalid('Match answer spec needs a non-empty expected text');
      }
      if (spec.tolerance !== undefined && !isUnitInterval(spec.tolerance)) {
        invalid(`Match tolerance must be between 0 and 1, got ${spec.tolerance}`);
      }
      return;
  }
}
