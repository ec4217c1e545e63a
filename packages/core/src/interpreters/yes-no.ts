import type { Interpretation, YesNoAnswerSpec } from '../types/query.js';
import { extractAnswerText, uninterpretable, words } from './structured.js';

const AFFIRMATIVE = new Set(['yes', 'yeah', 'yep', 'yup', 'true', 'correct', 'affirmative']);
const NEGATIVE = new Set(['no', 'nope', 'nah', 'false', 'incorrect', 'negative']);

/**
 * Read a yes/no answer.
 *
 * The first word decides when it is an affirmative or negative word
 * ("No, the page looks fine." is `false`). Otherwise the answer must
 * contain standalone "yes" or "no", but not both.
 */
export function interpretYesNo(spec: YesNoAnswerSpec, raw: string): Interpretation {
  const tokens = words(extractAnswerText('yes-no', raw, spec.field));
  const first = tokens[0];
  if (first === undefined) {
    return uninterpretable('yes-no', raw, 'no words in answer');
  }

  let value: boolean;
  if (AFFIRMATIVE.has(first)) {
    value = true;
  } else if (NEGATIVE.has(first)) {
    value = false;
  } else {
    const sawYes = tokens.includes('yes');
    const sawNo = tokens.includes('no');
    if (sawYes === sawNo) {
      return uninterpretable('yes-no', raw, sawYes ? 'answer says both yes and no' : 'no yes/no word found');
    }
    value = sawYes;
  }

  return { value, passed: value === (spec.expected ?? true) };
}
