import type { Interpretation, LabelAnswerSpec } from '../types/query.js';
import { extractAnswerText, uninterpretable, words } from './structured.js';

function phrase(text: string): string {
  return ` ${words(text).join(' ')} `;
}

/**
 * Label → phrases that count as that label (the label itself first).
 */
export function labelPhrases(spec: LabelAnswerSpec): Map<string, string[]> {
  const result = new Map<string, string[]>();
  if (Array.isArray(spec.labels)) {
    for (const label of spec.labels) {
      result.set(label, [label]);
    }
  } else {
    for (const [label, synonyms] of Object.entries(spec.labels)) {
      result.set(label, [label, ...synonyms]);
    }
  }
  return result;
}

/**
 * Read a categorical answer. Exactly one label, or one of its synonyms,
 * must appear in the answer as a whole phrase.
 */
export function interpretLabel(spec: LabelAnswerSpec, raw: string): Interpretation {
  const haystack = phrase(extractAnswerText('label', raw, spec.field));

  const matched: string[] = [];
  for (const [label, phrases] of labelPhrases(spec)) {
    if (phrases.some((p) => phrase(p).trim() !== '' && haystack.includes(phrase(p)))) {
      matched.push(label);
    }
  }

  const [value] = matched;
  if (value === undefined) {
    return uninterpretable('label', raw, 'no known label in answer');
  }
  if (matched.length > 1) {
    return uninterpretable('label', raw, `ambiguous labels: ${matched.join(', ')}`);
  }

  return { value, passed: spec.expected === undefined || spec.expected === value };
}
