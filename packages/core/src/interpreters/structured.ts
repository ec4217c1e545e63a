/**
 * Shared helpers for reading a model answer.
 */

import { createError } from '../types/errors.js';
import type { AnswerKind } from '../types/query.js';

const DEFAULT_FIELD = 'answer';

/**
 * Raise ERROR_UNINTERPRETABLE_RESPONSE for `raw`.
 */
export function uninterpretable(kind: AnswerKind, raw: string, reason: string): never {
  throw createError('ERROR_UNINTERPRETABLE_RESPONSE', `Cannot read a ${kind} answer from "${truncate(raw)}": ${reason}`, {
    details: { kind, rawResponse: raw },
    userAction: 'Rephrase the prompt so the model answers in the expected form',
  });
}

function truncate(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Text to interpret. When the model answered with a JSON object, `field`
 * is read from it; otherwise the trimmed answer is returned as is.
 */
export function extractAnswerText(kind: AnswerKind, raw: string, field = DEFAULT_FIELD): string {
  const trimmed = raw.trim();
  if (trimmed === '') {
    uninterpretable(kind, raw, 'empty answer');
  }

  if (!trimmed.startsWith('{')) {
    return trimmed;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed;
  }

  if (!isRecord(parsed)) {
    return trimmed;
  }

  const value = parsed[field];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return uninterpretable(kind, raw, `JSON answer has no "${field}" field`);
}

/**
 * Lower-cased words of `text` (letters, digits and apostrophes).
 */
export function words(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
}
