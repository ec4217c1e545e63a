/**
 * Content hashing and cache key derivation.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import type { AnswerSpec } from '../types/query.js';

export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonicalize(v)])
    );
  }
  return value;
}

/**
 * Stable fingerprint of an answer spec: key order and undefined fields
 * do not change it.
 */
export function fingerprintAnswerSpec(answer: AnswerSpec): string {
  return JSON.stringify(canonicalize(answer));
}

export interface CacheKeyParts {
  modelTag: string;
  contentHash: string;
  prompt: string;
  answer: AnswerSpec;
}

/**
 * Cache key for a (model, capture, query) triple.
 * Every part is length-prefixed before hashing, so no two distinct inputs
 * share a preimage.
 */
export function computeCacheKey(parts: CacheKeyParts): string {
  const fields = [
    parts.modelTag,
    parts.contentHash,
    sha256Hex(parts.prompt),
    fingerprintAnswerSpec(parts.answer),
  ];
  const preimage = fields.map((field) => `${field.length}:${field}`).join('|');
  return sha256Hex(preimage);
}
