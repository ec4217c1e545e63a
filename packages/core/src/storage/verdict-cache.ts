/**
 * Verdict cache: content-addressed verdicts keyed by
 * (model version tag, capture hash, prompt, answer spec).
 *
 * Entries are derived data. Clearing the cache never changes a verdict,
 * it only costs another inference.
 */

import type { Verdict } from '../types/verdict.js';

export interface VerdictCache {
  get(key: string): Promise<Verdict | undefined>;

  /**
   * Store a verdict. An existing entry for the key is replaced.
   */
  put(key: string, verdict: Verdict): Promise<void>;

  delete(key: string): Promise<boolean>;

  clear(): Promise<void>;

  size(): Promise<number>;
}

/**
 * Process-scoped cache. Unbounded for the lifetime of the session and never
 * written to disk.
 */
export function createMemoryVerdictCache(): VerdictCache {
  const entries = new Map<string, Verdict>();

  return {
    async get(key: string): Promise<Verdict | undefined> {
      return entries.get(key);
    },

    async put(key: string, verdict: Verdict): Promise<void> {
      entries.set(key, verdict);
    },

    async delete(key: string): Promise<boolean> {
      return entries.delete(key);
    },

    async clear(): Promise<void> {
      entries.clear();
    },

    async size(): Promise<number> {
      return entries.size;
    },
  };
}
