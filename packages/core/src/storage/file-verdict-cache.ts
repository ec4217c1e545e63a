/**
 * Persistent verdict cache backed by one JSON file.
 *
 * File format: `{ "version": 1, "entries": { "<cache key>": Verdict } }`.
 * A missing file starts an empty cache; an unreadable or invalid file is
 * logged and replaced on the next write. Writes are serialised and go
 * through a temporary file so a crash never leaves half a document behind.
 * A failed write is logged and the verdict stays cached in memory.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { answerSpecSchema } from '../interpreters/answer-schema.js';
import { errorMessage } from '../types/errors.js';
import type { Verdict } from '../types/verdict.js';
import type { VerdictCache } from './verdict-cache.js';

const CACHE_FILE_VERSION = 1;

const verdictSchema = z.object({
  value: z.union([z.boolean(), z.string()]),
  passed: z.boolean(),
  rawResponse: z.string(),
  confidence: z.number().optional(),
  captureHash: z.string(),
  prompt: z.string(),
  answer: answerSpecSchema,
  modelTag: z.string(),
  cacheKey: z.string(),
  evaluatedAtMs: z.number(),
});

const cacheFileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  entries: z.record(verdictSchema),
});

export interface FileVerdictCacheOptions {
  verbose?: boolean;
}

export interface FileVerdictCache extends VerdictCache {
  readonly filePath: string;

  /**
   * Resolve once every pending write has reached the disk.
   */
  flush(): Promise<void>;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function loadEntries(filePath: string, verbose: boolean): Promise<Map<string, Verdict>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissing(err)) {
      if (verbose) {
        console.log(`[VerdictCache] No cache file at ${filePath}, starting empty`);
      }
      return new Map();
    }
    console.warn(`[VerdictCache] Ignoring unreadable cache file ${filePath}: ${errorMessage(err)}`);
    return new Map();
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    console.warn(`[VerdictCache] Ignoring unreadable cache file ${filePath}: ${errorMessage(err)}`);
    return new Map();
  }

  const parsed = cacheFileSchema.safeParse(json);
  if (!parsed.success) {
    console.warn(`[VerdictCache] Ignoring invalid cache file ${filePath}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    return new Map();
  }

  const entries = new Map<string, Verdict>();
  for (const [key, verdict] of Object.entries(parsed.data.entries)) {
    if (verdict.cacheKey === key) {
      entries.set(key, Object.freeze(verdict));
    }
  }
  if (verbose) {
    console.log(`[VerdictCache] Loaded ${entries.size} verdicts from ${filePath}`);
  }
  return entries;
}

/**
 * Create a verdict cache persisted to `filePath`.
 */
export function createFileVerdictCache(filePath: string, options: FileVerdictCacheOptions = {}): FileVerdictCache {
  const resolvedPath = path.resolve(filePath);
  const verbose = options.verbose ?? false;
  let loading: Promise<Map<string, Verdict>> | undefined;
  let queue: Promise<void> = Promise.resolve();

  function entries(): Promise<Map<string, Verdict>> {
    loading ??= loadEntries(resolvedPath, verbose);
    return loading;
  }

  async function persist(): Promise<void> {
    const current = await entries();
    const document = {
      version: CACHE_FILE_VERSION,
      entries: Object.fromEntries(current),
    };
    const tmpPath = `${resolvedPath}.tmp-${process.pid}`;
    await mkdir(path.dirname(resolvedPath), { recursive: true });
    await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
    await rename(tmpPath, resolvedPath);
  }

  function write(): Promise<void> {
    queue = queue.then(persist).catch((err: unknown) => {
      console.warn(`[VerdictCache] Could not write ${resolvedPath}: ${errorMessage(err)}`);
    });
    return queue;
  }

  return {
    filePath: resolvedPath,

    async get(key: string): Promise<Verdict | undefined> {
      return (await entries()).get(key);
    },

    async put(key: string, verdict: Verdict): Promise<void> {
      (await entries()).set(key, verdict);
      await write();
    },

    async delete(key: string): Promise<boolean> {
      const removed = (await entries()).delete(key);
      if (removed) {
        await write();
      }
      return removed;
    },

    async clear(): Promise<void> {
      (await entries()).clear();
      await write();
    },

    async size(): Promise<number> {
      return (await entries()).size;
    },

    async flush(): Promise<void> {
      await queue;
    },
  };
}
