/**
 * Suite files: JSON lists of pages and the questions to ask about them.
 *
 * ```json
 * {
 *   "name": "smoke",
 *   "tests": [
 *     {
 *       "name": "login page",
 *       "url": "http://localhost:3000/login",
 *       "queries": [
 *         { "question": "Is there a visible error banner?", "expected": "no" },
 *         { "question": "What colour is the submit button?", "expected": "blue", "tolerance": 0.5 }
 *       ]
 *     }
 *   ]
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { answerSpecSchema } from '../interpreters/answer-schema.js';
import type { Viewport } from '../types/common.js';
import { createError, errorMessage } from '../types/errors.js';
import type { AnswerSpec } from '../types/query.js';

const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const querySchema = z
  .object({
    question: z.string().trim().min(1),
    answer: answerSpecSchema.optional(),
    expected: z.string().trim().min(1).optional(),
    tolerance: z.number().min(0).max(1).optional(),
    minConfidence: z.number().min(0).max(1).optional(),
    screenshotIntervalMs: z.number().int().positive().optional(),
    frames: z.number().int().min(1).optional(),
  })
  .refine((query) => query.answer === undefined || query.expected === undefined, {
    message: 'Use either "answer" or "expected", not both',
  });

const testSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
  viewport: viewportSchema.optional(),
  queries: z.array(querySchema).min(1),
});

export const suiteFileSchema = z.object({
  name: z.string().optional(),
  viewport: viewportSchema.optional(),
  tests: z.array(testSchema).min(1),
});

export type SuiteFile = z.infer<typeof suiteFileSchema>;

export interface SuiteQuery {
  question: string;
  answer: AnswerSpec;
  minConfidence?: number;
  /** Capture several frames this far apart and judge the last one. */
  screenshotIntervalMs?: number;
  frames?: number;
}

export interface SuiteTest {
  name: string;
  url: string;
  viewport?: Viewport;
  queries: SuiteQuery[];
}

export interface Suite {
  name?: string;
  viewport?: Viewport;
  tests: SuiteTest[];
}

const DEFAULT_QUERY_ANSWER: AnswerSpec = { kind: 'yes-no' };
const YES_WORDS = new Set(['yes', 'true']);
const NO_WORDS = new Set(['no', 'false']);

/**
 * Answer spec for the `expected` shorthand: yes/no words become a yes-no
 * spec, any other text a match spec.
 */
export function answerFromExpected(expected: string, tolerance?: number): AnswerSpec {
  const word = expected.trim().toLowerCase().replace(/[.!?]+$/, '');
  if (YES_WORDS.has(word)) return { kind: 'yes-no', expected: true };
  if (NO_WORDS.has(word)) return { kind: 'yes-no', expected: false };
  return { kind: 'match', expected: expected.trim(), tolerance };
}

function toAnswerSpec(query: z.infer<typeof querySchema>): AnswerSpec {
  if (query.answer) return query.answer;
  if (query.expected !== undefined) return answerFromExpected(query.expected, query.tolerance);
  return DEFAULT_QUERY_ANSWER;
}

/**
 * Validate parsed JSON as a suite. Throws ERROR_INVALID_SUITE.
 */
export function parseSuite(json: unknown, source = 'suite'): Suite {
  const parsed = suiteFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw createError('ERROR_INVALID_SUITE', `Invalid suite ${source}: ${issues.join('; ')}`, {
      details: { source, issues },
      userAction: 'Fix the suite file',
    });
  }

  const file = parsed.data;
  return {
    name: file.name,
    viewport: file.viewport,
    tests: file.tests.map((test) => ({
      name: test.name,
      url: test.url,
      viewport: test.viewport,
      queries: test.queries.map((query) => ({
        question: query.question,
        answer: toAnswerSpec(query),
        minConfidence: query.minConfidence,
        screenshotIntervalMs: query.screenshotIntervalMs,
        frames: query.frames,
      })),
    })),
  };
}

/**
 * Read and validate a suite file.
 */
export async function loadSuite(filePath: string): Promise<Suite> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw createError('ERROR_INVALID_SUITE', `Cannot read suite ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw createError('ERROR_INVALID_SUITE', `Suite ${filePath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  return parseSuite(json, filePath);
}
