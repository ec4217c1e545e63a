/**
 * Suite results: persisted to `results.json` and printed as a text report.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { FailureDescription } from '../evaluator/visual-assert.js';
import { errorMessage } from '../types/errors.js';
import type { VerdictValue } from '../types/common.js';
import type { AnswerSpec } from '../types/query.js';

export type ResultStatus = 'passed' | 'failed' | 'error';

export interface QueryResult {
  question: string;
  answer: AnswerSpec;
  status: ResultStatus;
  value?: VerdictValue;
  rawResponse?: string;
  confidence?: number;
  cacheKey?: string;
  screenshots: string[];
  error?: FailureDescription;
  durationMs: number;
}

export interface TestResult {
  testName: string;
  url: string;
  status: ResultStatus;
  startedAt: string;
  endedAt: string;
  queries: QueryResult[];
}

export interface SuiteResult {
  name?: string;
  tests: TestResult[];
  passed: number;
  failed: number;
  errored: number;
  durationMs: number;
}

export const RESULTS_FILE_NAME = 'results.json';

/**
 * Overall status: any error wins over any failure.
 */
export function combineStatus(statuses: ResultStatus[]): ResultStatus {
  if (statuses.includes('error')) return 'error';
  if (statuses.includes('failed')) return 'failed';
  return 'passed';
}

/**
 * Append test results to the JSON array in `filePath`, creating it when
 * missing. A file that does not hold an array is replaced.
 */
export async function appendResults(filePath: string, results: TestResult[]): Promise<void> {
  let existing: unknown[] = [];
  try {
    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    if (Array.isArray(parsed)) {
      existing = parsed;
    } else {
      console.warn(`[Report] ${filePath} does not hold a result list, starting a new one`);
    }
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      console.warn(`[Report] Cannot read ${filePath} (${errorMessage(err)}), starting a new one`);
    }
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp-${process.pid}`;
  await writeFile(tmpPath, `${JSON.stringify([...existing, ...results], null, 2)}\n`, 'utf8');
  await rename(tmpPath, filePath);
}

function formatValue(value: VerdictValue | undefined): string {
  return value === undefined ? '-' : JSON.stringify(value);
}

function formatQuery(testName: string, query: QueryResult, verbose: boolean): string[] {
  const mark = query.status === 'passed' ? '✓' : '✗';
  const lines: string[] = [];

  if (query.error) {
    lines.push(`  ${mark} ${testName} > ${query.question} [${query.error.kind}] ${query.error.message}`);
  } else {
    lines.push(`  ${mark} ${testName} > ${query.question} = ${formatValue(query.value)}`);
  }

  if (verbose) {
    if (query.rawResponse !== undefined) {
      lines.push(`      model: ${query.rawResponse.trim()}`);
    }
    for (const screenshot of query.screenshots) {
      lines.push(`      screenshot: ${screenshot}`);
    }
  }
  return lines;
}

/**
 * Text report: one line per query, then a summary line.
 */
export function formatReport(result: SuiteResult, options: { verbose?: boolean } = {}): string {
  const verbose = options.verbose ?? false;
  const lines: string[] = [];

  if (result.name) {
    lines.push(result.name);
  }
  for (const test of result.tests) {
    for (const query of test.queries) {
      lines.push(...formatQuery(test.testName, query, verbose));
    }
  }

  const total = result.passed + result.failed + result.errored;
  lines.push('');
  lines.push(
    `${result.passed}/${total} queries passed, ${result.failed} failed, ${result.errored} errored (${Math.round(result.durationMs)}ms)`
  );
  return lines.join('\n');
}
