/**
 * SuiteRunner: runs a suite file end to end.
 *
 * For every query the page is opened fresh, captured (several frames for
 * animated content, the last frame is judged), evaluated, and closed.
 * Screenshots land in `<artifactsDir>/screenshots`; each test result is
 * appended to `<artifactsDir>/results.json`.
 *
 * Browser automation is injected (`openTarget` + `capture`), so the runner
 * itself has no browser dependency.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AssertionEvaluator } from '../evaluator/assertion-evaluator.js';
import { captureFrames } from '../capture/frames.js';
import { describeFailure } from '../evaluator/visual-assert.js';
import type { CaptureAdapter, CaptureRecord } from '../types/capture.js';
import type { Viewport } from '../types/common.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { createError } from '../types/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { appendResults, combineStatus, RESULTS_FILE_NAME, type QueryResult, type SuiteResult, type TestResult } from './report.js';
import type { Suite, SuiteQuery, SuiteTest } from './suite-schema.js';

export interface OpenedTarget<TTarget> {
  target: TTarget;
  close(): Promise<void>;
}

export interface SuiteRunnerConfig<TTarget> {
  evaluator: AssertionEvaluator;
  capture: CaptureAdapter<TTarget>;
  openTarget(url: string, viewport: Viewport): Promise<OpenedTarget<TTarget>>;
  artifactsDir: string;
  /** Used when neither the suite nor the test sets one. */
  viewport?: Viewport;
  clock?: Clock;
  /**
   * Append each test result to `<artifactsDir>/results.json`.
   * @default true
   */
  writeResults?: boolean;
  verbose?: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export const DEFAULT_FRAME_COUNT = 5;
export const SCREENSHOTS_DIR_NAME = 'screenshots';

/**
 * File-name safe form of a test name.
 */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'test';
}

/**
 * `YYYYMMDD_HHMMSS` in UTC.
 */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}

export class SuiteRunner<TTarget> {
  private readonly config: SuiteRunnerConfig<TTarget>;
  private readonly clock: Clock;
  private readonly verbose: boolean;

  constructor(config: SuiteRunnerConfig<TTarget>) {
    this.config = config;
    this.clock = config.clock ?? systemClock;
    this.verbose = config.verbose ?? false;
  }

  get resultsPath(): string {
    return path.join(this.config.artifactsDir, RESULTS_FILE_NAME);
  }

  async runSuite(suite: Suite, options: RunOptions = {}): Promise<SuiteResult> {
    const startTime = performance.now();
    const tests: TestResult[] = [];

    for (const test of suite.tests) {
      tests.push(await this.runTest(test, suite.viewport, options));
    }

    const statuses = tests.flatMap((test) => test.queries.map((query) => query.status));
    return {
      name: suite.name,
      tests,
      passed: statuses.filter((status) => status === 'passed').length,
      failed: statuses.filter((status) => status === 'failed').length,
      errored: statuses.filter((status) => status === 'error').length,
      durationMs: performance.now() - startTime,
    };
  }

  async runTest(test: SuiteTest, suiteViewport?: Viewport, options: RunOptions = {}): Promise<TestResult> {
    const viewport = test.viewport ?? suiteViewport ?? this.config.viewport ?? DEFAULT_CONFIG.viewport;
    const startedAt = new Date(this.clock.now()).toISOString();
    if (this.verbose) {
      console.log(`[SuiteRunner] Running test: ${test.name} (${test.url})`);
    }

    const queries: QueryResult[] = [];
    for (const [index, query] of test.queries.entries()) {
      queries.push(await this.runQuery(test, query, index, viewport, options.signal));
    }

    const result: TestResult = {
      testName: test.name,
      url: test.url,
      status: combineStatus(queries.map((query) => query.status)),
      startedAt,
      endedAt: new Date(this.clock.now()).toISOString(),
      queries,
    };

    if (this.config.writeResults ?? true) {
      await appendResults(this.resultsPath, [result]);
    }
    return result;
  }

  private async runQuery(
    test: SuiteTest,
    query: SuiteQuery,
    index: number,
    viewport: Viewport,
    signal?: AbortSignal
  ): Promise<QueryResult> {
    const startTime = performance.now();
    const screenshots: string[] = [];
    const base = { question: query.question, answer: query.answer, screenshots };

    if (this.verbose) {
      console.log(`[SuiteRunner] Query: ${query.question}`);
    }

    try {
      if (signal?.aborted) {
        throw createError('ERROR_ABORTED', 'Suite run aborted');
      }

      const opened = await this.config.openTarget(test.url, viewport);
      let record: CaptureRecord;
      try {
        const intervalMs = query.screenshotIntervalMs ?? 0;
        const frames = await captureFrames(this.config.capture, opened.target, {
          intervalMs,
          count: query.frames ?? (intervalMs > 0 ? DEFAULT_FRAME_COUNT : 1),
          clock: this.clock,
          signal,
        });
        for (const [frame, capture] of frames.entries()) {
          screenshots.push(await this.saveScreenshot(test, index, capture, frames.length > 1 ? frame : undefined));
        }
        record = lastFrame(frames);
      } finally {
        await opened.close();
      }

      const verdict = await this.config.evaluator.evaluate(
        record,
        { prompt: query.question, answer: query.answer, minConfidence: query.minConfidence },
        { signal }
      );

      if (this.verbose) {
        console.log(`[SuiteRunner] Answer: ${verdict.rawResponse.trim()} -> ${verdict.passed ? 'pass' : 'fail'}`);
      }
      return {
        ...base,
        status: verdict.passed ? 'passed' : 'failed',
        value: verdict.value,
        rawResponse: verdict.rawResponse,
        confidence: verdict.confidence,
        cacheKey: verdict.cacheKey,
        durationMs: performance.now() - startTime,
      };
    } catch (err) {
      const failure = describeFailure(err);
      if (this.verbose) {
        console.log(`[SuiteRunner] Query error [${failure.kind}]: ${failure.message}`);
      }
      return { ...base, status: 'error', error: failure, durationMs: performance.now() - startTime };
    }
  }

  private async saveScreenshot(test: SuiteTest, queryIndex: number, record: CaptureRecord, frame?: number): Promise<string> {
    const dir = path.join(this.config.artifactsDir, SCREENSHOTS_DIR_NAME);
    await mkdir(dir, { recursive: true });

    const extension = record.mimeType === 'image/jpeg' ? 'jpg' : 'png';
    const suffix = frame === undefined ? '' : `_${frame}`;
    const fileName = `${slugify(test.name)}_q${queryIndex + 1}_${formatTimestamp(record.capturedAtMs)}${suffix}.${extension}`;
    const filePath = path.join(dir, fileName);
    await writeFile(filePath, record.image);
    return filePath;
  }
}

function lastFrame(frames: CaptureRecord[]): CaptureRecord {
  const last = frames[frames.length - 1];
  if (!last) {
    throw createError('ERROR_CAPTURE_FAILED', 'No frame was captured');
  }
  return last;
}

/**
 * Create a SuiteRunner instance.
 */
export function createSuiteRunner<TTarget>(config: SuiteRunnerConfig<TTarget>): SuiteRunner<TTarget> {
  return new SuiteRunner(config);
}
