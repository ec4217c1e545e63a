import { InvalidArgumentError } from 'commander';
import { describeFailure, isSightcheckError, type ConfigOverrides } from '@sightcheck/core';

export const EXIT_OK = 0;
/** At least one assertion failed or errored. */
export const EXIT_FAILED = 1;
/** Configuration, model load or other setup problem. */
export const EXIT_SETUP_ERROR = 2;

export interface ModelOptions {
  model?: string;
  runtime?: string;
  ollamaUrl?: string;
  timeout?: number;
  retries?: number;
  cache?: string;
  mockResponse?: string;
  verbose?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseRatio(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

export function toOverrides(options: ModelOptions): ConfigOverrides {
  return {
    modelPath: options.model,
    runtime: options.runtime,
    ollamaUrl: options.ollamaUrl,
    inferenceTimeoutMs: options.timeout,
    retry: { maxAttempts: options.retries },
    cacheFile: options.cache,
    verbose: options.verbose,
  };
}

export function printError(error: unknown): void {
  const failure = describeFailure(error);
  console.error(`Error [${failure.kind}] ${failure.message}`);
  if (isSightcheckError(error) && error.userAction) {
    console.error(`  ${error.userAction}`);
  }
}
