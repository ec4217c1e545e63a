/**
 * SightcheckConfig: settings shared by the CLI and the suite runner.
 */

import type { RuntimeId, Viewport } from './common.js';

export interface RetryConfig {
  maxAttempts?: number;
  initialDelayMs?: number;
  multiplier?: number;
  maxDelayMs?: number;
  jitter?: number;
  maxTotalWaitMs?: number;
}

export interface SightcheckConfig {
  /** Local model file, plain or `.gz`. */
  modelPath?: string;
  runtime: RuntimeId;
  ollamaUrl: string;
  /** Screenshots and results.json are written here. */
  artifactsDir: string;
  viewport: Viewport;
  /** Navigation and capture settle timeout. */
  captureTimeoutMs: number;
  inferenceTimeoutMs: number;
  retry: RetryConfig;
  /** Persist verdicts to this JSON file across runs. */
  cacheFile?: string;
  verbose: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: SightcheckConfig = {
  runtime: 'ollama',
  ollamaUrl: 'http://localhost:11434',
  artifactsDir: 'artifacts',
  viewport: { width: 1280, height: 720 },
  captureTimeoutMs: 30_000,
  inferenceTimeoutMs: 30_000,
  retry: {
    maxAttempts: 3,
    initialDelayMs: 1_000,
  },
  verbose: false,
};

export const CONFIG_ENV_PREFIX = 'SIGHTCHECK_';
