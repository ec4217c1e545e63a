/**
 * Configuration resolution and validation.
 * Precedence: explicit overrides > SIGHTCHECK_* environment > defaults.
 */

import { CONFIG_ENV_PREFIX, DEFAULT_CONFIG, type RetryConfig, type SightcheckConfig } from '../types/config.js';
import { createError } from '../types/errors.js';

export type ConfigOverrides = Partial<Omit<SightcheckConfig, 'retry'>> & { retry?: RetryConfig };

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[`${CONFIG_ENV_PREFIX}${name}`];
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim();
}

function readEnvInt(env: Env, name: string): number | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw createError(
      'ERROR_INVALID_CONFIG',
      `${CONFIG_ENV_PREFIX}${name} must be an integer, got "${raw}"`,
      { devAction: `Fix or unset ${CONFIG_ENV_PREFIX}${name}` }
    );
  }
  return value;
}

function readEnvBool(env: Env, name: string): boolean | undefined {
  const raw = readEnv(env, name);
  if (raw === undefined) return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function fromEnv(env: Env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const modelPath = readEnv(env, 'MODEL_PATH');
  if (modelPath !== undefined) overrides.modelPath = modelPath;

  const runtime = readEnv(env, 'RUNTIME');
  if (runtime !== undefined) overrides.runtime = runtime;

  const ollamaUrl = readEnv(env, 'OLLAMA_URL');
  if (ollamaUrl !== undefined) overrides.ollamaUrl = ollamaUrl;

  const artifactsDir = readEnv(env, 'ARTIFACTS_DIR');
  if (artifactsDir !== undefined) overrides.artifactsDir = artifactsDir;

  const cacheFile = readEnv(env, 'CACHE_FILE');
  if (cacheFile !== undefined) overrides.cacheFile = cacheFile;

  const inferenceTimeoutMs = readEnvInt(env, 'INFERENCE_TIMEOUT_MS');
  if (inferenceTimeoutMs !== undefined) overrides.inferenceTimeoutMs = inferenceTimeoutMs;

  const retry: RetryConfig = {};
  const maxAttempts = readEnvInt(env, 'RETRY_ATTEMPTS');
  if (maxAttempts !== undefined) retry.maxAttempts = maxAttempts;
  const initialDelayMs = readEnvInt(env, 'RETRY_DELAY_MS');
  if (initialDelayMs !== undefined) retry.initialDelayMs = initialDelayMs;
  if (Object.keys(retry).length > 0) overrides.retry = retry;

  const verbose = readEnvBool(env, 'VERBOSE');
  if (verbose !== undefined) overrides.verbose = verbose;

  return overrides;
}

/**
 * Merge defaults, environment and overrides, then validate.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): SightcheckConfig {
  const fromEnvironment = fromEnv(env);

  const config: SightcheckConfig = {
    modelPath: overrides.modelPath ?? fromEnvironment.modelPath ?? DEFAULT_CONFIG.modelPath,
    runtime: overrides.runtime ?? fromEnvironment.runtime ?? DEFAULT_CONFIG.runtime,
    ollamaUrl: overrides.ollamaUrl ?? fromEnvironment.ollamaUrl ?? DEFAULT_CONFIG.ollamaUrl,
    artifactsDir: overrides.artifactsDir ?? fromEnvironment.artifactsDir ?? DEFAULT_CONFIG.artifactsDir,
    viewport: overrides.viewport ?? DEFAULT_CONFIG.viewport,
    captureTimeoutMs: overrides.captureTimeoutMs ?? DEFAULT_CONFIG.captureTimeoutMs,
    inferenceTimeoutMs:
      overrides.inferenceTimeoutMs ?? fromEnvironment.inferenceTimeoutMs ?? DEFAULT_CONFIG.inferenceTimeoutMs,
    retry: {
      maxAttempts:
        overrides.retry?.maxAttempts ?? fromEnvironment.retry?.maxAttempts ?? DEFAULT_CONFIG.retry.maxAttempts,
      initialDelayMs:
        overrides.retry?.initialDelayMs ?? fromEnvironment.retry?.initialDelayMs ?? DEFAULT_CONFIG.retry.initialDelayMs,
      multiplier: overrides.retry?.multiplier,
      maxDelayMs: overrides.retry?.maxDelayMs,
      jitter: overrides.retry?.jitter,
      maxTotalWaitMs: overrides.retry?.maxTotalWaitMs,
    },
    cacheFile: overrides.cacheFile ?? fromEnvironment.cacheFile ?? DEFAULT_CONFIG.cacheFile,
    verbose: overrides.verbose ?? fromEnvironment.verbose ?? DEFAULT_CONFIG.verbose,
  };

  validateConfig(config);
  return config;
}

function assertPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw createError(
      'ERROR_INVALID_CONFIG',
      `${name} must be a positive number, got ${value}`,
      { details: { field: name } }
    );
  }
}

/**
 * Validate SightcheckConfig and throw if invalid.
 */
export function validateConfig(config: SightcheckConfig): void {
  if (!config.runtime || config.runtime.trim().length === 0) {
    throw createError('ERROR_INVALID_CONFIG', 'runtime must be set', {
      devAction: `Set runtime or ${CONFIG_ENV_PREFIX}RUNTIME (e.g. "ollama" or "mock")`,
    });
  }

  try {
    new URL(config.ollamaUrl);
  } catch (err) {
    throw createError('ERROR_INVALID_CONFIG', `ollamaUrl is not a valid URL: ${config.ollamaUrl}`, {
      cause: err,
      details: { field: 'ollamaUrl' },
    });
  }

  assertPositive(config.viewport.width, 'viewport.width');
  assertPositive(config.viewport.height, 'viewport.height');
  assertPositive(config.captureTimeoutMs, 'captureTimeoutMs');
  assertPositive(config.inferenceTimeoutMs, 'inferenceTimeoutMs');

  if (config.retry.maxAttempts !== undefined) {
    if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
      throw createError(
        'ERROR_INVALID_CONFIG',
        `retry.maxAttempts must be an integer >= 1, got ${config.retry.maxAttempts}`,
        { details: { field: 'retry.maxAttempts' } }
      );
    }
  }

  if (config.retry.initialDelayMs !== undefined && config.retry.initialDelayMs < 0) {
    throw createError(
      'ERROR_INVALID_CONFIG',
      `retry.initialDelayMs must be >= 0, got ${config.retry.initialDelayMs}`,
      { details: { field: 'retry.initialDelayMs' } }
    );
  }
}
