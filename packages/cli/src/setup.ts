/**
 * Wires config into a runtime, a model session, a verdict cache and an evaluator.
 */

import {
  AssertionEvaluator,
  createError,
  createFileVerdictCache,
  createMemoryVerdictCache,
  ModelSession,
  type FileVerdictCache,
  type ModelHandle,
  type ModelRuntime,
  type SightcheckConfig,
  type VerdictCache,
} from '@sightcheck/core';
import { createMockRuntime } from '@sightcheck/runtime-mock';
import { createOllamaRuntime } from '@sightcheck/runtime-ollama';

export interface RuntimeOptions {
  /** Fixed answer for the mock runtime. */
  mockResponse?: string;
}

export function createRuntime(config: SightcheckConfig, options: RuntimeOptions = {}): ModelRuntime {
  switch (config.runtime) {
    case 'ollama':
      return createOllamaRuntime({ baseUrl: config.ollamaUrl, verbose: config.verbose });
    case 'mock':
      return createMockRuntime({ response: options.mockResponse });
    default:
      throw createError('ERROR_INVALID_CONFIG', `Unknown runtime "${config.runtime}"`, {
        userAction: 'Use --runtime ollama or --runtime mock',
      });
  }
}

export interface EvaluationContext {
  session: ModelSession;
  handle: ModelHandle;
  cache: VerdictCache;
  evaluator: AssertionEvaluator;
  close(): Promise<void>;
}

/**
 * Load the configured model and build an evaluator around it.
 * Throws ERROR_INVALID_CONFIG without a model path, and model-load errors.
 */
export async function createEvaluationContext(
  config: SightcheckConfig,
  options: RuntimeOptions = {}
): Promise<EvaluationContext> {
  if (!config.modelPath) {
    throw createError('ERROR_INVALID_CONFIG', 'No model path configured', {
      userAction: 'Pass --model <path> or set SIGHTCHECK_MODEL_PATH',
    });
  }

  const session = new ModelSession({
    runtime: createRuntime(config, options),
    defaultTimeoutMs: config.inferenceTimeoutMs,
    verbose: config.verbose,
  });

  let handle: ModelHandle;
  try {
    handle = await session.initialize(config.modelPath);
  } catch (err) {
    await session.teardown();
    throw err;
  }

  const fileCache: FileVerdictCache | undefined = config.cacheFile
    ? createFileVerdictCache(config.cacheFile, { verbose: config.verbose })
    : undefined;
  const cache = fileCache ?? createMemoryVerdictCache();

  const evaluator = new AssertionEvaluator({
    session,
    handle,
    cache,
    retry: config.retry,
    inferenceTimeoutMs: config.inferenceTimeoutMs,
    verbose: config.verbose,
  });

  return {
    session,
    handle,
    cache,
    evaluator,
    async close(): Promise<void> {
      try {
        await fileCache?.flush();
      } finally {
        await session.teardown();
      }
    },
  };
}
