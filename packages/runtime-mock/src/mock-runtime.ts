/**
 * MockRuntime: scripted model runtime for CI without a model.
 *
 * Scenarios:
 * - happy: answers after `latencyMs`
 * - slow: answers after `latencyMs` (default 2000)
 * - hang: never answers; settles only when the request is aborted
 * - crash: every query throws a plain Error
 * - flaky: the first `failuresBeforeSuccess` queries fail with a transport error
 * - load-fail: `load` throws
 */

import {
  createError,
  systemClock,
  type InferenceRequest,
  type LoadedModel,
  type ModelRuntime,
  type ResolvedModelFile,
  type RuntimeId,
} from '@sightcheck/core';

export type MockScenario = 'happy' | 'slow' | 'hang' | 'crash' | 'flaky' | 'load-fail';

export interface MockResponseRule {
  /** Substring of, or pattern for, the prompt. */
  match: string | RegExp;
  response: string;
}

export interface MockRuntimeConfig {
  scenario?: MockScenario;
  /** Answer used when no rule or scripted response applies. */
  response?: string;
  /** Answers returned in call order; the last one repeats. */
  responses?: string[];
  /** Prompt-specific answers; checked before `responses`. */
  rules?: MockResponseRule[];
  latencyMs?: number;
  /** @default 1 */
  failuresBeforeSuccess?: number;
  /** @default false */
  supportsConcurrentInference?: boolean;
}

export interface MockQueryRecord {
  modelPath: string;
  prompt: string;
  imageBytes: number;
}

const DEFAULT_MOCK_RESPONSE = 'Yes.';
const SLOW_LATENCY_MS = 2_000;

export class MockRuntime implements ModelRuntime {
  readonly id: RuntimeId = 'mock';
  readonly supportsConcurrentInference: boolean;

  private readonly config: MockRuntimeConfig;
  private loadCount = 0;
  private unloadCount = 0;
  private readonly queries: MockQueryRecord[] = [];

  constructor(config: MockRuntimeConfig = {}) {
    this.config = config;
    this.supportsConcurrentInference = config.supportsConcurrentInference ?? false;
  }

  get scenario(): MockScenario {
    return this.config.scenario ?? 'happy';
  }

  async load(file: ResolvedModelFile): Promise<LoadedModel> {
    this.loadCount++;
    if (this.scenario === 'load-fail') {
      throw new Error(`Mock load failure for ${file.modelPath}`);
    }

    let loaded = true;
    return {
      query: async (request: InferenceRequest): Promise<string> => {
        if (!loaded) {
          throw new Error('MockRuntime model was unloaded');
        }
        const callIndex = this.queries.length;
        this.queries.push({ modelPath: file.modelPath, prompt: request.prompt, imageBytes: request.image.byteLength });
        return this.answer(request, callIndex);
      },

      unload: async (): Promise<void> => {
        loaded = false;
        this.unloadCount++;
      },
    };
  }

  /** Number of `load` calls, failed ones included. */
  get loads(): number {
    return this.loadCount;
  }

  get unloads(): number {
    return this.unloadCount;
  }

  /** Number of `query` calls across all loaded models. */
  get calls(): number {
    return this.queries.length;
  }

  getQueries(): MockQueryRecord[] {
    return [...this.queries];
  }

  private async answer(request: InferenceRequest, callIndex: number): Promise<string> {
    const { signal } = request;
    if (signal.aborted) {
      throw signal.reason;
    }

    switch (this.scenario) {
      case 'hang':
        return new Promise<string>((_, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        });
      case 'crash':
        throw new Error(`Mock inference crash on call ${callIndex + 1}`);
      case 'flaky':
        if (callIndex < (this.config.failuresBeforeSuccess ?? 1)) {
          throw createError('ERROR_INFERENCE_TRANSPORT', `Mock transport failure on call ${callIndex + 1}`, {
            recoverability: 'recoverable',
            atRuntime: this.id,
          });
        }
        break;
      case 'slow':
        await systemClock.sleep(this.config.latencyMs ?? SLOW_LATENCY_MS, signal);
        return this.responseFor(request.prompt, callIndex);
      default:
        break;
    }

    if (this.config.latencyMs) {
      await systemClock.sleep(this.config.latencyMs, signal);
    }
    return this.responseFor(request.prompt, callIndex);
  }

  private responseFor(prompt: string, callIndex: number): string {
    const rule = this.config.rules?.find(({ match }) =>
      typeof match === 'string' ? prompt.includes(match) : match.test(prompt)
    );
    if (rule) {
      return rule.response;
    }

    const scripted = this.config.responses;
    if (scripted && scripted.length > 0) {
      return scripted[Math.min(callIndex, scripted.length - 1)] ?? DEFAULT_MOCK_RESPONSE;
    }

    return this.config.response ?? DEFAULT_MOCK_RESPONSE;
  }
}

export function createMockRuntime(config?: MockRuntimeConfig): MockRuntime {
  return new MockRuntime(config);
}
