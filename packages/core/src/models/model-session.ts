/**
 * Model Session: loads a model file once and runs inference against it.
 *
 * The session is explicit state: create one per test process, pass the
 * handle it returns to evaluators, and tear it down at the end.
 *
 * - `initialize(path)` resolves/decompresses the file and loads it through
 *   the runtime; the same path always yields the same handle
 * - `infer(handle, image, prompt)` enforces a deadline and honours a caller
 *   AbortSignal; a timed-out call leaves the handle usable
 * - runtimes without concurrent inference are serialised per handle
 */

import path from 'node:path';
import type { RuntimeId } from '../types/common.js';
import { createError, errorMessage, isSightcheckError, SightcheckError } from '../types/errors.js';
import type { LoadedModel, ModelRuntime } from '../types/runtime.js';
import { Mutex } from '../utils/mutex.js';
import { resolveModelFile } from './model-file.js';
import { createModelRegistry, type ModelRegistry, type RegisteredModel } from './model-registry.js';

export interface ModelHandle {
  readonly id: string;
  /** Path passed to `initialize`. */
  readonly path: string;
  /** Uncompressed file the runtime loaded. */
  readonly resolvedPath: string;
  /** `<runtime>:<sha256 prefix>`; part of every cache key. */
  readonly versionTag: string;
  readonly runtimeId: RuntimeId;
  readonly loadedAtMs: number;
}

export interface ModelSessionConfig {
  runtime: ModelRuntime;
  /**
   * Deadline for one inference call.
   * @default 30000
   */
  defaultTimeoutMs?: number;
  /**
   * Unload a released model after this idle time (0 = keep until teardown).
   * @default 0
   */
  idleTimeoutMs?: number;
  verbose?: boolean;
}

export interface InferOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ModelSessionDiagnostics {
  runtimeId: RuntimeId;
  loadedModels: Array<{ id: string; refCount: number; sizeBytes: number }>;
  inferences: number;
  failures: number;
  timeouts: number;
  lastLatencyMs?: number;
}

interface HandleState {
  handle: ModelHandle;
  mutex: Mutex;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const VERSION_TAG_DIGEST_LENGTH = 16;

export class ModelSession {
  readonly runtime: ModelRuntime;
  private readonly defaultTimeoutMs: number;
  private readonly verbose: boolean;
  private readonly registry: ModelRegistry;
  private readonly handles = new Map<string, HandleState>();
  private inferences = 0;
  private failures = 0;
  private timeouts = 0;
  private lastLatencyMs?: number;

  constructor(config: ModelSessionConfig) {
    this.runtime = config.runtime;
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.verbose = config.verbose ?? false;
    this.registry = createModelRegistry({
      idleTimeoutMs: config.idleTimeoutMs,
      verbose: this.verbose,
      onUnload: (modelId) => {
        this.handles.delete(modelId);
      },
    });
  }

  /**
   * Load the model at `modelPath`, or return the existing handle for it.
   * Throws a model-load error (ERROR_MODEL_*) when the file is missing,
   * corrupt, unsupported or rejected by the runtime.
   */
  async initialize(modelPath: string): Promise<ModelHandle> {
    const modelId = path.resolve(modelPath);

    const model = await this.registry.acquire(modelId, this.runtime.id, async () => {
      const file = await resolveModelFile(modelPath, { verbose: this.verbose });
      const instance = await this.loadWithRuntime(file.modelPath, () => this.runtime.load(file));
      return { file, instance };
    });

    const existing = this.handles.get(modelId);
    if (existing) {
      return existing.handle;
    }

    const handle = this.createHandle(modelPath, model);
    this.handles.set(modelId, { handle, mutex: new Mutex() });
    if (this.verbose) {
      console.log(`[ModelSession] Ready ${handle.versionTag} from ${handle.resolvedPath}`);
    }
    return handle;
  }

  /**
   * Run one inference and return the model's raw text.
   * Throws ERROR_INFERENCE_TIMEOUT past the deadline, ERROR_ABORTED when the
   * caller aborts, and inference errors reported by the runtime.
   */
  async infer(handle: ModelHandle, image: Uint8Array, prompt: string, options: InferOptions = {}): Promise<string> {
    const state = this.requireHandle(handle);
    const model = this.requireModel(handle);

    if (options.signal?.aborted) {
      throw createError('ERROR_ABORTED', 'Inference aborted before it started', { atRuntime: this.runtime.id });
    }
    const guard = this.runtime.supportsConcurrentInference ? undefined : await this.acquire(state, options.signal);
    try {
      this.registry.touch(handle.id);
      return await this.runWithDeadline(model.instance, image, prompt, options);
    } finally {
      guard?.dispose();
    }
  }

  /**
   * Drop one reference to the handle's model.
   */
  release(handle: ModelHandle): void {
    if (this.handles.get(handle.id)?.handle !== handle) return;
    this.registry.release(handle.id);
  }

  /**
   * Unload every model and invalidate all handles.
   */
  async teardown(): Promise<void> {
    await this.registry.unloadAll();
    this.handles.clear();
    if (this.verbose) {
      console.log('[ModelSession] Teardown complete');
    }
  }

  isActive(handle: ModelHandle): boolean {
    return this.handles.get(handle.id)?.handle === handle && this.registry.isLoaded(handle.id);
  }

  getDiagnostics(): ModelSessionDiagnostics {
    return {
      runtimeId: this.runtime.id,
      loadedModels: this.registry.getLoadedModels().map(({ id, refCount, sizeBytes }) => ({ id, refCount, sizeBytes })),
      inferences: this.inferences,
      failures: this.failures,
      timeouts: this.timeouts,
      lastLatencyMs: this.lastLatencyMs,
    };
  }

  private async acquire(state: HandleState, signal?: AbortSignal): Promise<InstanceType<typeof Mutex.Guard>> {
    try {
      return await state.mutex.acquire(signal);
    } catch (err) {
      throw createError('ERROR_ABORTED', 'Inference aborted while waiting for the model', {
        cause: err,
        atRuntime: this.runtime.id,
      });
    }
  }

  private createHandle(requestedPath: string, model: RegisteredModel): ModelHandle {
    return Object.freeze({
      id: model.id,
      path: requestedPath,
      resolvedPath: model.file.modelPath,
      versionTag: `${this.runtime.id}:${model.file.sha256.slice(0, VERSION_TAG_DIGEST_LENGTH)}`,
      runtimeId: this.runtime.id,
      loadedAtMs: model.loadedAtMs,
    });
  }

  private async loadWithRuntime(modelPath: string, load: () => Promise<LoadedModel>): Promise<LoadedModel> {
    try {
      return await load();
    } catch (err) {
      if (isSightcheckError(err) && err.kind === 'model-load') {
        throw err;
      }
      throw createError('ERROR_MODEL_LOAD_FAILED', `Runtime ${this.runtime.id} failed to load ${modelPath}: ${errorMessage(err)}`, {
        cause: err,
        atRuntime: this.runtime.id,
        details: { path: modelPath },
        devAction: 'Check that the runtime supports this model format',
      });
    }
  }

  private requireHandle(handle: ModelHandle): HandleState {
    const state = this.handles.get(handle.id);
    if (!state || state.handle !== handle) {
      throw createError('ERROR_INVALID_STATE', `Model handle ${handle.versionTag} is not active in this session`, {
        devAction: 'Call initialize() again after teardown() or idle unload',
      });
    }
    return state;
  }

  private requireModel(handle: ModelHandle): RegisteredModel {
    const model = this.registry.getModel(handle.id);
    if (!model) {
      this.handles.delete(handle.id);
      throw createError('ERROR_INVALID_STATE', `Model ${handle.versionTag} has been unloaded`, {
        devAction: 'Call initialize() again before inference',
      });
    }
    return model;
  }

  private async runWithDeadline(
    model: LoadedModel,
    image: Uint8Array,
    prompt: string,
    options: InferOptions
  ): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const callerSignal = options.signal;

    if (callerSignal?.aborted) {
      throw createError('ERROR_ABORTED', 'Inference aborted before it started', { atRuntime: this.runtime.id });
    }

    const controller = new AbortController();
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    const onCallerAbort = (): void => {
      controller.abort(createError('ERROR_ABORTED', 'Inference aborted by caller', { atRuntime: this.runtime.id }));
    };
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const timer = setTimeout(() => {
      controller.abort(
        createError('ERROR_INFERENCE_TIMEOUT', `Inference exceeded ${timeoutMs}ms`, {
          recoverability: 'recoverable',
          atRuntime: this.runtime.id,
          details: { timeoutMs },
          userAction: 'Increase the inference timeout or check that the model backend is responsive',
        })
      );
    }, timeoutMs);

    const startTime = performance.now();
    this.inferences++;
    const run = model.query({ image, prompt, signal: controller.signal });

    try {
      const text = await Promise.race([run, cancelled]);
      if (typeof text !== 'string') {
        throw createError('ERROR_INFERENCE_MALFORMED_OUTPUT', `Runtime returned ${typeof text} instead of text`, {
          recoverability: 'recoverable',
          atRuntime: this.runtime.id,
        });
      }
      this.lastLatencyMs = performance.now() - startTime;
      if (this.verbose) {
        console.log(`[ModelSession] Inference completed in ${Math.round(this.lastLatencyMs)}ms`);
      }
      return text;
    } catch (err) {
      this.failures++;
      if (controller.signal.aborted) {
        run.then(undefined, (lateError: unknown) => {
          if (this.verbose) {
            console.log(`[ModelSession] Cancelled inference settled late: ${errorMessage(lateError)}`);
          }
        });
        const reason: unknown = controller.signal.reason;
        if (reason instanceof SightcheckError) {
          if (reason.code === 'ERROR_INFERENCE_TIMEOUT') this.timeouts++;
          throw reason;
        }
      }
      throw this.normalizeInferenceError(err);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private normalizeInferenceError(err: unknown): SightcheckError {
    if (isSightcheckError(err)) {
      return err;
    }
    return createError('ERROR_INFERENCE_FAILED', `Inference failed: ${errorMessage(err)}`, {
      cause: err,
      atRuntime: this.runtime.id,
    });
  }
}

/**
 * Create a ModelSession instance.
 */
export function createModelSession(config: ModelSessionConfig): ModelSession {
  return new ModelSession(config);
}
