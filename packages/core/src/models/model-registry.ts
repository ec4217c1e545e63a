/**
 * ModelRegistry: owns loaded model instances, keyed by resolved model path.
 *
 * - At most one load per model id: concurrent acquires share the pending load
 * - Reference counting: models stay loaded while in use
 * - Optional idle unload once the last reference is released
 */

import type { RuntimeId } from '../types/common.js';
import type { LoadedModel, ResolvedModelFile } from '../types/runtime.js';

export type UnloadReason = 'idle' | 'manual';

export interface RegisteredModel {
  id: string;
  runtimeId: RuntimeId;
  file: ResolvedModelFile;
  instance: LoadedModel;
  refCount: number;
  loadedAtMs: number;
  lastUsedAtMs: number;
  idleTimer?: ReturnType<typeof setTimeout>;
}

export interface ModelRegistryConfig {
  /**
   * Idle time in ms before an unreferenced model is unloaded (0 = never).
   * @default 0
   */
  idleTimeoutMs?: number;

  /**
   * Callback when a model is unloaded.
   */
  onUnload?: (modelId: string, reason: UnloadReason) => void;

  verbose?: boolean;
}

export interface ModelLoadResult {
  file: ResolvedModelFile;
  instance: LoadedModel;
}

export interface ModelRegistry {
  /**
   * Acquire a model. If not loaded, calls the loader once.
   * Increments the reference count.
   */
  acquire(modelId: string, runtimeId: RuntimeId, loader: () => Promise<ModelLoadResult>): Promise<RegisteredModel>;

  /**
   * Release a model reference. When the count reaches 0 the idle timer starts.
   */
  release(modelId: string): void;

  /**
   * Mark a model as used (resets its idle clock).
   */
  touch(modelId: string): void;

  unload(modelId: string): Promise<void>;

  unloadAll(): Promise<void>;

  isLoaded(modelId: string): boolean;

  getModel(modelId: string): RegisteredModel | undefined;

  getLoadedModels(): Array<{ id: string; runtimeId: RuntimeId; refCount: number; sizeBytes: number }>;
}

/**
 * Create a ModelRegistry instance.
 */
export function createModelRegistry(config: ModelRegistryConfig = {}): ModelRegistry {
  const idleTimeoutMs = config.idleTimeoutMs ?? 0;
  const verbose = config.verbose ?? false;
  const models = new Map<string, RegisteredModel>();
  const pending = new Map<string, Promise<RegisteredModel>>();

  function clearIdleTimer(model: RegisteredModel): void {
    if (model.idleTimer) {
      clearTimeout(model.idleTimer);
      model.idleTimer = undefined;
    }
  }

  function startIdleTimer(model: RegisteredModel): void {
    if (idleTimeoutMs <= 0) return;

    clearIdleTimer(model);
    model.idleTimer = setTimeout(() => {
      const current = models.get(model.id);
      if (current && current.refCount === 0) {
        if (verbose) {
          console.log(`[ModelRegistry] Idle timeout: unloading ${model.id}`);
        }
        void unloadInternal(model.id, 'idle');
      }
    }, idleTimeoutMs);
    model.idleTimer.unref?.();
  }

  async function unloadInternal(modelId: string, reason: UnloadReason): Promise<void> {
    const model = models.get(modelId);
    if (!model) return;

    clearIdleTimer(model);
    models.delete(modelId);

    try {
      await model.instance.unload();
    } catch (err) {
      console.warn(`[ModelRegistry] Unload error for ${modelId}:`, err);
    }

    config.onUnload?.(modelId, reason);
    if (verbose) {
      console.log(`[ModelRegistry] Unloaded ${modelId} (reason: ${reason})`);
    }
  }

  async function load(
    modelId: string,
    runtimeId: RuntimeId,
    loader: () => Promise<ModelLoadResult>
  ): Promise<RegisteredModel> {
    if (verbose) {
      console.log(`[ModelRegistry] Loading ${modelId} (${runtimeId})`);
    }
    const { file, instance } = await loader();
    const now = Date.now();
    const model: RegisteredModel = {
      id: modelId,
      runtimeId,
      file,
      instance,
      refCount: 0,
      loadedAtMs: now,
      lastUsedAtMs: now,
    };
    models.set(modelId, model);
    if (verbose) {
      console.log(`[ModelRegistry] Loaded ${modelId} (${file.sizeBytes} bytes)`);
    }
    return model;
  }

  return {
    async acquire(modelId, runtimeId, loader): Promise<RegisteredModel> {
      const existing = models.get(modelId);
      if (existing) {
        existing.refCount++;
        existing.lastUsedAtMs = Date.now();
        clearIdleTimer(existing);
        if (verbose) {
          console.log(`[ModelRegistry] Reusing ${modelId} (refCount: ${existing.refCount})`);
        }
        return existing;
      }

      let loading = pending.get(modelId);
      if (!loading) {
        loading = load(modelId, runtimeId, loader);
        pending.set(modelId, loading);
      }

      try {
        const model = await loading;
        model.refCount++;
        clearIdleTimer(model);
        return model;
      } finally {
        pending.delete(modelId);
      }
    },

    release(modelId: string): void {
      const model = models.get(modelId);
      if (!model) return;

      model.refCount = Math.max(0, model.refCount - 1);
      if (verbose) {
        console.log(`[ModelRegistry] Released ${modelId} (refCount: ${model.refCount})`);
      }

      if (model.refCount === 0) {
        startIdleTimer(model);
      }
    },

    touch(modelId: string): void {
      const model = models.get(modelId);
      if (model) {
        model.lastUsedAtMs = Date.now();
      }
    },

    async unload(modelId: string): Promise<void> {
      await unloadInternal(modelId, 'manual');
    },

    async unloadAll(): Promise<void> {
      for (const id of Array.from(models.keys())) {
        await unloadInternal(id, 'manual');
      }
    },

    isLoaded(modelId: string): boolean {
      return models.has(modelId);
    },

    getModel(modelId: string): RegisteredModel | undefined {
      return models.get(modelId);
    },

    getLoadedModels() {
      return Array.from(models.values()).map((m) => ({
        id: m.id,
        runtimeId: m.runtimeId,
        refCount: m.refCount,
        sizeBytes: m.file.sizeBytes,
      }));
    },
  };
}
