/**
 * Model runtime interface: Ports & Adapters.
 * A runtime turns a local model file into something that answers
 * (image, prompt) pairs. Weights, tokenizer and decoding stay behind it.
 */

import type { RuntimeId } from './common.js';

export interface ResolvedModelFile {
  /** Path the caller asked for (possibly a `.gz` archive). */
  sourcePath: string;
  /** Uncompressed file handed to the runtime. */
  modelPath: string;
  compressed: boolean;
  sizeBytes: number;
  /** SHA-256 hex digest of the uncompressed model file. */
  sha256: string;
}

export interface InferenceRequest {
  image: Uint8Array;
  prompt: string;
  signal: AbortSignal;
}

export interface LoadedModel {
  /**
   * Run one inference. Implementations should stop work when `signal`
   * aborts and report transport failures as ERROR_INFERENCE_TRANSPORT.
   */
  query(request: InferenceRequest): Promise<string>;

  unload(): Promise<void>;
}

export interface ModelRuntime {
  readonly id: RuntimeId;
  /** When false the session serialises inference per handle. */
  readonly supportsConcurrentInference: boolean;

  load(file: ResolvedModelFile): Promise<LoadedModel>;
}
