/**
 * OllamaRuntime: runs the local model file through an Ollama daemon.
 *
 * Loading pushes the file to the daemon as a blob (skipped when the daemon
 * already has that digest) and registers a model named after the digest, so
 * the weights used are always the ones at the configured path.
 * Inference is a non-streaming `/api/chat` call with the image attached and
 * temperature 0.
 */

import { createReadStream } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
  createError,
  errorMessage,
  type InferenceRequest,
  type LoadedModel,
  type ModelRuntime,
  type ResolvedModelFile,
  type RuntimeId,
  type SightcheckError,
} from '@sightcheck/core';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';
const MODEL_NAME_PREFIX = 'sightcheck';
const CONNECTION_TIMEOUT_MS = 5_000;

type FetchFn = typeof fetch;

export interface OllamaRuntimeConfig {
  /** @default 'http://localhost:11434' */
  baseUrl?: string;
  /** Name registered with the daemon. Defaults to `sightcheck-<digest prefix>`. */
  modelName?: string;
  /**
   * How long the daemon keeps the model in memory between calls.
   * @default '10m'
   */
  keepAlive?: string | number;
  /**
   * Set when the daemon runs with OLLAMA_NUM_PARALLEL > 1.
   * @default false
   */
  concurrent?: boolean;
  fetch?: FetchFn;
  verbose?: boolean;
}

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
});

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export class OllamaRuntime implements ModelRuntime {
  readonly id: RuntimeId = 'ollama';
  readonly supportsConcurrentInference: boolean;
  readonly baseUrl: string;

  private readonly config: OllamaRuntimeConfig;
  private readonly fetchFn: FetchFn;
  private readonly verbose: boolean;

  constructor(config: OllamaRuntimeConfig = {}) {
    this.config = config;
    this.baseUrl = (config.baseUrl ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
    this.supportsConcurrentInference = config.concurrent ?? false;
    this.fetchFn = config.fetch ?? fetch;
    this.verbose = config.verbose ?? false;
  }

  async load(file: ResolvedModelFile): Promise<LoadedModel> {
    const digest = `sha256:${file.sha256}`;
    const modelName = this.config.modelName ?? `${MODEL_NAME_PREFIX}-${file.sha256.slice(0, 12)}`;

    await this.ensureBlob(file, digest);

    const create = await this.send('/api/create', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: modelName,
        files: { [path.basename(file.modelPath)]: digest },
        stream: false,
      }),
    }, 'load');
    if (!create.ok) {
      throw await this.httpError(create, 'load', `register model ${modelName}`);
    }

    if (this.verbose) {
      console.log(`[OllamaRuntime] Model ${modelName} ready (${file.sizeBytes} bytes)`);
    }

    return {
      query: (request) => this.chat(modelName, request),
      unload: () => this.unload(modelName),
    };
  }

  private async ensureBlob(file: ResolvedModelFile, digest: string): Promise<void> {
    const blobPath = `/api/blobs/${digest}`;
    const head = await this.send(blobPath, { method: 'HEAD' }, 'load');
    if (head.ok) {
      if (this.verbose) {
        console.log(`[OllamaRuntime] Daemon already has ${digest.slice(0, 19)}`);
      }
      return;
    }

    if (this.verbose) {
      console.log(`[OllamaRuntime] Uploading ${file.modelPath} to ${this.baseUrl}`);
    }
    const upload = await this.send(blobPath, {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: createReadStream(file.modelPath),
      duplex: 'half',
    }, 'load');
    if (!upload.ok) {
      throw await this.httpError(upload, 'load', `upload ${file.modelPath}`);
    }
  }

  private async chat(modelName: string, request: InferenceRequest): Promise<string> {
    const response = await this.send('/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: modelName,
        messages: [
          {
            role: 'user',
            content: request.prompt,
            images: [Buffer.from(request.image).toString('base64')],
          },
        ],
        stream: false,
        keep_alive: this.config.keepAlive ?? '10m',
        options: { temperature: 0 },
      }),
      signal: request.signal,
    }, 'infer', request.signal);

    if (!response.ok) {
      throw await this.httpError(response, 'infer', 'chat');
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (request.signal.aborted) throw request.signal.reason;
      throw createError('ERROR_INFERENCE_MALFORMED_OUTPUT', `Ollama returned invalid JSON: ${errorMessage(err)}`, {
        cause: err,
        recoverability: 'recoverable',
        atRuntime: this.id,
      });
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw createError('ERROR_INFERENCE_MALFORMED_OUTPUT', 'Ollama chat response has no message content', {
        recoverability: 'recoverable',
        atRuntime: this.id,
      });
    }
    return parsed.data.message.content;
  }

  private async unload(modelName: string): Promise<void> {
    const response = await this.send('/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: modelName, keep_alive: 0 }),
    }, 'infer');
    if (!response.ok) {
      throw await this.httpError(response, 'infer', `unload ${modelName}`);
    }
    if (this.verbose) {
      console.log(`[OllamaRuntime] Unloaded ${modelName}`);
    }
  }

  private async send(
    route: string,
    init: RequestInit,
    stage: 'load' | 'infer',
    signal?: AbortSignal
  ): Promise<Response> {
    try {
      return await this.fetchFn(`${this.baseUrl}${route}`, init);
    } catch (err) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      const message = isAbortError(err)
        ? `Request to ${route} was aborted`
        : `Cannot reach Ollama at ${this.baseUrl}: ${errorMessage(err)}`;
      if (stage === 'load') {
        throw createError('ERROR_MODEL_LOAD_FAILED', message, {
          cause: err,
          atRuntime: this.id,
          userAction: "Ensure Ollama is running with 'ollama serve'",
        });
      }
      throw createError('ERROR_INFERENCE_TRANSPORT', message, {
        cause: err,
        recoverability: 'recoverable',
        atRuntime: this.id,
        userAction: "Ensure Ollama is running with 'ollama serve'",
      });
    }
  }

  private async httpError(response: Response, stage: 'load' | 'infer', action: string): Promise<SightcheckError> {
    const text = (await response.text()).trim();
    const message = `Ollama could not ${action} (${response.status})${text ? `: ${text}` : ''}`;

    if (stage === 'load') {
      return createError('ERROR_MODEL_LOAD_FAILED', message, {
        atRuntime: this.id,
        details: { status: response.status },
      });
    }

    const transient = response.status >= 500 || response.status === 429;
    return createError(transient ? 'ERROR_INFERENCE_TRANSPORT' : 'ERROR_INFERENCE_FAILED', message, {
      recoverability: transient ? 'recoverable' : 'non-recoverable',
      atRuntime: this.id,
      details: { status: response.status },
    });
  }
}

export function createOllamaRuntime(config?: OllamaRuntimeConfig): OllamaRuntime {
  return new OllamaRuntime(config);
}

/**
 * Test connection to the Ollama daemon.
 */
export async function testOllamaConnection(
  baseUrl: string = DEFAULT_OLLAMA_URL,
  fetchFn: FetchFn = fetch
): Promise<{ connected: boolean; error?: string }> {
  try {
    const response = await fetchFn(baseUrl, {
      method: 'GET',
      signal: AbortSignal.timeout(CONNECTION_TIMEOUT_MS),
    });
    if (response.ok) {
      return { connected: true };
    }
    return { connected: false, error: `Server returned status ${response.status}` };
  } catch (error) {
    if (isAbortError(error)) {
      return { connected: false, error: 'Connection timeout' };
    }
    return { connected: false, error: errorMessage(error) };
  }
}

/**
 * Names of the models the daemon knows about.
 */
export async function listOllamaModels(baseUrl: string = DEFAULT_OLLAMA_URL, fetchFn: FetchFn = fetch): Promise<string[]> {
  const response = await fetchFn(`${baseUrl.replace(/\/+$/, '')}/api/tags`, { method: 'GET' });
  if (!response.ok) {
    throw createError('ERROR_INFERENCE_TRANSPORT', `Failed to list Ollama models (${response.status})`, {
      recoverability: 'recoverable',
      atRuntime: 'ollama',
    });
  }
  const parsed = tagsResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw createError('ERROR_INFERENCE_MALFORMED_OUTPUT', 'Unexpected /api/tags response', { atRuntime: 'ollama' });
  }
  return parsed.data.models?.map((model) => model.name) ?? [];
}
