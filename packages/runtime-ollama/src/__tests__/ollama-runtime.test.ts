/**
 * OllamaRuntime tests against a stubbed fetch.
 */

import { ReadStream } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { InferenceRequest, ResolvedModelFile } from '@sightcheck/core';
import { createOllamaRuntime, listOllamaModels, testOllamaConnection } from '../ollama-runtime.js';

const BASE_URL = 'http://localhost:11434';
const SHA = '0123456789abcdef'.repeat(4);
const MODEL_NAME = 'sightcheck-0123456789ab';

type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function createFetch(routes: Record<string, Route>) {
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = urlOf(input);
    const key = `${init?.method ?? 'GET'} ${url.slice(BASE_URL.length)}`;
    if (init?.body instanceof ReadStream) {
      init.body.destroy();
    }
    const route = routes[key];
    if (!route) {
      return new Response(`no route for ${key}`, { status: 404 });
    }
    return route(init);
  });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function request(prompt: string, signal = new AbortController().signal): InferenceRequest {
  return { image: new Uint8Array([1, 2, 3]), prompt, signal };
}

const READY: Record<string, Route> = {
  [`HEAD /api/blobs/sha256:${SHA}`]: () => new Response(null, { status: 200 }),
  'POST /api/create': () => json({ status: 'success' }),
};

describe('OllamaRuntime', () => {
  let dir: string;
  let file: ResolvedModelFile;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'sightcheck-ollama-'));
    const modelPath = path.join(dir, 'vision.gguf');
    await writeFile(modelPath, 'weights');
    file = { sourcePath: modelPath, modelPath, compressed: false, sizeBytes: 7, sha256: SHA };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should upload a missing blob and register the model', async () => {
      const fetchFn = createFetch({
        [`POST /api/blobs/sha256:${SHA}`]: () => new Response(null, { status: 201 }),
        'POST /api/create': () => json({ status: 'success' }),
      });

      await createOllamaRuntime({ fetch: fetchFn }).load(file);

      expect(fetchFn.mock.calls.map(([input, init]) => `${init?.method} ${urlOf(input)}`)).toEqual([
        `HEAD ${BASE_URL}/api/blobs/sha256:${SHA}`,
        `POST ${BASE_URL}/api/blobs/sha256:${SHA}`,
        `POST ${BASE_URL}/api/create`,
      ]);
      expect(JSON.parse(String(fetchFn.mock.calls[2]?.[1]?.body))).toEqual({
        model: MODEL_NAME,
        files: { 'vision.gguf': `sha256:${SHA}` },
        stream: false,
      });
    });

    it('should skip the upload when the daemon has the blob', async () => {
      const fetchFn = createFetch(READY);

      await createOllamaRuntime({ fetch: fetchFn, baseUrl: `${BASE_URL}/` }).load(file);

      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('should report registration and connection failures as load errors', async () => {
      const rejecting = createFetch({
        [`HEAD /api/blobs/sha256:${SHA}`]: () => new Response(null, { status: 200 }),
        'POST /api/create': () => new Response('unsupported model format', { status: 500 }),
      });
      await expect(createOllamaRuntime({ fetch: rejecting }).load(file)).rejects.toMatchObject({
        code: 'ERROR_MODEL_LOAD_FAILED',
        message: `Ollama could not register model ${MODEL_NAME} (500): unsupported model format`,
      });

      const offline = vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      });
      await expect(createOllamaRuntime({ fetch: offline }).load(file)).rejects.toMatchObject({
        code: 'ERROR_MODEL_LOAD_FAILED',
        message: `Cannot reach Ollama at ${BASE_URL}: fetch failed`,
      });
    });
  });

  describe('query', () => {
    it('should send the prompt and image to /api/chat', async () => {
      const fetchFn = createFetch({ ...READY, 'POST /api/chat': () => json({ message: { role: 'assistant', content: 'No' } }) });
      const model = await createOllamaRuntime({ fetch: fetchFn }).load(file);

      await expect(model.query(request('Is there a visible error banner?'))).resolves.toBe('No');

      expect(JSON.parse(String(fetchFn.mock.calls[2]?.[1]?.body))).toEqual({
        model: MODEL_NAME,
        messages: [{ role: 'user', content: 'Is there a visible error banner?', images: ['AQID'] }],
        stream: false,
        keep_alive: '10m',
        options: { temperature: 0 },
      });
    });

    it('should classify HTTP failures', async () => {
      let status = 503;
      const fetchFn = createFetch({ ...READY, 'POST /api/chat': () => new Response('overloaded', { status }) });
      const model = await createOllamaRuntime({ fetch: fetchFn }).load(file);

      await expect(model.query(request('q'))).rejects.toMatchObject({
        code: 'ERROR_INFERENCE_TRANSPORT',
        recoverability: 'recoverable',
        message: 'Ollama could not chat (503): overloaded',
      });

      status = 400;
      await expect(model.query(request('q'))).rejects.toMatchObject({
        code: 'ERROR_INFERENCE_FAILED',
        recoverability: 'non-recoverable',
      });
    });

    it('should reject responses without message content', async () => {
      const fetchFn = createFetch({ ...READY, 'POST /api/chat': () => json({ done: true }) });
      const model = await createOllamaRuntime({ fetch: fetchFn }).load(file);

      await expect(model.query(request('q'))).rejects.toMatchObject({
        code: 'ERROR_INFERENCE_MALFORMED_OUTPUT',
        recoverability: 'recoverable',
      });
    });

    it('should report an unreachable daemon as a transport error', async () => {
      const fetchFn = createFetch({
        ...READY,
        'POST /api/chat': () => {
          throw new TypeError('fetch failed');
        },
      });
      const model = await createOllamaRuntime({ fetch: fetchFn }).load(file);

      await expect(model.query(request('q'))).rejects.toMatchObject({
        code: 'ERROR_INFERENCE_TRANSPORT',
        recoverability: 'recoverable',
      });
    });

    it('should rethrow the abort reason when the request is cancelled', async () => {
      const reason = new Error('deadline');
      const fetchFn = createFetch({
        ...READY,
        'POST /api/chat': (init) => {
          throw init?.signal?.reason;
        },
      });
      const model = await createOllamaRuntime({ fetch: fetchFn }).load(file);
      const abort = new AbortController();
      abort.abort(reason);

      await expect(model.query(request('q', abort.signal))).rejects.toBe(reason);
    });
  });

  describe('unload', () => {
    it('should ask the daemon to drop the model', async () => {
      const fetchFn = createFetch({ ...READY, 'POST /api/generate': () => json({ done: true }) });
      const model = await createOllamaRuntime({ fetch: fetchFn }).load(file);

      await model.unload();

      expect(JSON.parse(String(fetchFn.mock.calls[2]?.[1]?.body))).toEqual({ model: MODEL_NAME, keep_alive: 0 });
    });
  });
});

describe('testOllamaConnection', () => {
  it('should report the connection state', async () => {
    await expect(testOllamaConnection(BASE_URL, createFetch({ 'GET ': () => new Response('Ollama is running') }))).resolves.toEqual({
      connected: true,
    });
    await expect(
      testOllamaConnection(BASE_URL, createFetch({ 'GET ': () => new Response('', { status: 500 }) }))
    ).resolves.toEqual({ connected: false, error: 'Server returned status 500' });
  });

  it('should report timeouts', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw timeout;
    });

    await expect(testOllamaConnection(BASE_URL, fetchFn)).resolves.toEqual({ connected: false, error: 'Connection timeout' });
  });
});

describe('listOllamaModels', () => {
  it('should return model names', async () => {
    const fetchFn = createFetch({ 'GET /api/tags': () => json({ models: [{ name: 'llava:7b' }, { name: MODEL_NAME }] }) });

    await expect(listOllamaModels(BASE_URL, fetchFn)).resolves.toEqual(['llava:7b', MODEL_NAME]);
  });

  it('should throw when the daemon refuses', async () => {
    const fetchFn = createFetch({ 'GET /api/tags': () => new Response('', { status: 500 }) });

    await expect(listOllamaModels(BASE_URL, fetchFn)).rejects.toMatchObject({ code: 'ERROR_INFERENCE_TRANSPORT' });
  });
});
