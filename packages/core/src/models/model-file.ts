/**
 * Model file resolution.
 *
 * Accepts a plain model file or a `.gz` archive. Archives are gunzipped once
 * to a sibling file (the name without `.gz`); later runs reuse that file as
 * long as it is at least as new as the archive. Decompression is a setup
 * cost and never happens per inference.
 */

import { createReadStream, createWriteStream, type Stats } from 'node:fs';
import { rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import { createError, errorMessage } from '../types/errors.js';
import type { ResolvedModelFile } from '../types/runtime.js';
import { sha256File } from '../utils/hashing.js';

const GZIP_SUFFIX = '.gz';

const UNSUPPORTED_SUFFIXES = ['.tar.gz', '.tgz', '.zip', '.bz2', '.xz', '.zst', '.7z', '.tar', '.rar'];

export interface DecompressOptions {
  /** Decompress again even if an up-to-date output exists. */
  force?: boolean;
  verbose?: boolean;
}

export interface DecompressResult {
  outputPath: string;
  sizeBytes: number;
  /** True when an existing up-to-date output was reused. */
  reused: boolean;
  durationMs: number;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function statModel(filePath: string): Promise<Stats> {
  try {
    return await stat(filePath);
  } catch (err) {
    if (isMissing(err)) {
      throw createError('ERROR_MODEL_NOT_FOUND', `Model file not found: ${filePath}`, {
        cause: err,
        details: { path: filePath },
        userAction: 'Check the model path or download the model first',
      });
    }
    throw createError('ERROR_MODEL_LOAD_FAILED', `Cannot read model file ${filePath}: ${errorMessage(err)}`, {
      cause: err,
      details: { path: filePath },
    });
  }
}

export function isCompressedModelPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(GZIP_SUFFIX);
}

/**
 * Output path used when decompressing `archivePath`.
 */
export function decompressedPathFor(archivePath: string): string {
  return isCompressedModelPath(archivePath) ? archivePath.slice(0, -GZIP_SUFFIX.length) : archivePath;
}

/**
 * Gunzip a model archive next to itself.
 */
export async function decompressModel(archivePath: string, options: DecompressOptions = {}): Promise<DecompressResult> {
  const startTime = performance.now();
  const source = path.resolve(archivePath);

  if (!isCompressedModelPath(source)) {
    throw createError('ERROR_MODEL_FORMAT_UNSUPPORTED', `Not a .gz model archive: ${source}`, {
      details: { path: source },
    });
  }

  const archiveStat = await statModel(source);
  const outputPath = decompressedPathFor(source);

  if (!options.force) {
    try {
      const existing = await stat(outputPath);
      if (existing.size > 0 && existing.mtimeMs >= archiveStat.mtimeMs) {
        if (options.verbose) {
          console.log(`[ModelFile] Reusing decompressed model ${outputPath}`);
        }
        return {
          outputPath,
          sizeBytes: existing.size,
          reused: true,
          durationMs: performance.now() - startTime,
        };
      }
    } catch (err) {
      if (!isMissing(err)) throw err;
    }
  }

  if (options.verbose) {
    console.log(`[ModelFile] Decompressing ${source} (one-time setup cost)`);
  }

  const partialPath = `${outputPath}.partial-${process.pid}`;
  try {
    await pipeline(createReadStream(source), createGunzip(), createWriteStream(partialPath));
    await rename(partialPath, outputPath);
  } catch (err) {
    await rm(partialPath, { force: true });
    throw createError('ERROR_MODEL_CORRUPT', `Failed to decompress ${source}: ${errorMessage(err)}`, {
      cause: err,
      details: { path: source },
      userAction: 'Re-download the model archive',
    });
  }

  const outputStat = await stat(outputPath);
  const durationMs = performance.now() - startTime;
  if (options.verbose) {
    console.log(`[ModelFile] Decompressed ${outputStat.size} bytes in ${Math.round(durationMs)}ms`);
  }

  return { outputPath, sizeBytes: outputStat.size, reused: false, durationMs };
}

/**
 * Validate a model path and produce the uncompressed file a runtime loads.
 */
export async function resolveModelFile(
  requestedPath: string,
  options: Omit<DecompressOptions, 'force'> = {}
): Promise<ResolvedModelFile> {
  const sourcePath = path.resolve(requestedPath);
  const lower = sourcePath.toLowerCase();

  const unsupported = UNSUPPORTED_SUFFIXES.find((suffix) => lower.endsWith(suffix));
  if (unsupported) {
    throw createError(
      'ERROR_MODEL_FORMAT_UNSUPPORTED',
      `Unsupported model archive format "${unsupported}": ${sourcePath}`,
      {
        details: { path: sourcePath, suffix: unsupported },
        userAction: 'Extract the model file first, or provide a plain or .gz model file',
      }
    );
  }

  const sourceStat = await statModel(sourcePath);
  if (!sourceStat.isFile()) {
    throw createError('ERROR_MODEL_NOT_FOUND', `Model path is not a file: ${sourcePath}`, {
      details: { path: sourcePath },
    });
  }

  const compressed = isCompressedModelPath(sourcePath);
  const modelPath = compressed ? (await decompressModel(sourcePath, options)).outputPath : sourcePath;

  const modelStat = await statModel(modelPath);
  if (modelStat.size === 0) {
    throw createError('ERROR_MODEL_CORRUPT', `Model file is empty: ${modelPath}`, {
      details: { path: modelPath },
      userAction: 'Re-download the model',
    });
  }

  return {
    sourcePath,
    modelPath,
    compressed,
    sizeBytes: modelStat.size,
    sha256: await sha256File(modelPath),
  };
}
