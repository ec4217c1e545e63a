/**
 * Error catalog for sightcheck.
 * Each error carries a stable code, its recoverability and user/dev actions.
 * `recoverable` means transient: the retry controller may try again.
 */

import type { Recoverability, RuntimeId } from './common.js';

export type SightcheckErrorCode =
  // Setup errors
  | 'ERROR_INVALID_CONFIG'
  | 'ERROR_INVALID_STATE'
  | 'ERROR_INVALID_QUERY'
  | 'ERROR_INVALID_SUITE'
  // Model load errors
  | 'ERROR_MODEL_NOT_FOUND'
  | 'ERROR_MODEL_CORRUPT'
  | 'ERROR_MODEL_FORMAT_UNSUPPORTED'
  | 'ERROR_MODEL_LOAD_FAILED'
  // Capture errors
  | 'ERROR_CAPTURE_FAILED'
  | 'ERROR_CAPTURE_TIMEOUT'
  // Inference errors
  | 'ERROR_INFERENCE_FAILED'
  | 'ERROR_INFERENCE_TRANSPORT'
  | 'ERROR_INFERENCE_MALFORMED_OUTPUT'
  | 'ERROR_INFERENCE_TIMEOUT'
  | 'ERROR_ABORTED'
  // Interpretation errors
  | 'ERROR_UNINTERPRETABLE_RESPONSE'
  | 'ERROR_LOW_CONFIDENCE'
  // Assertion outcome
  | 'ERROR_ASSERTION_FAILED'
  // Fallback
  | 'ERROR_UNKNOWN';

/**
 * Failure kind shown in reports, so that "the model said no" is never
 * confused with "the model crashed" or "the page did not render".
 */
export type ErrorKind =
  | 'assertion-mismatch'
  | 'uninterpretable'
  | 'low-confidence'
  | 'inference'
  | 'inference-timeout'
  | 'capture'
  | 'model-load'
  | 'setup'
  | 'aborted'
  | 'unknown';

const ERROR_KINDS: Record<SightcheckErrorCode, ErrorKind> = {
  ERROR_INVALID_CONFIG: 'setup',
  ERROR_INVALID_STATE: 'setup',
  ERROR_INVALID_QUERY: 'setup',
  ERROR_INVALID_SUITE: 'setup',
  ERROR_MODEL_NOT_FOUND: 'model-load',
  ERROR_MODEL_CORRUPT: 'model-load',
  ERROR_MODEL_FORMAT_UNSUPPORTED: 'model-load',
  ERROR_MODEL_LOAD_FAILED: 'model-load',
  ERROR_CAPTURE_FAILED: 'capture',
  ERROR_CAPTURE_TIMEOUT: 'capture',
  ERROR_INFERENCE_FAILED: 'inference',
  ERROR_INFERENCE_TRANSPORT: 'inference',
  ERROR_INFERENCE_MALFORMED_OUTPUT: 'inference',
  ERROR_INFERENCE_TIMEOUT: 'inference-timeout',
  ERROR_ABORTED: 'aborted',
  ERROR_UNINTERPRETABLE_RESPONSE: 'uninterpretable',
  ERROR_LOW_CONFIDENCE: 'low-confidence',
  ERROR_ASSERTION_FAILED: 'assertion-mismatch',
  ERROR_UNKNOWN: 'unknown',
};

export interface SightcheckErrorOptions {
  recoverability?: Recoverability;
  cause?: unknown;
  details?: Record<string, unknown>;
  userAction?: string;
  devAction?: string;
  atRuntime?: RuntimeId;
}

export class SightcheckError extends Error {
  readonly code: SightcheckErrorCode;
  readonly recoverability: Recoverability;
  readonly details?: Record<string, unknown>;
  readonly userAction?: string;
  readonly devAction?: string;
  readonly atRuntime?: RuntimeId;
  readonly timestampMs: number;

  constructor(code: SightcheckErrorCode, message: string, options: SightcheckErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SightcheckError';
    this.code = code;
    this.recoverability = options.recoverability ?? 'non-recoverable';
    this.details = options.details;
    this.userAction = options.userAction;
    this.devAction = options.devAction;
    this.atRuntime = options.atRuntime;
    this.timestampMs = Date.now();
  }

  get kind(): ErrorKind {
    return ERROR_KINDS[this.code];
  }
}

/**
 * Create a SightcheckError with consistent structure.
 */
export function createError(
  code: SightcheckErrorCode,
  message: string,
  options: SightcheckErrorOptions = {}
): SightcheckError {
  return new SightcheckError(code, message, options);
}

/**
 * Type guard for SightcheckError.
 */
export function isSightcheckError(error: unknown): error is SightcheckError {
  return error instanceof SightcheckError;
}

/**
 * Check if an error is transient (eligible for retry).
 */
export function isRecoverable(error: unknown): boolean {
  return isSightcheckError(error) && error.recoverability === 'recoverable';
}

export function errorKind(error: unknown): ErrorKind {
  return isSightcheckError(error) ? error.kind : 'unknown';
}

export function isModelLoadError(error: unknown): error is SightcheckError {
  return errorKind(error) === 'model-load';
}

export function isCaptureError(error: unknown): error is SightcheckError {
  return errorKind(error) === 'capture';
}

export function isInferenceError(error: unknown): error is SightcheckError {
  return errorKind(error) === 'inference';
}

export function isInferenceTimeoutError(error: unknown): error is SightcheckError {
  return errorKind(error) === 'inference-timeout';
}

export function isUninterpretableResponseError(error: unknown): error is SightcheckError {
  return errorKind(error) === 'uninterpretable';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
