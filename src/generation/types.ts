/**
 * Generation capability contract.
 *
 * Generation is an opaque function behind one interface, so backends can be
 * swapped without touching the engine. Expected failures are returned as
 * typed results, never thrown.
 *
 * @packageDocumentation
 */

import type { SchemaName } from './schemas.js';

/**
 * A single generation call.
 */
export interface GenerationRequest {
  /** Stage ID or verification check, e.g. `capability-model` or `verify:genericization`. */
  readonly task: string;
  /** Schema the output must conform to. */
  readonly schema: SchemaName;
  /** Task instruction. */
  readonly instruction: string;
  /** Assembled context. */
  readonly context: string;
  /** Corrective feedback from earlier attempts, oldest first. */
  readonly feedback: readonly string[];
  readonly signal?: AbortSignal;
}

export type GenerationErrorKind =
  | 'TimeoutError'
  | 'TransientError'
  | 'RateLimitError'
  | 'SchemaError'
  | 'BackendError'
  | 'CancelledError';

interface GenerationErrorBase {
  readonly kind: GenerationErrorKind;
  readonly message: string;
  readonly cause?: Error;
}

export interface TimeoutError extends GenerationErrorBase {
  readonly kind: 'TimeoutError';
  readonly timeoutMs: number;
  readonly retryable: true;
}

export interface TransientError extends GenerationErrorBase {
  readonly kind: 'TransientError';
  readonly retryable: true;
}

export interface RateLimitError extends GenerationErrorBase {
  readonly kind: 'RateLimitError';
  /** Milliseconds to wait before retrying. */
  readonly retryAfterMs?: number;
  readonly retryable: true;
}

/**
 * Output did not conform to the requested schema. Retried with the issues
 * as feedback; never patched into shape.
 */
export interface SchemaError extends GenerationErrorBase {
  readonly kind: 'SchemaError';
  readonly schema: string;
  readonly issues: readonly string[];
  /** Raw output, for escalation. */
  readonly raw: string;
  readonly retryable: true;
}

export interface BackendError extends GenerationErrorBase {
  readonly kind: 'BackendError';
  readonly exitCode?: number;
  readonly retryable: boolean;
}

export interface CancelledError extends GenerationErrorBase {
  readonly kind: 'CancelledError';
  readonly retryable: false;
}

export type GenerationError =
  | TimeoutError
  | TransientError
  | RateLimitError
  | SchemaError
  | BackendError
  | CancelledError;

export type GenerationResult<T> =
  | { readonly success: true; readonly data: T; readonly raw: string }
  | { readonly success: false; readonly error: GenerationError };

/**
 * A swappable generation backend. Returns parsed but unvalidated data.
 */
export interface GenerationBackend {
  readonly name: string;
  generate(request: GenerationRequest): Promise<GenerationResult<unknown>>;
}

export function createSuccessResult<T>(data: T, raw: string): GenerationResult<T> {
  return { success: true, data, raw };
}

export function createFailureResult<T>(error: GenerationError): GenerationResult<T> {
  return { success: false, error };
}

export function createTimeoutError(message: string, timeoutMs: number): TimeoutError {
  return { kind: 'TimeoutError', message, timeoutMs, retryable: true };
}

export function createTransientError(message: string, cause?: Error): TransientError {
  const base: TransientError = { kind: 'TransientError', message, retryable: true };
  return cause !== undefined ? { ...base, cause } : base;
}

export function createRateLimitError(message: string, retryAfterMs?: number): RateLimitError {
  const base: RateLimitError = { kind: 'RateLimitError', message, retryable: true };
  return retryAfterMs !== undefined ? { ...base, retryAfterMs } : base;
}

export function createSchemaError(
  schema: string,
  issues: readonly string[],
  raw: string
): SchemaError {
  return {
    kind: 'SchemaError',
    message: `Output does not match schema '${schema}': ${issues.join('; ')}`,
    schema,
    issues,
    raw,
    retryable: true,
  };
}

export function createBackendError(
  message: string,
  retryable: boolean,
  options?: { exitCode?: number; cause?: Error }
): BackendError {
  const base: BackendError = { kind: 'BackendError', message, retryable };
  const { exitCode, cause } = options ?? {};

  // Build conditionally for exactOptionalPropertyTypes
  if (exitCode !== undefined && cause !== undefined) {
    return { ...base, exitCode, cause };
  }
  if (exitCode !== undefined) {
    return { ...base, exitCode };
  }
  if (cause !== undefined) {
    return { ...base, cause };
  }
  return base;
}

export function createCancelledError(message = 'Generation cancelled'): CancelledError {
  return { kind: 'CancelledError', message, retryable: false };
}

export function isRetryableError(error: GenerationError): boolean {
  return error.retryable;
}

/**
 * Feedback line describing a failed attempt, appended to the next request.
 */
export function describeForFeedback(error: GenerationError): string {
  if (error.kind === 'SchemaError') {
    return `Previous output was rejected by schema '${error.schema}':\n${error.issues
      .map((issue) => `- ${issue}`)
      .join('\n')}`;
  }
  return `Previous attempt failed: ${error.message}`;
}
