/**
 * Bounded retry with exponential backoff and jitter for generation calls.
 *
 * Independent of verifier-driven corrective retries, which the workflow
 * engine counts separately.
 *
 * @packageDocumentation
 */

import type { GenerationError, GenerationResult } from './types.js';
import { isRetryableError } from './types.js';

export interface RetryConfig {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter factor in [0, 1]. */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.2,
} as const;

/**
 * Applies defaults and checks bounds.
 *
 * @throws Error if a value is out of range.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor = DEFAULT_RETRY_CONFIG.jitterFactor,
  } = config;

  if (maxRetries < 0 || !Number.isInteger(maxRetries)) {
    throw new Error(`maxRetries must be a non-negative integer, got: ${String(maxRetries)}`);
  }
  if (baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }
  if (maxDelayMs < baseDelayMs) {
    throw new Error(
      `maxDelayMs (${String(maxDelayMs)}) must be >= baseDelayMs (${String(baseDelayMs)})`
    );
  }
  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error(`jitterFactor must be between 0 and 1, got: ${String(jitterFactor)}`);
  }

  return { maxRetries, baseDelayMs, maxDelayMs, jitterFactor };
}

/**
 * Delay before retry `attempt` (0-indexed):
 * `min(maxDelayMs, baseDelayMs * 2^attempt) * (1 ± jitter)`.
 *
 * A rate-limit hint wins over the computed delay, capped at maxDelayMs.
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig,
  error?: GenerationError,
  random: () => number = Math.random
): number {
  if (error?.kind === 'RateLimitError' && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, config.maxDelayMs);
  }

  const cappedDelay = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
  const jitterMultiplier = 1 - config.jitterFactor + random() * 2 * config.jitterFactor;

  return Math.round(cappedDelay * jitterMultiplier);
}

export interface RetryAttemptInfo {
  /** 1-indexed attempt about to run. */
  attempt: number;
  totalAttempts: number;
  delayMs: number;
  previousError: GenerationError;
}

export interface WithRetryOptions {
  config?: Partial<RetryConfig>;
  /** Called before each retry. */
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * A generation result with the number of attempts it took.
 * `exhausted` is true when every attempt failed with a retryable error.
 */
export type RetryResult<T> = GenerationResult<T> & {
  readonly attempts: number;
  readonly exhausted: boolean;
};

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs an operation until it succeeds, fails with a non-retryable error, or
 * runs out of attempts.
 *
 * @param operation - Receives the 1-indexed attempt and the previous error.
 * @param options - Retry options.
 * @returns The final result; failures carry the last error.
 *
 * @example
 * ```typescript
 * const result = await withRetry(
 *   (attempt, previous) => backend.generate(withFeedback(request, previous)),
 *   { config: { maxRetries: 2 } }
 * );
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number, previousError: GenerationError | undefined) => Promise<GenerationResult<T>>,
  options: WithRetryOptions = {}
): Promise<RetryResult<T>> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const totalAttempts = config.maxRetries + 1;

  let lastError: GenerationError | undefined;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    if (lastError !== undefined) {
      const delayMs = calculateBackoffDelay(attempt - 2, config, lastError, random);
      options.onRetry?.({ attempt, totalAttempts, delayMs, previousError: lastError });
      await sleep(delayMs);
    }

    const result = await operation(attempt, lastError);
    if (result.success) {
      return { ...result, attempts: attempt, exhausted: false };
    }
    if (!isRetryableError(result.error)) {
      return { ...result, attempts: attempt, exhausted: false };
    }
    lastError = result.error;
  }

  if (lastError === undefined) {
    // totalAttempts is at least 1, so a failure was recorded
    throw new Error('Unexpected state: no result after retries');
  }
  return { success: false, error: lastError, attempts: totalAttempts, exhausted: true };
}
