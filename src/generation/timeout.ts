/**
 * Per-call timeout and cancellation for generation calls.
 *
 * @packageDocumentation
 */

import type { GenerationResult } from './types.js';
import { createCancelledError, createFailureResult, createTimeoutError } from './types.js';

/**
 * Runs a generation call with a deadline.
 *
 * The operation receives a signal that aborts on timeout or when the parent
 * signal aborts. A call that outlives its deadline resolves to a
 * `TimeoutError`; a cancelled one to a `CancelledError`.
 *
 * @param operation - The call to run.
 * @param timeoutMs - Deadline in milliseconds.
 * @param parent - Caller's cancellation signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<GenerationResult<T>>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<GenerationResult<T>> {
  if (parent?.aborted === true) {
    return createFailureResult(createCancelledError());
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<GenerationResult<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(
        createFailureResult(
          createTimeoutError(`Generation timed out after ${String(timeoutMs)}ms`, timeoutMs)
        )
      );
    }, timeoutMs);
  });

  const cancelled = new Promise<GenerationResult<T>>((resolve) => {
    if (parent === undefined) {
      return;
    }
    onParentAbort = (): void => {
      controller.abort();
      resolve(createFailureResult(createCancelledError()));
    };
    parent.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), deadline, cancelled]);
  } finally {
    clearTimeout(timer);
    if (parent !== undefined && onParentAbort !== undefined) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
