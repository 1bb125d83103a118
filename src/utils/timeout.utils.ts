/**
 * @fileoverview Timeout and delay helpers for transport round-trips and backoff waits.
 *
 * Key exports:
 * - TimeoutError: raised when an operation exceeds its budget
 * - withTimeout(): promise wrapper with timeout enforcement
 * - sleep(): delay that can be cut short by an AbortSignal
 */

import { logWarning } from './logging';

export class TimeoutError extends Error {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Wrap a promise with timeout enforcement
 *
 * Races the promise against a timer and clears the timer whichever side wins.
 * A non-positive timeout rejects at once without waiting on the promise.
 *
 * @example
 * ```typescript
 * const status = await withTimeout(transport.query('device.pause'), {
 *   timeoutMs: 5000,
 *   operation: 'query device.pause'
 * });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: { timeoutMs: number; operation: string; silent?: boolean }
): Promise<T> {
  const { timeoutMs, operation, silent = false } = options;

  if (timeoutMs <= 0) {
    // Racing keeps a handler attached to the caller's promise.
    return Promise.race([promise, Promise.reject(new TimeoutError(operation, timeoutMs))]);
  }

  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      if (!silent) {
        logWarning('Timeout', `${operation} (${timeoutMs}ms)`);
      }
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}

/**
 * Resolve after `ms` milliseconds, or earlier when the signal aborts.
 * Resolves `true` when the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (ms <= 0) {
    return Promise.resolve(!signal?.aborted);
  }
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise(resolve => {
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve(false);
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
