/**
 * @fileoverview Bounded retry executor with geometric backoff.
 *
 * An operation runs up to `maxAttempts` times. After each failure the policy decides
 * whether to go again:
 * - a timeout retries when `retryOnTimeout` is set
 * - a failure whose name or code is listed in `retryOnErrorTypes` always retries
 * - any other failure retries when `retryOnException` is set
 *
 * The wait before attempt n+1 is `delayMs * backoffMultiplier^(n-1)`, capped at
 * `maxDelayMs`. Without `delayMs` the next attempt starts at once.
 */

import {
  ErrorCode,
  ErrorInfo,
  Result,
  ResultFailure,
  fail,
  failFromUnknown,
  isAppError,
  ok
} from './error.utils';
import { isTimeoutError, sleep } from './timeout.utils';
import { logVerbose } from './logging';

// ============================================================================
// TYPES
// ============================================================================

export interface RetryPolicyConfig {
  readonly maxAttempts: number;
  readonly delayMs?: number;
  readonly backoffMultiplier?: number;
  readonly maxDelayMs?: number;
  readonly retryOnTimeout?: boolean;
  readonly retryOnException?: boolean;
  /**
   * Error names (`TimeoutError`, `TypeError`) or error codes (`CONNECTION_LOST`)
   * that are always retried
   */
  readonly retryOnErrorTypes?: ReadonlyArray<string>;
}

export interface RetryStats {
  readonly attempts: number;
  readonly totalDurationMs: number;
}

export type RetryResult<T> = Result<T> & RetryStats;

/**
 * Operation receiving its 1-based attempt number
 */
export type RetryableOperation<T> = (attempt: number) => Promise<T>;

const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  ErrorCode.OPERATION_TIMEOUT,
  ErrorCode.CONNECTION_TIMEOUT,
  ErrorCode.PRINT_TIMEOUT,
  ErrorCode.STATUS_TIMEOUT,
  ErrorCode.COMMAND_TIMEOUT,
  ErrorCode.DISCOVERY_TIMEOUT
]);

// ============================================================================
// RETRY POLICY
// ============================================================================

export class RetryPolicy {
  public readonly maxAttempts: number;
  public readonly delayMs: number | undefined;
  public readonly backoffMultiplier: number;
  public readonly maxDelayMs: number | undefined;
  public readonly retryOnTimeout: boolean;
  public readonly retryOnException: boolean;
  public readonly retryOnErrorTypes: ReadonlyArray<string>;

  constructor(config: RetryPolicyConfig) {
    this.maxAttempts = Math.max(0, Math.floor(config.maxAttempts));
    this.delayMs = config.delayMs;
    this.backoffMultiplier = config.backoffMultiplier ?? 2;
    this.maxDelayMs = config.maxDelayMs;
    this.retryOnTimeout = config.retryOnTimeout ?? true;
    this.retryOnException = config.retryOnException ?? true;
    this.retryOnErrorTypes = config.retryOnErrorTypes ?? [];
  }

  public static of(maxAttempts: number): RetryPolicy {
    return new RetryPolicy({ maxAttempts });
  }

  public static ofWithDelay(maxAttempts: number, delayMs: number): RetryPolicy {
    return new RetryPolicy({ maxAttempts, delayMs, backoffMultiplier: 1 });
  }

  public static ofWithBackoff(
    maxAttempts: number,
    delayMs: number,
    options: { multiplier?: number; maxDelayMs?: number } = {}
  ): RetryPolicy {
    return new RetryPolicy({
      maxAttempts,
      delayMs,
      backoffMultiplier: options.multiplier ?? 2,
      maxDelayMs: options.maxDelayMs
    });
  }

  /**
   * Retry only the listed error types; everything else fails on the first attempt
   */
  public static ofWithErrorTypes(maxAttempts: number, errorTypes: ReadonlyArray<string>): RetryPolicy {
    return new RetryPolicy({
      maxAttempts,
      retryOnTimeout: false,
      retryOnException: false,
      retryOnErrorTypes: errorTypes
    });
  }

  /**
   * Delay to wait after the given failed attempt (1-based)
   */
  public calculateDelay(attempt: number): number {
    if (this.delayMs === undefined || this.delayMs <= 0) {
      return 0;
    }
    const exponent = Math.max(0, attempt - 1);
    const delay = this.delayMs * Math.pow(this.backoffMultiplier, exponent);
    return this.maxDelayMs !== undefined ? Math.min(delay, this.maxDelayMs) : delay;
  }

  /**
   * Whether a thrown value should be retried
   */
  public shouldRetry(error: unknown): boolean {
    if (isTimeoutError(error)) {
      return this.retryOnTimeout;
    }
    if (this.isListed(error)) {
      return true;
    }
    return this.retryOnException;
  }

  /**
   * Whether a failed Result should be retried
   */
  public shouldRetryFailure(error: ErrorInfo): boolean {
    if (TIMEOUT_CODES.has(error.code)) {
      return this.retryOnTimeout;
    }
    if (this.retryOnErrorTypes.includes(error.code)) {
      return true;
    }
    return this.retryOnException;
  }

  /**
   * Run a throwing operation. Never throws; the last failure is reported.
   */
  public async execute<T>(operation: RetryableOperation<T>, name = 'operation'): Promise<RetryResult<T>> {
    return this.run(async attempt => {
      try {
        return { outcome: ok(await operation(attempt)) };
      } catch (error) {
        return {
          outcome: this.failureFor(error),
          retry: this.shouldRetry(error)
        };
      }
    }, name);
  }

  /**
   * Run an operation that reports failure through its Result. After exhaustion the
   * last failed Result is returned unchanged.
   */
  public async executeWithResult<T>(operation: RetryableOperation<Result<T>>, name = 'operation'): Promise<RetryResult<T>> {
    return this.run(async attempt => {
      try {
        const outcome = await operation(attempt);
        return outcome.success
          ? { outcome }
          : { outcome, retry: this.shouldRetryFailure(outcome.error) };
      } catch (error) {
        return {
          outcome: this.failureFor(error),
          retry: this.shouldRetry(error)
        };
      }
    }, name);
  }

  private async run<T>(
    attemptOnce: (attempt: number) => Promise<{ outcome: Result<T>; retry?: boolean }>,
    name: string
  ): Promise<RetryResult<T>> {
    const startedAt = Date.now();

    if (this.maxAttempts === 0) {
      return { ...fail(ErrorCode.RETRY_LIMIT_EXCEEDED, [0]), attempts: 0, totalDurationMs: 0 };
    }

    let attempt = 0;
    for (;;) {
      attempt++;
      const { outcome, retry = false } = await attemptOnce(attempt);
      if (outcome.success) {
        return { ...outcome, attempts: attempt, totalDurationMs: Date.now() - startedAt };
      }

      if (!retry || attempt >= this.maxAttempts) {
        logVerbose('RetryPolicy', `${name} failed after ${attempt} attempt(s): ${outcome.error.message}`);
        return { ...outcome, attempts: attempt, totalDurationMs: Date.now() - startedAt };
      }

      const delay = this.calculateDelay(attempt);
      logVerbose('RetryPolicy', `${name} attempt ${attempt}/${this.maxAttempts} failed, retrying in ${delay}ms`);
      await sleep(delay);
    }
  }

  private isListed(error: unknown): boolean {
    if (this.retryOnErrorTypes.length === 0) {
      return false;
    }
    if (isAppError(error) && this.retryOnErrorTypes.includes(error.code)) {
      return true;
    }
    return error instanceof Error && this.retryOnErrorTypes.includes(error.name);
  }

  private failureFor(error: unknown): ResultFailure {
    if (isTimeoutError(error)) {
      return fail(ErrorCode.OPERATION_TIMEOUT, [error.timeoutMs / 1000], { cause: error });
    }
    return failFromUnknown(error, ErrorCode.OPERATION_ERROR);
  }
}
