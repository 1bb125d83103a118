/**
 * @fileoverview Wall-clock bound for a single operation, and the retry/timeout pairing.
 *
 * TimeoutPolicy bounds one call. PolicyWrapper runs each retry attempt under the
 * timeout, so the attempt budget and the per-attempt duration stay independent.
 */

import { ErrorCode, Result, fail, failFromUnknown, ok } from './error.utils';
import { TimeoutError, isTimeoutError, withTimeout } from './timeout.utils';
import { RetryPolicy, RetryResult } from './RetryPolicy';

export class TimeoutPolicy {
  constructor(
    public readonly timeoutMs: number,
    public readonly operationName: string = 'operation'
  ) {}

  /**
   * Run `operation`, rejecting with TimeoutError when it overruns. A non-positive
   * timeout rejects without starting the operation.
   */
  public async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) {
      throw new TimeoutError(this.operationName, this.timeoutMs);
    }
    return withTimeout(operation(), { timeoutMs: this.timeoutMs, operation: this.operationName });
  }

  public async executeWithResult<T>(operation: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await this.execute(operation));
    } catch (error) {
      if (isTimeoutError(error)) {
        return fail(ErrorCode.OPERATION_TIMEOUT, [error.timeoutMs / 1000], { cause: error });
      }
      return failFromUnknown(error, ErrorCode.OPERATION_ERROR);
    }
  }
}

/**
 * Retry with a timeout applied to every attempt
 */
export class PolicyWrapper {
  constructor(
    public readonly retry: RetryPolicy,
    public readonly timeout: TimeoutPolicy
  ) {}

  public async execute<T>(operation: (attempt: number) => Promise<T>): Promise<RetryResult<T>> {
    return this.retry.execute(
      attempt => this.timeout.execute(() => operation(attempt)),
      this.timeout.operationName
    );
  }

  public async executeWithResult<T>(operation: (attempt: number) => Promise<Result<T>>): Promise<RetryResult<T>> {
    return this.retry.executeWithResult(
      attempt => this.timeout.execute(() => operation(attempt)),
      this.timeout.operationName
    );
  }
}
