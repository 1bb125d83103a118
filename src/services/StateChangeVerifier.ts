/**
 * @fileoverview Send-then-confirm helper for printer settings that change silently.
 *
 * The printer does not acknowledge setvar commands, so a change is confirmed by
 * reading the setting back. A state that is already correct is left alone.
 */

import { toBool } from '../protocol/status-parser';
import { ErrorCode, Result, fail, failWith, ok } from '../utils/error.utils';
import { sleep } from '../utils/timeout.utils';
import { logVerbose } from '../utils/logging';
import { TransportBridge } from './TransportBridge';

export interface VerifyOptions<T> {
  readonly operationName: string;
  readonly command: string;
  /** Read the current state; null when it cannot be read */
  readonly checkState: () => Promise<T | null>;
  readonly isStateValid: (state: T | null) => boolean;
  readonly checkDelayMs?: number;
  readonly maxAttempts?: number;
  /** Code reported when the state never becomes valid */
  readonly errorCode?: ErrorCode;
}

export class StateChangeVerifier {
  private readonly bridge: TransportBridge;

  constructor(bridge: TransportBridge) {
    this.bridge = bridge;
  }

  /**
   * Confirm the state, sending `command` and polling when it is not yet valid
   *
   * @returns the valid state, or a failure once `maxAttempts` polls have passed
   */
  public async executeAndVerify<T>(options: VerifyOptions<T>): Promise<Result<T | null>> {
    const { operationName, command, checkState, isStateValid } = options;
    const checkDelayMs = options.checkDelayMs ?? 200;
    const maxAttempts = options.maxAttempts ?? 3;

    const initialState = await checkState();
    if (isStateValid(initialState)) {
      logVerbose('StateChangeVerifier', `${operationName}: already in desired state`);
      return ok(initialState);
    }

    const sendResult = await this.bridge.sendCommand(command);
    if (!sendResult.success) {
      logVerbose('StateChangeVerifier', `${operationName}: failed to send command`);
      return failWith(sendResult.error);
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await sleep(checkDelayMs);
      const currentState = await checkState();
      if (isStateValid(currentState)) {
        logVerbose('StateChangeVerifier', `${operationName}: confirmed on poll ${attempt}/${maxAttempts}`);
        return ok(currentState);
      }
      logVerbose('StateChangeVerifier', `${operationName}: not yet valid (${String(currentState)})`);
    }

    return fail(options.errorCode ?? ErrorCode.OPERATION_TIMEOUT, undefined, {
      message: `${operationName} failed - state did not change after ${maxAttempts} attempts`
    });
  }

  /**
   * Drive a boolean setting such as `device.pause` to `desiredState`
   */
  public setBooleanState(options: {
    operationName: string;
    command: string;
    key: string;
    desiredState: boolean;
    checkDelayMs?: number;
    maxAttempts?: number;
  }): Promise<Result<boolean | null>> {
    return this.executeAndVerify<boolean>({
      operationName: options.operationName,
      command: options.command,
      checkState: async () => toBool(await this.readSetting(options.key)),
      isStateValid: state => state === options.desiredState,
      checkDelayMs: options.checkDelayMs,
      maxAttempts: options.maxAttempts
    });
  }

  /**
   * Drive a string setting such as `device.languages` until `validator` accepts it
   */
  public setStringState(options: {
    operationName: string;
    command: string;
    key: string;
    validator: (value: string | null) => boolean;
    checkDelayMs?: number;
    maxAttempts?: number;
    errorCode?: ErrorCode;
  }): Promise<Result<string | null>> {
    return this.executeAndVerify<string>({
      operationName: options.operationName,
      command: options.command,
      checkState: () => this.readSetting(options.key),
      isStateValid: options.validator,
      checkDelayMs: options.checkDelayMs,
      maxAttempts: options.maxAttempts,
      errorCode: options.errorCode
    });
  }

  /**
   * Send a command whose effect cannot be read back, then wait `delayMs`
   */
  public async executeWithDelay(operationName: string, command: string, delayMs = 500): Promise<Result<void>> {
    const sendResult = await this.bridge.sendCommand(command);
    if (!sendResult.success) {
      return failWith(sendResult.error);
    }
    await sleep(delayMs);
    logVerbose('StateChangeVerifier', `${operationName}: command sent and delay completed`);
    return ok(undefined);
  }

  private async readSetting(key: string): Promise<string | null> {
    const result = await this.bridge.getSetting(key);
    return result.success ? result.data : null;
  }
}
