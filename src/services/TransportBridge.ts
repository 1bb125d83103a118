/**
 * @fileoverview Single boundary between the orchestration layer and a PrinterTransport.
 *
 * Every transport call goes through here with its own timeout. A failed Result from
 * the transport is forwarded unchanged; a throw or a timeout is turned into a
 * failed Result once, with the code of the call that produced it:
 *
 * | call          | fault               | timeout            |
 * |---------------|---------------------|--------------------|
 * | connect       | CONNECTION_ERROR    | CONNECTION_TIMEOUT |
 * | disconnect    | DISCONNECT_FAILED   | CONNECTION_TIMEOUT |
 * | isConnected   | CONNECTION_ERROR    | STATUS_TIMEOUT     |
 * | getSetting    | STATUS_CHECK_FAILED | STATUS_TIMEOUT     |
 * | sendCommand   | WRITE_FAILURE       | COMMAND_TIMEOUT    |
 * | sendPayload   | WRITE_FAILURE       | PRINT_TIMEOUT      |
 */

import { buildGetCommand, encodeCommand, encodePayload, parseResponse } from '../protocol/sgd-codec';
import type { PrinterTransport, TransportTimeouts } from '../types/printer';
import { DEFAULT_TRANSPORT_TIMEOUTS } from '../types/printer';
import { ErrorCode, Result, fail, failFromUnknown, ok } from '../utils/error.utils';
import { isTimeoutError, withTimeout } from '../utils/timeout.utils';
import { logVerbose } from '../utils/logging';

interface BridgeCall {
  readonly operation: string;
  readonly timeoutMs: number;
  readonly faultCode: ErrorCode;
  readonly timeoutCode: ErrorCode;
}

/**
 * Run one transport call under a timeout and bridge any throw into a Result
 */
export async function callTransport<T>(call: () => Promise<Result<T>>, options: BridgeCall): Promise<Result<T>> {
  try {
    return await withTimeout(call(), {
      timeoutMs: options.timeoutMs,
      operation: options.operation,
      silent: true
    });
  } catch (error) {
    if (isTimeoutError(error)) {
      logVerbose('TransportBridge', `${options.operation} timed out after ${options.timeoutMs}ms`);
      return fail(options.timeoutCode, [options.timeoutMs / 1000], { cause: error });
    }
    return failFromUnknown(error, options.faultCode);
  }
}

export class TransportBridge {
  private readonly transport: PrinterTransport;
  private readonly timeouts: TransportTimeouts;

  constructor(transport: PrinterTransport, timeouts: Partial<TransportTimeouts> = {}) {
    this.transport = transport;
    this.timeouts = { ...DEFAULT_TRANSPORT_TIMEOUTS, ...timeouts };
  }

  public getTimeouts(): TransportTimeouts {
    return this.timeouts;
  }

  public connect(address: string): Promise<Result<void>> {
    return callTransport(() => this.transport.connect(address), {
      operation: `connect ${address}`,
      timeoutMs: this.timeouts.connectionMs,
      faultCode: ErrorCode.CONNECTION_ERROR,
      timeoutCode: ErrorCode.CONNECTION_TIMEOUT
    });
  }

  public disconnect(): Promise<Result<void>> {
    return callTransport(() => this.transport.disconnect(), {
      operation: 'disconnect',
      timeoutMs: this.timeouts.connectionMs,
      faultCode: ErrorCode.DISCONNECT_FAILED,
      timeoutCode: ErrorCode.CONNECTION_TIMEOUT
    });
  }

  public isConnected(): Promise<Result<boolean>> {
    return callTransport(() => this.transport.isConnected(), {
      operation: 'isConnected',
      timeoutMs: this.timeouts.statusQueryMs,
      faultCode: ErrorCode.CONNECTION_ERROR,
      timeoutCode: ErrorCode.STATUS_TIMEOUT
    });
  }

  /**
   * Read a setting and strip the response down to its value
   *
   * @returns the value, or null when the printer answered with nothing
   */
  public async getSetting(key: string): Promise<Result<string | null>> {
    logVerbose('TransportBridge', `query ${buildGetCommand(key).trim()}`);
    const result = await callTransport(() => this.transport.query(key), {
      operation: `query ${key}`,
      timeoutMs: this.timeouts.statusQueryMs,
      faultCode: ErrorCode.STATUS_CHECK_FAILED,
      timeoutCode: ErrorCode.STATUS_TIMEOUT
    });
    return result.success ? ok(parseResponse(result.data)) : result;
  }

  /**
   * Send a control command (setvar, do, or a raw control sequence)
   */
  public sendCommand(command: string): Promise<Result<void>> {
    return callTransport(() => this.transport.sendRaw(encodeCommand(command)), {
      operation: 'send command',
      timeoutMs: this.timeouts.statusQueryMs,
      faultCode: ErrorCode.WRITE_FAILURE,
      timeoutCode: ErrorCode.COMMAND_TIMEOUT
    });
  }

  public sendPayload(payload: string): Promise<Result<void>> {
    return callTransport(() => this.transport.sendRaw(encodePayload(payload)), {
      operation: 'send payload',
      timeoutMs: this.timeouts.printMs,
      faultCode: ErrorCode.WRITE_FAILURE,
      timeoutCode: ErrorCode.PRINT_TIMEOUT
    });
  }
}
