/**
 * @fileoverview Tests for StateChangeVerifier send-and-confirm behaviour
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ControlCommands, SettingKeys, buildLanguageSwitchCommand } from '../protocol/sgd-codec';
import { ErrorCode } from '../utils/error.utils';
import { FakeTransport } from '../__tests__/fakes/FakeTransport';
import { StateChangeVerifier } from './StateChangeVerifier';
import { TransportBridge } from './TransportBridge';

describe('StateChangeVerifier', () => {
  let transport: FakeTransport;
  let verifier: StateChangeVerifier;

  const unpause = (maxAttempts = 3) => verifier.setBooleanState({
    operationName: 'Unpause',
    command: ControlCommands.UNPAUSE,
    key: SettingKeys.PAUSE,
    desiredState: false,
    checkDelayMs: 0,
    maxAttempts
  });

  beforeEach(() => {
    transport = new FakeTransport();
    transport.connected = true;
    verifier = new StateChangeVerifier(new TransportBridge(transport));
  });

  it('should not send anything when the state is already valid', async () => {
    const result = await unpause();

    expect(result).toEqual({ success: true, data: false });
    expect(transport.sentCommands()).toEqual([]);
  });

  it('should send the command and confirm the new state', async () => {
    transport.setSetting(SettingKeys.PAUSE, 'true');

    const result = await unpause();

    expect(result).toEqual({ success: true, data: false });
    expect(transport.sentCommands()).toEqual(['! U1 setvar "device.pause" "false"\r\n']);
    expect(transport.queryCount(SettingKeys.PAUSE)).toBe(2);
  });

  it('should fail after maxAttempts polls when the state never changes', async () => {
    transport.setSetting(SettingKeys.PAUSE, 'true');
    transport.ignoreSetvar = true;

    const result = await unpause(2);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.OPERATION_TIMEOUT);
      expect(result.error.message).toBe('Unpause failed - state did not change after 2 attempts');
    }
    expect(transport.queryCount(SettingKeys.PAUSE)).toBe(3);
  });

  it('should forward a send failure unchanged', async () => {
    transport.setSetting(SettingKeys.PAUSE, 'true');
    transport.connected = false;

    const result = await unpause();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.NOT_CONNECTED);
    }
    expect(transport.queryCount(SettingKeys.PAUSE)).toBe(1);
  });

  it('should report the given code when a string setting never validates', async () => {
    transport.setSetting(SettingKeys.LANGUAGES, 'line_print');
    transport.ignoreSetvar = true;

    const result = await verifier.setStringState({
      operationName: 'Switch language to zpl',
      command: buildLanguageSwitchCommand('zpl'),
      key: SettingKeys.LANGUAGES,
      validator: value => value === 'zpl',
      checkDelayMs: 0,
      maxAttempts: 1,
      errorCode: ErrorCode.LANGUAGE_MISMATCH
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.LANGUAGE_MISMATCH);
      expect(result.error.message).toBe('Switch language to zpl failed - state did not change after 1 attempts');
    }
  });

  it('should send and wait in executeWithDelay', async () => {
    const result = await verifier.executeWithDelay('Clear errors', ControlCommands.CLEAR_ERRORS, 0);

    expect(result.success).toBe(true);
    expect(transport.sentCommands()).toEqual(['~JA']);
  });
});
