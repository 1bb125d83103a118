/**
 * @fileoverview Tests for TransportBridge fault and timeout mapping
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ErrorCode, fail } from '../utils/error.utils';
import { FakeTransport } from '../__tests__/fakes/FakeTransport';
import { TransportBridge } from './TransportBridge';

describe('TransportBridge', () => {
  let transport: FakeTransport;
  let bridge: TransportBridge;

  beforeEach(() => {
    transport = new FakeTransport();
    bridge = new TransportBridge(transport, { statusQueryMs: 20 });
  });

  it('should merge partial timeouts with the defaults', () => {
    expect(bridge.getTimeouts()).toEqual({ connectionMs: 10000, printMs: 30000, statusQueryMs: 20 });
  });

  it('should strip quotes from setting values', async () => {
    const result = await bridge.getSetting('device.pause');
    expect(result).toEqual({ success: true, data: 'false' });
  });

  it('should return null for an empty response', async () => {
    transport.settings.set('media.status', '');
    const result = await bridge.getSetting('media.status');
    expect(result).toEqual({ success: true, data: null });
  });

  it('should forward a failed transport result unchanged', async () => {
    const refused = fail(ErrorCode.CONNECTION_ERROR);
    transport.connectResults.push(refused);

    const result = await bridge.connect('192.168.1.50');

    expect(result).toBe(refused);
  });

  it('should report a failure from the transport when not connected', async () => {
    const result = await bridge.sendCommand('~JA');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.NOT_CONNECTED);
      expect(result.error.message).toBe('No printer is currently connected');
    }
  });

  it('should map a throwing query to STATUS_CHECK_FAILED', async () => {
    transport.throwOnQuery = 'device.pause';

    const result = await bridge.getSetting('device.pause');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.STATUS_CHECK_FAILED);
      expect(result.error.message).toBe('Failed to check printer status: query device.pause exploded');
    }
  });

  it('should map a slow query to STATUS_TIMEOUT', async () => {
    transport.queryDelayMs = 60;

    const result = await bridge.getSetting('device.pause');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.STATUS_TIMEOUT);
      expect(result.error.message).toBe('Status check timed out after 0.02 seconds');
    }
  });

  it('should map a throwing payload write to WRITE_FAILURE', async () => {
    await bridge.connect('192.168.1.50');
    transport.onSend = () => {
      throw new Error('socket closed');
    };

    const result = await bridge.sendPayload('^XA^XZ');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.WRITE_FAILURE);
      expect(result.error.message).toBe('Failed to write data to printer: socket closed');
    }
  });

  it('should encode control commands and payloads before sending', async () => {
    await bridge.connect('192.168.1.50');

    await bridge.sendCommand('\x18');
    await bridge.sendPayload('^XA^FDhello^FS^XZ');

    expect(transport.sentCommands()).toEqual(['\x18', '^XA^FDhello^FS^XZ']);
  });
});
