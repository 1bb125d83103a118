/**
 * @fileoverview Tests for AutoCorrector corrections and language switching
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ControlCommands, SettingKeys } from '../protocol/sgd-codec';
import { AutoCorrectionPresets } from '../types/auto-correction';
import type { AutoCorrectionOptions } from '../types/auto-correction';
import { ReadinessPresets } from '../types/readiness';
import type { ReadinessOptions, ReadinessSnapshot } from '../types/readiness';
import { FakeTransport } from '../__tests__/fakes/FakeTransport';
import { AutoCorrector } from './AutoCorrector';
import { CorrectionLog } from './CorrectedReadiness';
import { PrinterReadiness } from './PrinterReadiness';
import { TransportBridge } from './TransportBridge';

describe('AutoCorrector', () => {
  let transport: FakeTransport;
  let bridge: TransportBridge;
  let log: CorrectionLog;

  const readSnapshot = (options: Partial<ReadinessOptions> = ReadinessPresets.smartOptimized): Promise<ReadinessSnapshot> =>
    new PrinterReadiness(bridge, options).readAllStatuses();

  const corrector = (options: Partial<AutoCorrectionOptions> = {}, address?: string): AutoCorrector =>
    new AutoCorrector(bridge, { attemptDelayMs: 0, ...options }, { address });

  beforeEach(() => {
    transport = new FakeTransport();
    transport.connected = true;
    bridge = new TransportBridge(transport);
    log = new CorrectionLog();
  });

  describe('correctReadiness', () => {
    it('should do nothing when every correction is disabled', async () => {
      transport.setSetting(SettingKeys.PAUSE, 'true');
      const snapshot = await readSnapshot();

      const result = await corrector(AutoCorrectionPresets.none).correctReadiness(snapshot, log);

      expect(result).toEqual({ success: true, data: false });
      expect(transport.sentCommands()).toEqual([]);
      expect(log.size).toBe(0);
    });

    it('should unpause a paused printer and confirm it', async () => {
      transport.setSetting(SettingKeys.PAUSE, 'true');
      const snapshot = await readSnapshot();

      const result = await corrector().correctReadiness(snapshot, log);

      expect(result).toEqual({ success: true, data: true });
      expect(transport.sentCommands()).toEqual([ControlCommands.UNPAUSE]);
      expect(log.records.map(entry => [entry.name, entry.success])).toEqual([['unpause', true]]);
    });

    it('should clear host errors', async () => {
      transport.setSetting(SettingKeys.HOST_STATUS, '100,1,0,0,0,0');
      const snapshot = await readSnapshot();

      await corrector().correctReadiness(snapshot, log);

      expect(transport.sentCommands()).toEqual([ControlCommands.CLEAR_ERRORS]);
      expect(log.records.map(entry => entry.name)).toEqual(['clearErrors']);
    });

    it('should reconnect to the known address when the connection is lost', async () => {
      transport.connected = false;
      const snapshot = await readSnapshot({ checkConnection: true });

      await corrector({}, '10.0.0.5').correctReadiness(snapshot, log);

      expect(transport.connectedAddress).toBe('10.0.0.5');
      expect(log.records.map(entry => [entry.name, entry.success])).toEqual([['reconnect', true]]);
    });

    it('should keep going after a correction fails', async () => {
      transport.setSetting(SettingKeys.PAUSE, 'true');
      transport.setSetting(SettingKeys.HOST_STATUS, '100,1,0,0,0,0');
      transport.ignoreSetvar = true;
      const snapshot = await readSnapshot();

      const result = await corrector({ maxAttempts: 1 }).correctReadiness(snapshot, log);

      expect(result).toEqual({ success: true, data: true });
      expect(log.records.map(entry => [entry.name, entry.success])).toEqual([
        ['unpause', false],
        ['clearErrors', true]
      ]);
      expect(log.records[0].error).toBe('Unpause printer failed - state did not change after 1 attempts');
    });

    it('should send nothing on a second pass once the printer is healthy', async () => {
      transport.setSetting(SettingKeys.PAUSE, 'true');
      transport.setSetting(SettingKeys.HOST_STATUS, '100,1,0,0,0,0');
      const subject = corrector();

      await subject.correctReadiness(await readSnapshot(), log);
      const sentAfterFirstPass = transport.sentCommands().length;
      const second = await subject.correctReadiness(await readSnapshot(), log);

      expect(second).toEqual({ success: true, data: false });
      expect(transport.sentCommands().length).toBe(sentAfterFirstPass);
    });

    it('should clear the buffer when enabled and the printer is not ready', async () => {
      transport.setSetting(SettingKeys.HEAD_LATCH, 'open');
      const snapshot = await readSnapshot();

      const result = await corrector({ enableBufferClear: true }).correctReadiness(snapshot, log);

      expect(result).toEqual({ success: true, data: true });
      expect(transport.sentCommands()).toEqual([ControlCommands.CLEAR_BUFFER]);
      expect(log.records.map(entry => [entry.name, entry.success])).toEqual([['clearBuffer', true]]);
    });

    it('should leave a healthy printer untouched with every print correction enabled', async () => {
      const subject = corrector(AutoCorrectionPresets.autoPrint);

      const first = await subject.correctReadiness(await readSnapshot(), log);
      const second = await subject.correctReadiness(await readSnapshot(), log);

      expect(first).toEqual({ success: true, data: false });
      expect(second).toEqual({ success: true, data: false });
      expect(transport.sentCommands()).toEqual([]);
      expect(log.size).toBe(0);
    });
  });

  describe('switchLanguageForData', () => {
    it('should not query when language switching is disabled', async () => {
      const result = await corrector().switchLanguageForData('^XA^XZ', log);

      expect(result).toBe(true);
      expect(transport.queryCount()).toBe(0);
    });

    it('should leave a matching language alone', async () => {
      const result = await corrector({ enableLanguageSwitch: true }).switchLanguageForData('^XA^FDok^FS^XZ', log);

      expect(result).toBe(true);
      expect(transport.sentCommands()).toEqual([]);
    });

    it('should skip a payload whose language cannot be detected', async () => {
      const result = await corrector({ enableLanguageSwitch: true }).switchLanguageForData('plain text', log);

      expect(result).toBe(true);
      expect(transport.queryCount()).toBe(0);
    });

    it('should switch a line-print printer to zpl for a zpl payload', async () => {
      transport.setSetting(SettingKeys.LANGUAGES, 'line_print');

      const result = await corrector({ enableLanguageSwitch: true }).switchLanguageForData('^XA^XZ', log);

      expect(result).toBe(true);
      expect(transport.sentCommands()).toEqual(['! U1 setvar "device.languages" "zpl"\r\n']);
      expect(log.records.map(entry => [entry.name, entry.success])).toEqual([['switchLanguage', true]]);
    });

    it('should switch to line_print for a cpcl payload', async () => {
      const result = await corrector({ enableLanguageSwitch: true })
        .switchLanguageForData('! 0 200 200 210 1\r\nPRINT\r\n', log);

      expect(result).toBe(true);
      expect(transport.settings.get(SettingKeys.LANGUAGES)).toBe('"line_print"');
    });

    it('should return false when the switch is never confirmed', async () => {
      transport.setSetting(SettingKeys.LANGUAGES, 'line_print');
      transport.ignoreSetvar = true;

      const result = await corrector({ enableLanguageSwitch: true, maxAttempts: 2 }).switchLanguageForData('^XA^XZ', log);

      expect(result).toBe(false);
      expect(log.records[0]).toMatchObject({
        name: 'switchLanguage',
        success: false,
        error: 'Switch language to zpl failed - state did not change after 2 attempts'
      });
    });
  });
});
