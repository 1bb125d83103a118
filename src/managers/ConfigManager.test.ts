/**
 * @fileoverview Tests for ConfigManager
 * Tests defaults, validated updates, file and environment layers, and event emission
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EventEmitter } from 'events';
import type { ConfigUpdateEvent } from '../types/config';
import { DEFAULT_CONFIG } from '../types/config';
import { ErrorCode } from '../utils/error.utils';
import { isVerboseLoggingEnabled } from '../utils/logging';
import { ConfigManager, getConfigManager, toEnvironmentName } from './ConfigManager';

describe('ConfigManager', () => {
  let configManager: ConfigManager;
  let tempDir: string;

  beforeEach(() => {
    configManager = new ConfigManager();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'labelwright-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfigFile(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  describe('Process default', () => {
    it('should return the same instance from getConfigManager', () => {
      expect(getConfigManager()).toBe(getConfigManager());
    });

    it('should extend EventEmitter', () => {
      expect(configManager).toBeInstanceOf(EventEmitter);
    });
  });

  describe('Configuration Getters', () => {
    it('should start from the defaults', () => {
      expect(configManager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should get single configuration value', () => {
      expect(configManager.get('StatusQueryTimeoutMs')).toBe(5000);
    });

    it('should hand out a frozen copy', () => {
      expect(Object.isFrozen(configManager.getConfig())).toBe(true);
    });

    it('should apply constructor overrides', () => {
      expect(new ConfigManager({ MaxPrintAttempts: 5 }).get('MaxPrintAttempts')).toBe(5);
    });
  });

  describe('Configuration Updates', () => {
    it('should update configuration value and emit the changed key', () => {
      const events: ConfigUpdateEvent[] = [];
      configManager.on('configUpdated', (event: ConfigUpdateEvent) => events.push(event));

      const result = configManager.set('MaxPrintAttempts', 5);

      expect(result.success).toBe(true);
      expect(configManager.get('MaxPrintAttempts')).toBe(5);
      expect(events).toHaveLength(1);
      expect(events[0].changedKeys).toEqual(['MaxPrintAttempts']);
      expect(events[0].previous.MaxPrintAttempts).toBe(3);
      expect(events[0].current.MaxPrintAttempts).toBe(5);
    });

    it('should reject a value outside its range', () => {
      const result = configManager.set('MaxPrintAttempts', 0);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
        expect(result.error.message).toBe('Configuration error: MaxPrintAttempts: Number must be greater than or equal to 1');
      }
      expect(configManager.get('MaxPrintAttempts')).toBe(3);
    });

    it('should apply updateConfig all-or-nothing', () => {
      const result = configManager.updateConfig({ RetryDelayMs: 10, MaxPrintAttempts: 50 });

      expect(result.success).toBe(false);
      expect(configManager.get('RetryDelayMs')).toBe(500);
    });

    it('should not emit when nothing changed', () => {
      let emitted = 0;
      configManager.on('configUpdated', () => emitted++);

      configManager.set('RetryDelayMs', 500);

      expect(emitted).toBe(0);
    });

    it('should restore the defaults', () => {
      configManager.updateConfig({ RetryDelayMs: 10, PreferNetworkTransport: false });

      configManager.resetToDefaults();

      expect(configManager.getConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should switch verbose logging with DebugMode', () => {
      configManager.set('DebugMode', true);
      expect(isVerboseLoggingEnabled()).toBe(true);
    });
  });

  describe('loadFromFile', () => {
    it('should apply valid fields and drop the rest', () => {
      const filePath = writeConfigFile('config.json', JSON.stringify({ MaxPrintAttempts: 4, RetryDelayMs: -1, Unknown: true }));

      const result = configManager.loadFromFile(filePath);

      expect(result.success).toBe(true);
      expect(configManager.get('MaxPrintAttempts')).toBe(4);
      expect(configManager.get('RetryDelayMs')).toBe(500);
      expect(configManager.getLoadedPath()).toBe(filePath);
      expect(console.warn).toHaveBeenCalledWith('[ConfigManager]', 'Ignored invalid or unknown config keys: RetryDelayMs, Unknown');
    });

    it('should fail for a missing file', () => {
      const result = configManager.loadFromFile(path.join(tempDir, 'missing.json'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
      }
      expect(configManager.getLoadedPath()).toBeNull();
    });

    it('should fail for a file that is not a JSON object', () => {
      const filePath = writeConfigFile('list.json', '[1, 2]');

      const result = configManager.loadFromFile(filePath);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`Configuration error: ${filePath} does not contain a JSON object`);
      }
    });
  });

  describe('applyEnvironment', () => {
    it('should map keys to prefixed upper snake case', () => {
      expect(toEnvironmentName('MaxRetryDelayMs')).toBe('LABELWRIGHT_MAX_RETRY_DELAY_MS');
    });

    it('should apply parseable overrides and report the changed keys', () => {
      const changed = configManager.applyEnvironment({
        LABELWRIGHT_MAX_PRINT_ATTEMPTS: '7',
        LABELWRIGHT_PREFER_NETWORK_TRANSPORT: 'false',
        LABELWRIGHT_RETRY_DELAY_MS: 'soon'
      });

      expect(changed).toEqual(['MaxPrintAttempts', 'PreferNetworkTransport']);
      expect(configManager.get('MaxPrintAttempts')).toBe(7);
      expect(configManager.get('PreferNetworkTransport')).toBe(false);
      expect(configManager.get('RetryDelayMs')).toBe(500);
      expect(console.warn).toHaveBeenCalledWith('[ConfigManager]', 'Ignored invalid environment overrides: RetryDelayMs');
    });

    it('should ignore unrelated variables', () => {
      expect(configManager.applyEnvironment({ PATH: '/usr/bin' })).toEqual([]);
    });
  });
});
