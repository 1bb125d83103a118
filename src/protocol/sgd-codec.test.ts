/**
 * @fileoverview Tests for the control protocol codec
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildGetCommand,
  buildSetCommand,
  buildDoCommand,
  buildLanguageSwitchCommand,
  ControlCommands,
  detectLanguage,
  encodeCommand,
  isLanguageMatch,
  parseResponse
} from './sgd-codec';

describe('sgd-codec', () => {
  describe('command builders', () => {
    it('should build a getvar command', () => {
      expect(buildGetCommand('device.pause')).toBe('! U1 getvar "device.pause"\r\n');
    });

    it('should build a setvar command', () => {
      expect(buildSetCommand('device.languages', 'zpl')).toBe('! U1 setvar "device.languages" "zpl"\r\n');
    });

    it('should build a do command', () => {
      expect(buildDoCommand('device.reset', '')).toBe('! U1 do "device.reset" ""\r\n');
    });

    it('should select line_print for cpcl payloads', () => {
      expect(buildLanguageSwitchCommand('cpcl')).toBe('! U1 setvar "device.languages" "line_print"\r\n');
      expect(buildLanguageSwitchCommand('zpl')).toBe('! U1 setvar "device.languages" "zpl"\r\n');
    });

    it('should expose the fixed control commands', () => {
      expect(ControlCommands.UNPAUSE).toBe('! U1 setvar "device.pause" "false"\r\n');
      expect(ControlCommands.CLEAR_ERRORS).toBe('~JA');
      expect(ControlCommands.CALIBRATE).toBe('~jc^xa^jus^xz');
    });

    it('should encode buffer control commands as single bytes', () => {
      expect(Array.from(encodeCommand(ControlCommands.CLEAR_BUFFER))).toEqual([0x18]);
      expect(Array.from(encodeCommand(ControlCommands.FLUSH_BUFFER))).toEqual([0x03]);
    });
  });

  describe('parseResponse', () => {
    it('should return null for empty responses', () => {
      expect(parseResponse(null)).toBeNull();
      expect(parseResponse(undefined)).toBeNull();
      expect(parseResponse('   \r\n')).toBeNull();
    });

    it('should strip surrounding quotes', () => {
      expect(parseResponse('"false"\r\n')).toBe('false');
    });

    it('should extract the value from key/value responses', () => {
      expect(parseResponse('"device.languages" : "hybrid_xml_zpl"')).toBe('hybrid_xml_zpl');
    });

    it('should return trimmed literals unchanged', () => {
      expect(parseResponse('  ok  ')).toBe('ok');
    });
  });

  describe('detectLanguage', () => {
    it('should detect zpl by its format start marker', () => {
      expect(detectLanguage('^XA^FO50,50^FDHello^FS^XZ')).toBe('zpl');
    });

    it('should detect cpcl by its leading bang', () => {
      expect(detectLanguage('  ! 0 200 200 210 1\r\nPRINT\r\n')).toBe('cpcl');
    });

    it('should return null when no marker is present', () => {
      expect(detectLanguage('hello world')).toBeNull();
      expect(detectLanguage('')).toBeNull();
      expect(detectLanguage(null)).toBeNull();
    });
  });

  describe('isLanguageMatch', () => {
    it('should match zpl settings case-insensitively', () => {
      expect(isLanguageMatch('HYBRID_XML_ZPL', 'zpl')).toBe(true);
      expect(isLanguageMatch('line_print', 'zpl')).toBe(false);
    });

    it('should accept line_print and cpcl for cpcl payloads', () => {
      expect(isLanguageMatch('line_print', 'cpcl')).toBe(true);
      expect(isLanguageMatch('cpcl', 'cpcl')).toBe(true);
      expect(isLanguageMatch('zpl', 'cpcl')).toBe(false);
    });
  });
});
