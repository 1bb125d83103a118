/**
 * @fileoverview Tests for host status and setting value parsing
 */

import { describe, it, expect } from '@jest/globals';
import * as fc from 'fast-check';
import {
  extractNumber,
  hasMedia,
  isHeadClosed,
  isStatusOk,
  parseHostStatus,
  parseTextError,
  toBool,
  toInt
} from './status-parser';

describe('status-parser', () => {
  describe('toBool', () => {
    it('should coerce known spellings', () => {
      expect(toBool('On')).toBe(true);
      expect(toBool(' YES ')).toBe(true);
      expect(toBool('Disabled')).toBe(false);
      expect(toBool('0')).toBe(false);
    });

    it('should return null for unknown values', () => {
      expect(toBool('maybe')).toBeNull();
      expect(toBool('')).toBeNull();
      expect(toBool(null)).toBeNull();
    });

    it('should never throw for arbitrary input', () => {
      fc.assert(
        fc.property(fc.string(), value => {
          const result = toBool(value);
          return result === true || result === false || result === null;
        })
      );
    });
  });

  describe('numeric helpers', () => {
    it('should parse integers strictly', () => {
      expect(toInt('042')).toBe(42);
      expect(toInt('-3')).toBe(-3);
      expect(toInt('4x')).toBeNull();
    });

    it('should extract the first number in text', () => {
      expect(extractNumber('temp is -12.5C')).toBe(-12.5);
      expect(extractNumber('speed 4 ips')).toBe(4);
      expect(extractNumber('none here')).toBeNull();
    });
  });

  describe('free-text checks', () => {
    it('should recognise healthy status words', () => {
      expect(isStatusOk('Ready')).toBe(true);
      expect(isStatusOk('IDLE')).toBe(true);
      expect(isStatusOk('busy')).toBe(false);
    });

    it('should detect media presence', () => {
      expect(hasMedia('loaded')).toBe(true);
      expect(hasMedia('out')).toBe(false);
      expect(hasMedia('unknown')).toBe(false);
    });

    it('should treat open as winning over closed', () => {
      expect(isHeadClosed('closed')).toBe(true);
      expect(isHeadClosed('unlocked')).toBe(false);
      expect(isHeadClosed('open')).toBe(false);
      expect(isHeadClosed('')).toBe(false);
    });

    it('should map fault text to canonical messages', () => {
      expect(parseTextError('PAPER OUT')).toBe('Out of paper');
      expect(parseTextError('ribbon out')).toBe('Out of ribbon');
      expect(parseTextError('Head Open')).toBe('Print head open');
      expect(parseTextError('head cold')).toBe('Print head cold');
      expect(parseTextError('head over temp')).toBe('Print head overheated');
      expect(parseTextError('PAUSED')).toBe('Printer paused');
      expect(parseTextError('motor error')).toBe('motor error');
      expect(parseTextError('fine')).toBeNull();
    });
  });

  describe('parseHostStatus', () => {
    it('should report an all-zero status as healthy', () => {
      const info = parseHostStatus('0,0,0,0,0,0,0,0,0,0,0,0');
      expect(info.isOk).toBe(true);
      expect(info.errorCode).toBeNull();
      expect(info.errorMessage).toBeNull();
      expect(info.flags.paperOut).toBe(false);
    });

    it('should map a known primary code', () => {
      const info = parseHostStatus('159,0,0,2030,000,0,0,0,000,0,0,0');
      expect(info.isOk).toBe(false);
      expect(info.errorCode).toBe(159);
      expect(info.errorMessage).toBe('Hardware error detected');
      expect(info.fields.field3).toBe(2030);
      expect(info.fields.field4).toBe('000');
      expect(info.fields.field8).toBe('000');
      expect(info.flags.headOpen).toBe(true);
      expect(info.flags.headCold).toBe(false);
    });

    it('should report unknown codes by number', () => {
      expect(parseHostStatus('999,0').errorMessage).toBe('Unknown error code: 999');
    });

    it('should treat missing fields as absent', () => {
      const info = parseHostStatus('100,1');
      expect(info.errorMessage).toBe('Out of paper/media');
      expect(info.flags.paperOut).toBe(true);
      expect(info.flags.ribbonOut).toBeNull();
      expect(info.flags.headTooHot).toBeNull();
    });

    it('should reject a non-numeric primary code', () => {
      const info = parseHostStatus('abc,0,0');
      expect(info.isOk).toBe(false);
      expect(info.errorMessage).toBe('Invalid status format');
    });

    it('should report an empty response', () => {
      expect(parseHostStatus('').errorMessage).toBe('No status response');
      expect(parseHostStatus(null).isOk).toBe(false);
    });

    it('should parse free-text status', () => {
      expect(parseHostStatus('"ready"').isOk).toBe(true);
      expect(parseHostStatus('head open').errorMessage).toBe('Print head open');
      expect(parseHostStatus('jammed').errorMessage).toBe('Printer error: jammed');
    });
  });
});
