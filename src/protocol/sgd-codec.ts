/**
 * @fileoverview Builders and parsers for the printer's textual get/set/do control protocol.
 *
 * Wire shapes (bit-exact):
 * - get: `! U1 getvar "<key>"\r\n`
 * - set: `! U1 setvar "<key>" "<value>"\r\n`
 * - do:  `! U1 do "<action>" "<value>"\r\n`
 *
 * Responses arrive as a bare quoted value or as `"<key>" : "<value>"`.
 * Every function here is total: malformed input yields null, never a throw.
 */

import type { PrinterLanguage } from '../types/printer';

// ============================================================================
// SETTINGS AND CONTROL COMMANDS
// ============================================================================

export const SettingKeys = {
  PAUSE: 'device.pause',
  MEDIA_STATUS: 'media.status',
  HEAD_LATCH: 'head.latch',
  HOST_STATUS: 'device.host_status',
  LANGUAGES: 'device.languages'
} as const;

export type SettingKey = typeof SettingKeys[keyof typeof SettingKeys];

const LINE_TERMINATOR = '\r\n';

export function buildGetCommand(key: string): string {
  return `! U1 getvar "${key}"${LINE_TERMINATOR}`;
}

export function buildSetCommand(key: string, value: string): string {
  return `! U1 setvar "${key}" "${value}"${LINE_TERMINATOR}`;
}

export function buildDoCommand(action: string, value: string): string {
  return `! U1 do "${action}" "${value}"${LINE_TERMINATOR}`;
}

/**
 * Fixed control commands
 */
export const ControlCommands = {
  UNPAUSE: buildSetCommand(SettingKeys.PAUSE, 'false'),
  CLEAR_ERRORS: '~JA',
  CLEAR_BUFFER: '\x18',
  FLUSH_BUFFER: '\x03',
  CALIBRATE: '~jc^xa^jus^xz'
} as const;

export type ControlCommand = keyof typeof ControlCommands;

/**
 * Value written to `device.languages` to select each payload language
 */
export function expectedLanguageSetting(language: PrinterLanguage): string {
  return language === 'zpl' ? 'zpl' : 'line_print';
}

export function buildLanguageSwitchCommand(language: PrinterLanguage): string {
  return buildSetCommand(SettingKeys.LANGUAGES, expectedLanguageSetting(language));
}

/**
 * Bytes handed to the transport. Commands are ASCII, so latin1 keeps control
 * characters such as 0x18 intact.
 */
export function encodeCommand(command: string): Uint8Array {
  return Uint8Array.from(Buffer.from(command, 'latin1'));
}

export function encodePayload(payload: string): Uint8Array {
  return Uint8Array.from(Buffer.from(payload, 'utf8'));
}

// ============================================================================
// RESPONSE PARSING
// ============================================================================

const KEY_VALUE_PATTERN = /"[^"]*"\s*:\s*"([^"]*)"/;

/**
 * Extract the value from a getvar response
 *
 * @returns the value, or null for an empty response
 */
export function parseResponse(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const keyValue = KEY_VALUE_PATTERN.exec(trimmed);
  if (keyValue) {
    return keyValue[1];
  }

  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

// ============================================================================
// LANGUAGE DETECTION
// ============================================================================

export function isZplData(payload: string): boolean {
  return payload.includes('^XA');
}

export function isCpclData(payload: string): boolean {
  return payload.trimStart().startsWith('!');
}

/**
 * Detect the markup language of a print payload
 *
 * @returns 'zpl', 'cpcl', or null when neither marker is present
 */
export function detectLanguage(payload: string | null | undefined): PrinterLanguage | null {
  if (!payload) {
    return null;
  }
  if (isZplData(payload)) {
    return 'zpl';
  }
  if (isCpclData(payload)) {
    return 'cpcl';
  }
  return null;
}

/**
 * Whether the printer's `device.languages` value already accepts `expected`
 */
export function isLanguageMatch(currentSetting: string, expected: PrinterLanguage): boolean {
  const lower = currentSetting.toLowerCase();
  if (expected === 'zpl') {
    return lower.includes('zpl');
  }
  return lower.includes('line_print') || lower.includes('cpcl');
}
