/**
 * @fileoverview Decoding of free-text and comma-separated health responses.
 *
 * Host status responses come in two shapes:
 * - free text such as `"Ready"` or `"Head Open"`
 * - comma separated numeric fields, where field 0 is the primary error code
 *   (0 = healthy) and fields 1-5 are the paper-out, ribbon-out, head-open,
 *   head-cold and head-too-hot flags
 *
 * Known primary codes are read from data/host-status-codes.json; adding codes there
 * does not change the parsing.
 */

import hostStatusCodes from '../data/host-status-codes.json';

// ============================================================================
// TYPES
// ============================================================================

export interface HostStatusFlags {
  readonly paperOut: boolean | null;
  readonly ribbonOut: boolean | null;
  readonly headOpen: boolean | null;
  readonly headCold: boolean | null;
  readonly headTooHot: boolean | null;
}

export type HostStatusField = string | number | null;

export interface HostStatusInfo {
  readonly isOk: boolean;
  readonly errorCode: number | null;
  readonly errorMessage: string | null;
  /**
   * Positional fields after the primary code, keyed `field1`, `field2`, ...
   */
  readonly fields: Readonly<Record<string, HostStatusField>>;
  readonly flags: HostStatusFlags;
}

const TRUE_VALUES: ReadonlySet<string> = new Set(['true', 'on', '1', 'yes', 'y', 'enabled', 'active']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['false', 'off', '0', 'no', 'n', 'disabled', 'inactive']);

// Fields 4 and 8 carry non-numeric identifiers and are kept verbatim
const STRING_FIELDS: ReadonlySet<number> = new Set([4, 8]);

const NO_FLAGS: HostStatusFlags = {
  paperOut: null,
  ribbonOut: null,
  headOpen: null,
  headCold: null,
  headTooHot: null
};

const CODE_MESSAGES: ReadonlyMap<number, string> = new Map(
  Object.entries(hostStatusCodes).map(([code, message]): [number, string] => [Number(code), message])
);

// ============================================================================
// PRIMITIVE COERCION
// ============================================================================

/**
 * Coerce a setting value to a boolean
 *
 * @returns true/false for a known spelling, null for anything else
 */
export function toBool(value: string | null | undefined): boolean | null {
  if (value === null || value === undefined) {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

export function toInt(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * First signed integer or decimal found in `text`
 */
export function extractNumber(text: string | null | undefined): number | null {
  if (!text) {
    return null;
  }
  const match = /-?\d+\.?\d*/.exec(text);
  if (!match) {
    return null;
  }
  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : null;
}

export function normalizeStatus(text: string): string {
  return text.replace(/"/g, '').replace(/\s+/g, ' ').trim();
}

// ============================================================================
// FREE-TEXT STATUS
// ============================================================================

export function isStatusOk(text: string | null | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return lower.includes('ok') || lower.includes('ready') || lower.includes('normal') || lower.includes('idle');
}

/**
 * Whether a `media.status` value reports loaded media
 */
export function hasMedia(text: string | null | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  if (lower.includes('ok') || lower.includes('ready') || lower.includes('loaded') || lower.includes('present')) {
    return true;
  }
  return false;
}

/**
 * Whether a `head.latch` value reports a closed head. Open wins over closed.
 */
export function isHeadClosed(text: string | null | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  if (lower.includes('open') || lower.includes('unlocked')) {
    return false;
  }
  return lower.includes('closed') || lower.includes('ok') || lower.includes('locked');
}

/**
 * Map a free-text fault to its canonical message
 */
export function parseTextError(text: string | null | undefined): string | null {
  if (!text) return null;
  const lower = text.toLowerCase();

  if (lower.includes('paper') && lower.includes('out')) return 'Out of paper';
  if (lower.includes('ribbon') && lower.includes('out')) return 'Out of ribbon';
  if (lower.includes('head') && lower.includes('open')) return 'Print head open';
  if (lower.includes('head') && lower.includes('cold')) return 'Print head cold';
  if (lower.includes('head') && (lower.includes('over') || lower.includes('hot'))) return 'Print head overheated';
  if (lower.includes('pause')) return 'Printer paused';
  if (lower.includes('error')) return text;
  return null;
}

// ============================================================================
// HOST STATUS
// ============================================================================

export function describeHostStatusCode(code: number): string {
  return CODE_MESSAGES.get(code) ?? `Unknown error code: ${code}`;
}

function flagAt(fields: ReadonlyArray<string>, index: number): boolean | null {
  if (index >= fields.length) {
    return null;
  }
  const value = toInt(fields[index]);
  return value === null ? null : value !== 0;
}

function parseTextStatus(status: string): HostStatusInfo {
  const isOk = isStatusOk(status);
  return {
    isOk,
    errorCode: null,
    errorMessage: isOk ? null : parseTextError(status) ?? `Printer error: ${status}`,
    fields: {},
    flags: NO_FLAGS
  };
}

/**
 * Parse a `device.host_status` response
 *
 * @example
 * parseHostStatus('159,0,0,2030,000,0,0,0,000,0,0,0');
 * // { isOk: false, errorCode: 159, errorMessage: 'Hardware error detected', ... }
 */
export function parseHostStatus(raw: string | null | undefined): HostStatusInfo {
  const status = raw ? normalizeStatus(raw) : '';
  if (status.length === 0) {
    return {
      isOk: false,
      errorCode: null,
      errorMessage: 'No status response',
      fields: {},
      flags: NO_FLAGS
    };
  }

  if (!status.includes(',')) {
    return parseTextStatus(status);
  }

  const parts = status.split(',').map(part => part.trim());
  const errorCode = toInt(parts[0]);
  if (errorCode === null) {
    return {
      isOk: false,
      errorCode: null,
      errorMessage: 'Invalid status format',
      fields: {},
      flags: NO_FLAGS
    };
  }

  const fields: Record<string, HostStatusField> = {};
  for (let index = 1; index < parts.length; index++) {
    fields[`field${index}`] = STRING_FIELDS.has(index) ? parts[index] : toInt(parts[index]);
  }

  const isOk = errorCode === 0;
  return {
    isOk,
    errorCode: isOk ? null : errorCode,
    errorMessage: isOk ? null : describeHostStatusCode(errorCode),
    fields,
    flags: {
      paperOut: flagAt(parts, 1),
      ribbonOut: flagAt(parts, 2),
      headOpen: flagAt(parts, 3),
      headCold: flagAt(parts, 4),
      headTooHot: flagAt(parts, 5)
    }
  };
}
