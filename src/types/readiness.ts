/**
 * @fileoverview Readiness evaluation types: options and presets, per-dimension state,
 * snapshots, correction records and readiness operation events.
 *
 * Key exports:
 * - ReadinessOptions / ReadinessPresets: which dimensions to check and fix
 * - DimensionState<T>: unchecked, good(value) or bad(value, detail)
 * - ReadinessSnapshot: frozen view of every dimension at one moment
 * - CorrectionRecord: one entry of the append-only correction log
 * - ReadinessOperationEvent: check/fix progress reported to status callbacks
 */

import type { ErrorInfo } from '../utils/error.utils';
import type { HostStatusInfo } from '../protocol/status-parser';

// ============================================================================
// OPTIONS
// ============================================================================

export interface ReadinessOptions {
  // Checks
  readonly checkConnection: boolean;
  readonly checkMedia: boolean;
  readonly checkHead: boolean;
  readonly checkPause: boolean;
  readonly checkErrors: boolean;
  readonly checkLanguage: boolean;

  // Fixes
  readonly fixPausedPrinter: boolean;
  readonly fixPrinterErrors: boolean;
  readonly fixMediaCalibration: boolean;
  readonly fixLanguageMismatch: boolean;
  readonly fixBufferIssues: boolean;
  readonly clearBuffer: boolean;
  readonly flushBuffer: boolean;

  /** Wait before re-reading a dimension after a fix */
  readonly checkDelayMs: number;
  /** Re-reads allowed while confirming a fix */
  readonly maxAttempts: number;
}

export const DEFAULT_READINESS_OPTIONS: ReadinessOptions = {
  checkConnection: false,
  checkMedia: false,
  checkHead: false,
  checkPause: false,
  checkErrors: false,
  checkLanguage: false,
  fixPausedPrinter: false,
  fixPrinterErrors: false,
  fixMediaCalibration: false,
  fixLanguageMismatch: false,
  fixBufferIssues: false,
  clearBuffer: false,
  flushBuffer: false,
  checkDelayMs: 100,
  maxAttempts: 3
};

export function createReadinessOptions(overrides: Partial<ReadinessOptions> = {}): ReadinessOptions {
  return { ...DEFAULT_READINESS_OPTIONS, ...overrides };
}

export const ReadinessPresets = {
  quick: createReadinessOptions({
    checkConnection: true,
    checkMedia: true,
    checkHead: true,
    checkPause: true,
    checkLanguage: true,
    fixLanguageMismatch: true,
    fixPausedPrinter: true,
    fixPrinterErrors: true
  }),
  smartOptimized: createReadinessOptions({
    checkConnection: true,
    checkMedia: true,
    checkHead: true,
    checkPause: true,
    checkErrors: true,
    checkLanguage: true,
    fixPausedPrinter: true,
    fixPrinterErrors: true,
    fixLanguageMismatch: true,
    clearBuffer: true,
    flushBuffer: true
  }),
  comprehensive: createReadinessOptions({
    checkConnection: true,
    checkMedia: true,
    checkHead: true,
    checkPause: true,
    checkErrors: true,
    checkLanguage: true,
    fixPausedPrinter: true,
    fixPrinterErrors: true,
    fixMediaCalibration: true,
    fixLanguageMismatch: true,
    fixBufferIssues: true,
    clearBuffer: true,
    flushBuffer: true
  }),
  forPrinting: createReadinessOptions({
    checkConnection: true,
    checkMedia: true,
    checkHead: true,
    checkPause: true,
    checkErrors: true,
    fixPausedPrinter: true,
    fixPrinterErrors: true,
    clearBuffer: true,
    flushBuffer: true
  })
} as const;

export type ReadinessPresetName = keyof typeof ReadinessPresets;

export function hasAnyCheckEnabled(options: ReadinessOptions): boolean {
  return options.checkConnection
    || options.checkMedia
    || options.checkHead
    || options.checkPause
    || options.checkErrors
    || options.checkLanguage;
}

// ============================================================================
// DIMENSION STATE
// ============================================================================

export type ReadinessDimension = 'connection' | 'media' | 'head' | 'pause' | 'hostStatus' | 'language';

export const READINESS_DIMENSIONS: ReadonlyArray<ReadinessDimension> = [
  'connection',
  'media',
  'head',
  'pause',
  'hostStatus',
  'language'
];

/**
 * Value cached for each dimension once read
 *
 * - connection: transport connection flag
 * - media, head, language: the raw setting value
 * - pause: the parsed pause flag
 * - hostStatus: the parsed host status
 */
export interface DimensionValues {
  connection: boolean;
  media: string;
  head: string;
  pause: boolean;
  hostStatus: HostStatusInfo;
  language: string;
}

export interface UncheckedState {
  readonly kind: 'unchecked';
}

export interface GoodState<T> {
  readonly kind: 'good';
  readonly value: T;
}

/**
 * A checked dimension that is not healthy. `value` is null when the read itself
 * failed or returned nothing usable.
 */
export interface BadState<T> {
  readonly kind: 'bad';
  readonly value: T | null;
  readonly detail: string;
  readonly error?: ErrorInfo;
}

export type DimensionState<T> = UncheckedState | GoodState<T> | BadState<T>;

export type DimensionStates = { [D in ReadinessDimension]: DimensionState<DimensionValues[D]> };

export const UNCHECKED: UncheckedState = Object.freeze({ kind: 'unchecked' });

export function good<T>(value: T): GoodState<T> {
  return { kind: 'good', value };
}

export function bad<T>(value: T | null, detail: string, error?: ErrorInfo): BadState<T> {
  return error ? { kind: 'bad', value, detail, error } : { kind: 'bad', value, detail };
}

// ============================================================================
// SNAPSHOT
// ============================================================================

export interface ReadinessSnapshot extends DimensionStates {
  /** Host-reported errors */
  readonly errors: ReadonlyArray<string>;
  /** Reads that failed or returned unexpected values */
  readonly warnings: ReadonlyArray<string>;
  readonly checkedAt: Date | null;
  readonly isReady: boolean;
}

/**
 * true when paused, false when running, null when unknown
 */
export function isPausedIn(snapshot: ReadinessSnapshot): boolean | null {
  const { pause } = snapshot;
  if (pause.kind === 'good') return pause.value;
  if (pause.kind === 'bad') return pause.value;
  return null;
}

/**
 * true when media is present, false when the printer reported none, null when unknown
 */
export function hasMediaIn(snapshot: ReadinessSnapshot): boolean | null {
  const { media } = snapshot;
  if (media.kind === 'good') return true;
  if (media.kind === 'bad' && media.value !== null) return false;
  return null;
}

// ============================================================================
// CORRECTIONS AND EVENTS
// ============================================================================

export type CorrectionName =
  | 'reconnect'
  | 'unpause'
  | 'clearErrors'
  | 'calibrate'
  | 'switchLanguage'
  | 'clearBuffer'
  | 'flushBuffer';

export interface CorrectionRecord {
  readonly name: CorrectionName;
  readonly success: boolean;
  readonly error?: string;
  readonly timestamp: Date;
}

export type ReadinessOperationType = 'connection' | 'media' | 'head' | 'pause' | 'errors' | 'language' | 'buffer';

export type ReadinessOperationKind = 'check' | 'fix';

export interface ReadinessOperationEvent {
  readonly message: string;
  readonly operationType: ReadinessOperationType;
  readonly operationKind: ReadinessOperationKind;
  readonly success: boolean;
  readonly errorDetails?: string;
  readonly timestamp: Date;
}

export type ReadinessStatusCallback = (event: ReadinessOperationEvent) => void;
