/**
 * @fileoverview Print workflow state, events and options.
 *
 * Key exports:
 * - PrintStep / STEP_PROGRESS: workflow steps and their fixed progress fractions
 * - PrintState: frozen view of the workflow, replaced on every transition
 * - PrintEvent: tagged union of everything the workflow reports
 * - PrintErrorInfo / classifyError(): terminal errors with recoverability and hint
 * - PrintOptionsSchema: zod schema for per-print options
 */

import { z } from 'zod';
import type { DiscoveredDevice } from './printer';
import type { ReadinessOperationEvent, ReadinessOptions } from './readiness';
import type { AutoCorrectionOptions } from './auto-correction';
import { AutoCorrectionOptionsSchema } from './auto-correction';
import { ErrorCode } from '../utils/error.utils';
import type { ErrorInfo } from '../utils/error.utils';
import { DeviceAddressSchema, NonNegativeIntSchema } from '../utils/validation.utils';

// ============================================================================
// STEPS
// ============================================================================

export type PrintStep =
  | 'initializing'
  | 'validating'
  | 'connecting'
  | 'connected'
  | 'checkingStatus'
  | 'sending'
  | 'waitingForCompletion'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type TerminalStep = 'completed' | 'failed' | 'cancelled';

/**
 * Progress reached on entering each step. failed and cancelled keep the
 * progress of the step they interrupted.
 */
export const STEP_PROGRESS: Readonly<Record<Exclude<PrintStep, 'failed' | 'cancelled'>, number>> = {
  initializing: 0,
  validating: 0.1,
  connecting: 0.2,
  connected: 0.3,
  checkingStatus: 0.4,
  sending: 0.6,
  waitingForCompletion: 0.8,
  completed: 1
};

export function isTerminalStep(step: PrintStep): step is TerminalStep {
  return step === 'completed' || step === 'failed' || step === 'cancelled';
}

// ============================================================================
// ERRORS
// ============================================================================

export type ErrorRecoverability = 'recoverable' | 'nonRecoverable' | 'possiblyRecoverable' | 'unknown';

export interface PrintErrorInfo {
  readonly code: string;
  readonly message: string;
  readonly recoverability: ErrorRecoverability;
  readonly recoveryHint: string;
  readonly cause?: unknown;
}

const RECOVERABLE_TERMS = ['connection', 'timeout', 'timed out', 'not connected', 'network', 'bluetooth', 'radio', 'temporary', 'retry'];
const NON_RECOVERABLE_TERMS = ['head open', 'head is open', 'out of paper', 'ribbon', 'hardware', 'permanent', 'fatal'];
const POSSIBLY_RECOVERABLE_TERMS = ['paused', 'busy', 'not ready', 'cold'];

const RECOVERY_HINTS: Readonly<Record<ErrorRecoverability, string>> = {
  recoverable: 'This is usually temporary. Check the connection and try again.',
  nonRecoverable: 'The printer needs attention. Fix the reported problem before printing again.',
  possiblyRecoverable: 'The printer may recover by itself. Check its state and try again.',
  unknown: 'Check the printer and try again.'
};

/**
 * Recoverability from the words in a failure message
 */
export function classifyMessage(message: string): ErrorRecoverability {
  const lower = message.toLowerCase();
  if (RECOVERABLE_TERMS.some(term => lower.includes(term))) return 'recoverable';
  if (NON_RECOVERABLE_TERMS.some(term => lower.includes(term))) return 'nonRecoverable';
  if (POSSIBLY_RECOVERABLE_TERMS.some(term => lower.includes(term))) return 'possiblyRecoverable';
  return 'unknown';
}

/**
 * Recoverability of a workflow failure. Unresolved readiness issues are
 * recoverable and a failed language switch is possibly recoverable whatever
 * their message says; a connection-category error with no telling words is
 * recoverable.
 */
export function classifyError(error: ErrorInfo): ErrorRecoverability {
  if (error.code === ErrorCode.PRINTER_NOT_READY) return 'recoverable';
  if (error.code === ErrorCode.LANGUAGE_MISMATCH) return 'possiblyRecoverable';
  const byMessage = classifyMessage(error.message);
  if (byMessage === 'unknown' && error.category === 'connection') return 'recoverable';
  return byMessage;
}

export function toPrintErrorInfo(error: ErrorInfo): PrintErrorInfo {
  const recoverability = classifyError(error);
  return {
    code: error.code,
    message: error.message,
    recoverability,
    recoveryHint: error.recoveryHint ?? RECOVERY_HINTS[recoverability],
    cause: error.cause
  };
}

export function isRetryable(recoverability: ErrorRecoverability): boolean {
  return recoverability === 'recoverable' || recoverability === 'possiblyRecoverable';
}

// ============================================================================
// STATE
// ============================================================================

export interface PrintState {
  readonly step: PrintStep;
  readonly message: string;
  readonly isRunning: boolean;
  readonly isCompleted: boolean;
  readonly isCancelled: boolean;
  readonly currentAttempt: number;
  readonly maxAttempts: number;
  readonly progress: number;
  readonly currentIssues: ReadonlyArray<string>;
  readonly currentError: PrintErrorInfo | null;
  readonly startedAt: Date | null;
  readonly elapsedMs: number;
}

export const INITIAL_PRINT_STATE: PrintState = Object.freeze({
  step: 'initializing',
  message: 'Idle',
  isRunning: false,
  isCompleted: false,
  isCancelled: false,
  currentAttempt: 0,
  maxAttempts: 0,
  progress: 0,
  currentIssues: Object.freeze([]),
  currentError: null,
  startedAt: null,
  elapsedMs: 0
});

// ============================================================================
// EVENTS
// ============================================================================

export interface PrintStepInfo {
  readonly step: PrintStep;
  readonly message: string;
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly elapsedMs: number;
  readonly progress: number;
}

export interface PrintProgressInfo {
  readonly progress: number;
  readonly currentOperation: string;
  readonly elapsedMs: number;
  /** Remaining dwell time while waiting for completion, otherwise 0 */
  readonly estimatedRemainingMs: number;
}

interface EventBase {
  readonly timestamp: Date;
}

export type PrintEvent =
  | (EventBase & { readonly type: 'stepChanged'; readonly stepInfo: PrintStepInfo })
  | (EventBase & { readonly type: 'progressUpdate'; readonly progressInfo: PrintProgressInfo })
  | (EventBase & { readonly type: 'errorOccurred'; readonly errorInfo: PrintErrorInfo; readonly stepInfo: PrintStepInfo })
  | (EventBase & {
      readonly type: 'retryAttempt';
      readonly stepInfo: PrintStepInfo;
      readonly attempt: number;
      readonly maxAttempts: number;
      readonly delayMs: number;
    })
  | (EventBase & { readonly type: 'statusUpdate'; readonly status: ReadinessOperationEvent | string })
  | (EventBase & { readonly type: 'completed'; readonly stepInfo: PrintStepInfo })
  | (EventBase & { readonly type: 'cancelled'; readonly stepInfo: PrintStepInfo });

export type PrintEventType = PrintEvent['type'];

/**
 * Emitter map: every event under its own type, and all of them under `event`
 */
export type PrintWorkflowEventMap = {
  [K in PrintEventType]: [Extract<PrintEvent, { type: K }>];
} & {
  event: [PrintEvent];
};

// ============================================================================
// OPTIONS
// ============================================================================

export interface PrintOptions {
  /** Device to print to; when absent an already open connection is used */
  readonly device?: DiscoveredDevice;
  readonly maxAttempts?: number;
  readonly checkStatus?: boolean;
  readonly waitForCompletion?: boolean;
  readonly readiness?: Partial<ReadinessOptions>;
  readonly autoCorrection?: Partial<AutoCorrectionOptions>;
}

const DiscoveredDeviceSchema = z.object({
  address: DeviceAddressSchema,
  name: z.string(),
  transportType: z.enum(['network', 'radio']),
  status: z.enum(['connected', 'ready', 'found', 'unknown'])
});

const ReadinessOptionsSchema = z.object({
  checkConnection: z.boolean(),
  checkMedia: z.boolean(),
  checkHead: z.boolean(),
  checkPause: z.boolean(),
  checkErrors: z.boolean(),
  checkLanguage: z.boolean(),
  fixPausedPrinter: z.boolean(),
  fixPrinterErrors: z.boolean(),
  fixMediaCalibration: z.boolean(),
  fixLanguageMismatch: z.boolean(),
  fixBufferIssues: z.boolean(),
  clearBuffer: z.boolean(),
  flushBuffer: z.boolean(),
  checkDelayMs: NonNegativeIntSchema,
  maxAttempts: z.number().int().min(1)
}).partial();

export const PrintOptionsSchema = z.object({
  device: DiscoveredDeviceSchema.optional(),
  maxAttempts: z.number().int().min(1).optional(),
  checkStatus: z.boolean().optional(),
  waitForCompletion: z.boolean().optional(),
  readiness: ReadinessOptionsSchema.optional(),
  autoCorrection: AutoCorrectionOptionsSchema.optional()
});
