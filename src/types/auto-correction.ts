/**
 * @fileoverview Options controlling which automatic corrections may be attempted.
 */

import { z } from 'zod';
import { NonNegativeIntSchema } from '../utils/validation.utils';

export interface AutoCorrectionOptions {
  readonly enableUnpause: boolean;
  readonly enableClearErrors: boolean;
  readonly enableReconnect: boolean;
  readonly enableLanguageSwitch: boolean;
  readonly enableCalibration: boolean;
  readonly enableBufferClear: boolean;
  /** Read-backs allowed while confirming unpause or a language switch */
  readonly maxAttempts: number;
  /** Wait after clearing errors and between language read-backs */
  readonly attemptDelayMs: number;
}

export const DEFAULT_AUTO_CORRECTION_OPTIONS: AutoCorrectionOptions = {
  enableUnpause: true,
  enableClearErrors: true,
  enableReconnect: true,
  enableLanguageSwitch: false,
  enableCalibration: false,
  enableBufferClear: false,
  maxAttempts: 3,
  attemptDelayMs: 500
};

export const AutoCorrectionOptionsSchema = z.object({
  enableUnpause: z.boolean(),
  enableClearErrors: z.boolean(),
  enableReconnect: z.boolean(),
  enableLanguageSwitch: z.boolean(),
  enableCalibration: z.boolean(),
  enableBufferClear: z.boolean(),
  maxAttempts: z.number().int().min(1),
  attemptDelayMs: NonNegativeIntSchema
}).partial();

export function createAutoCorrectionOptions(overrides: Partial<AutoCorrectionOptions> = {}): AutoCorrectionOptions {
  return { ...DEFAULT_AUTO_CORRECTION_OPTIONS, ...overrides };
}

export const AutoCorrectionPresets = {
  all: createAutoCorrectionOptions({
    enableLanguageSwitch: true,
    enableCalibration: true,
    enableBufferClear: true
  }),
  none: createAutoCorrectionOptions({
    enableUnpause: false,
    enableClearErrors: false,
    enableReconnect: false
  }),
  safe: createAutoCorrectionOptions(),
  print: createAutoCorrectionOptions({
    enableReconnect: false,
    enableLanguageSwitch: true,
    enableBufferClear: true
  }),
  autoPrint: createAutoCorrectionOptions({
    enableLanguageSwitch: true,
    enableCalibration: true,
    enableBufferClear: true
  })
} as const;

export function hasAnyEnabled(options: AutoCorrectionOptions): boolean {
  return options.enableUnpause
    || options.enableClearErrors
    || options.enableReconnect
    || options.enableLanguageSwitch
    || options.enableCalibration
    || options.enableBufferClear;
}
