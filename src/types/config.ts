/**
 * @fileoverview Runtime configuration for the print orchestration layer.
 *
 * Key Features:
 * - AppConfig interface with readonly properties
 * - MutableAppConfig for internal modification
 * - DEFAULT_CONFIG constant values
 * - zod schema backing isValidConfig and sanitizeConfig
 * - ConfigUpdateEvent for change listeners
 *
 * Configuration Categories:
 * - Workflow: MaxPrintAttempts, RetryDelayMs, RetryBackoffMultiplier, MaxRetryDelayMs
 * - Transport timeouts: ConnectionTimeoutMs, PrintTimeoutMs, StatusQueryTimeoutMs
 * - Payload: MaxPayloadBytes, MaxCompletionWaitMs, LanguageSwitchSettleMs
 * - Selection: PreferNetworkTransport
 * - Advanced: DebugMode
 *
 * @module types/config
 */

import { z } from 'zod';

export interface AppConfig {
  // Workflow
  readonly MaxPrintAttempts: number;
  readonly RetryDelayMs: number;
  readonly RetryBackoffMultiplier: number;
  readonly MaxRetryDelayMs: number;

  // Transport timeouts
  readonly ConnectionTimeoutMs: number;
  readonly PrintTimeoutMs: number;
  readonly StatusQueryTimeoutMs: number;

  // Payload
  readonly MaxPayloadBytes: number;
  readonly MaxCompletionWaitMs: number;
  readonly LanguageSwitchSettleMs: number;

  // Selection
  readonly PreferNetworkTransport: boolean;

  // Advanced
  readonly DebugMode: boolean;
}

export type MutableAppConfig = { -readonly [K in keyof AppConfig]: AppConfig[K] };

export const DEFAULT_CONFIG: AppConfig = {
  MaxPrintAttempts: 3,
  RetryDelayMs: 500,
  RetryBackoffMultiplier: 1,
  MaxRetryDelayMs: 30000,

  ConnectionTimeoutMs: 10000,
  PrintTimeoutMs: 30000,
  StatusQueryTimeoutMs: 5000,

  MaxPayloadBytes: 1000000,
  MaxCompletionWaitMs: 30000,
  LanguageSwitchSettleMs: 500,

  PreferNetworkTransport: true,

  DebugMode: false
} as const;

const durationMs = z.number().int().min(0);

export const AppConfigSchema = z.object({
  MaxPrintAttempts: z.number().int().min(1).max(20),
  RetryDelayMs: durationMs,
  RetryBackoffMultiplier: z.number().min(1).max(10),
  MaxRetryDelayMs: durationMs,
  ConnectionTimeoutMs: durationMs.min(1),
  PrintTimeoutMs: durationMs.min(1),
  StatusQueryTimeoutMs: durationMs.min(1),
  MaxPayloadBytes: z.number().int().min(1),
  MaxCompletionWaitMs: durationMs,
  LanguageSwitchSettleMs: durationMs,
  PreferNetworkTransport: z.boolean(),
  DebugMode: z.boolean()
});

/**
 * Same fields, every one optional, unknown keys dropped
 */
export const PartialAppConfigSchema = AppConfigSchema.partial();

export interface ConfigUpdateEvent {
  readonly previous: Readonly<AppConfig>;
  readonly current: Readonly<AppConfig>;
  readonly changedKeys: ReadonlyArray<keyof AppConfig>;
}

export function isValidConfigKey(key: string): key is keyof AppConfig {
  return key in DEFAULT_CONFIG;
}

export function isValidConfig(config: unknown): config is AppConfig {
  return AppConfigSchema.safeParse(config).success;
}

/**
 * Merge whatever valid fields `config` carries over the defaults. Invalid or
 * unknown fields are dropped one by one, so a single bad value never discards
 * the rest of the file.
 */
export function sanitizeConfig(config: unknown): AppConfig {
  if (!config || typeof config !== 'object') {
    return { ...DEFAULT_CONFIG };
  }

  const shape = AppConfigSchema.shape;
  const accepted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    if (isValidConfigKey(key) && shape[key].safeParse(value).success) {
      accepted[key] = value;
    }
  }

  const parsed = PartialAppConfigSchema.safeParse(accepted);
  return parsed.success ? { ...DEFAULT_CONFIG, ...parsed.data } : { ...DEFAULT_CONFIG };
}
