/**
 * @fileoverview Configuration manager for the print orchestration layer.
 *
 * Holds the live configuration in memory and emits `configUpdated` whenever a value
 * changes. Values come from three layers, later ones winning:
 * - DEFAULT_CONFIG
 * - an optional JSON file (loadFromFile), sanitized field by field
 * - LABELWRIGHT_* environment variables (applyEnvironment)
 *
 * Configuration is read-only on disk: writing it back is the host application's job.
 * Turning DebugMode on switches verbose logging on for the whole process.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import {
  AppConfig,
  MutableAppConfig,
  DEFAULT_CONFIG,
  ConfigUpdateEvent,
  PartialAppConfigSchema,
  sanitizeConfig,
  isValidConfig,
  isValidConfigKey
} from '../types/config';
import { ErrorCode, Result, fail, failFromUnknown, ok } from '../utils/error.utils';
import { logInfo, logWarning, setVerboseLogging } from '../utils/logging';

const ENV_PREFIX = 'LABELWRIGHT_';

/**
 * `MaxPrintAttempts` → `LABELWRIGHT_MAX_PRINT_ATTEMPTS`
 */
export function toEnvironmentName(key: keyof AppConfig): string {
  return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
}

function coerceEnvironmentValue(key: keyof AppConfig, raw: string): unknown {
  const trimmed = raw.trim();
  if (typeof DEFAULT_CONFIG[key] === 'boolean') {
    const lower = trimmed.toLowerCase();
    if (lower === 'true' || lower === '1') return true;
    if (lower === 'false' || lower === '0') return false;
    return trimmed;
  }
  const numeric = Number(trimmed);
  return trimmed.length > 0 && Number.isFinite(numeric) ? numeric : trimmed;
}

/**
 * Live configuration with change events
 */
export class ConfigManager extends EventEmitter {
  private currentConfig: MutableAppConfig;
  private loadedFrom: string | null = null;

  constructor(initial?: Partial<AppConfig>) {
    super();
    this.currentConfig = sanitizeConfig({ ...DEFAULT_CONFIG, ...initial });
    setVerboseLogging(this.currentConfig.DebugMode);
  }

  /**
   * Gets the complete current configuration (readonly)
   */
  public getConfig(): Readonly<AppConfig> {
    return Object.freeze({ ...this.currentConfig });
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.currentConfig[key];
  }

  /**
   * Path of the last file loaded, if any
   */
  public getLoadedPath(): string | null {
    return this.loadedFrom;
  }

  /**
   * Sets one value. Values failing validation are rejected.
   */
  public set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): Result<AppConfig> {
    const candidate: MutableAppConfig = { ...this.currentConfig };
    candidate[key] = value;
    return this.applyCandidate(candidate, { [key]: value });
  }

  /**
   * Applies several values at once; the update is all-or-nothing
   */
  public updateConfig(updates: Partial<AppConfig>): Result<AppConfig> {
    return this.applyCandidate({ ...this.currentConfig, ...updates }, updates);
  }

  private applyCandidate(candidate: AppConfig, updates: Record<string, unknown>): Result<AppConfig> {
    if (!isValidConfig(candidate)) {
      const parsed = PartialAppConfigSchema.safeParse(updates);
      const detail = parsed.success
        ? 'combined values are out of range'
        : parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return fail(ErrorCode.CONFIGURATION_ERROR, [detail]);
    }
    this.replaceConfig(candidate);
    return ok(this.getConfig());
  }

  /**
   * Resets configuration to defaults
   */
  public resetToDefaults(): void {
    this.replaceConfig({ ...DEFAULT_CONFIG });
  }

  /**
   * Loads a JSON configuration file. Invalid fields are dropped and reported; the
   * rest is applied over the current configuration.
   */
  public loadFromFile(filePath: string): Result<AppConfig> {
    let loadedData: unknown;
    try {
      loadedData = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      logWarning('ConfigManager', `Failed to read config file ${filePath}`, error);
      return failFromUnknown(error, ErrorCode.CONFIGURATION_ERROR);
    }

    if (!loadedData || typeof loadedData !== 'object' || Array.isArray(loadedData)) {
      return fail(ErrorCode.CONFIGURATION_ERROR, [`${filePath} does not contain a JSON object`]);
    }

    const sanitized = sanitizeConfig({ ...this.currentConfig, ...loadedData });
    const dropped = Object.entries(loadedData)
      .filter(([key, value]) => !isValidConfigKey(key) || sanitized[key] !== value)
      .map(([key]) => key);
    if (dropped.length > 0) {
      logWarning('ConfigManager', `Ignored invalid or unknown config keys: ${dropped.join(', ')}`);
    }

    this.loadedFrom = filePath;
    this.replaceConfig(sanitized);
    logInfo('ConfigManager', `Configuration loaded from ${filePath}`);
    return ok(this.getConfig());
  }

  /**
   * Applies LABELWRIGHT_* variables. Unparseable values are ignored with a warning.
   */
  public applyEnvironment(env: NodeJS.ProcessEnv = process.env): ReadonlyArray<keyof AppConfig> {
    const overrides: Record<string, unknown> = {};
    for (const key of Object.keys(DEFAULT_CONFIG)) {
      if (!isValidConfigKey(key)) continue;
      const raw = env[toEnvironmentName(key)];
      if (raw !== undefined) {
        overrides[key] = coerceEnvironmentValue(key, raw);
      }
    }

    const sanitized = sanitizeConfig({ ...this.currentConfig, ...overrides });
    const rejected = Object.keys(overrides).filter(key => isValidConfigKey(key) && sanitized[key] !== overrides[key]);
    if (rejected.length > 0) {
      logWarning('ConfigManager', `Ignored invalid environment overrides: ${rejected.join(', ')}`);
    }
    return this.replaceConfig(sanitized);
  }

  private replaceConfig(next: AppConfig): ReadonlyArray<keyof AppConfig> {
    const previous = this.getConfig();
    const changedKeys = Object.keys(DEFAULT_CONFIG)
      .filter(isValidConfigKey)
      .filter(key => previous[key] !== next[key]);

    this.currentConfig = { ...next };
    if (changedKeys.length > 0) {
      if (changedKeys.includes('DebugMode')) {
        setVerboseLogging(next.DebugMode);
      }
      const event: ConfigUpdateEvent = {
        previous,
        current: this.getConfig(),
        changedKeys
      };
      this.emit('configUpdated', event);
    }
    return changedKeys;
  }
}

let defaultManager: ConfigManager | null = null;

/**
 * Process-wide manager created on first use
 */
export function getConfigManager(): ConfigManager {
  if (!defaultManager) {
    defaultManager = new ConfigManager();
  }
  return defaultManager;
}
