/**
 * @fileoverview Lazy, cached readiness evaluation of one printer.
 *
 * Six dimensions are read independently: connection, media, head, pause, host status
 * and language. The first access to a dimension issues exactly one transport call;
 * concurrent first accesses share the same in-flight promise. The outcome (value or
 * captured error) stays cached until reset().
 *
 * isReady is a pure read of the cache and never queries. readAllStatuses() is the
 * only call that populates every configured dimension at once.
 */

import { SettingKeys } from '../protocol/sgd-codec';
import { hasMedia, isHeadClosed, parseHostStatus, toBool } from '../protocol/status-parser';
import {
  DimensionState,
  DimensionStates,
  DimensionValues,
  READINESS_DIMENSIONS,
  ReadinessDimension,
  ReadinessOptions,
  ReadinessSnapshot,
  UNCHECKED,
  bad,
  createReadinessOptions,
  good
} from '../types/readiness';
import { TransportBridge } from './TransportBridge';
import { logVerbose, logWarning } from '../utils/logging';

type PendingReads = { [D in ReadinessDimension]?: Promise<DimensionState<DimensionValues[D]>> };

const DIMENSION_KEYS: Readonly<Record<Exclude<ReadinessDimension, 'connection'>, string>> = {
  media: SettingKeys.MEDIA_STATUS,
  head: SettingKeys.HEAD_LATCH,
  pause: SettingKeys.PAUSE,
  hostStatus: SettingKeys.HOST_STATUS,
  language: SettingKeys.LANGUAGES
};

// Language never blocks; a mismatch is corrected rather than reported
const BLOCKING_CHECKS: ReadonlyArray<readonly [ReadinessDimension, 'checkConnection' | 'checkMedia' | 'checkHead' | 'checkPause' | 'checkErrors']> = [
  ['connection', 'checkConnection'],
  ['media', 'checkMedia'],
  ['head', 'checkHead'],
  ['pause', 'checkPause'],
  ['hostStatus', 'checkErrors']
];

function initialStates(): DimensionStates {
  return {
    connection: UNCHECKED,
    media: UNCHECKED,
    head: UNCHECKED,
    pause: UNCHECKED,
    hostStatus: UNCHECKED,
    language: UNCHECKED
  };
}

export class PrinterReadiness {
  private readonly bridge: TransportBridge;
  public readonly options: ReadinessOptions;

  private states: DimensionStates = initialStates();
  private pending: PendingReads = {};
  // Bumped on reset so a read started before the reset cannot repopulate the cache
  private generations: Record<ReadinessDimension, number> = {
    connection: 0,
    media: 0,
    head: 0,
    pause: 0,
    hostStatus: 0,
    language: 0
  };
  private hostErrors: string[] = [];
  private warningList: string[] = [];
  private lastCheckedAt: Date | null = null;

  constructor(bridge: TransportBridge, options: Partial<ReadinessOptions> = {}) {
    this.bridge = bridge;
    this.options = createReadinessOptions(options);
  }

  // ============================================================================
  // LAZY DIMENSIONS
  // ============================================================================

  public ensureConnection(): Promise<DimensionState<boolean>> {
    return this.ensure('connection', async () => {
      const result = await this.bridge.isConnected();
      if (!result.success) {
        return bad<boolean>(null, result.error.message, result.error);
      }
      return result.data ? good(true) : bad(false, 'Printer not connected');
    });
  }

  public ensureMedia(): Promise<DimensionState<string>> {
    return this.ensure('media', () => this.readSetting('media', value =>
      hasMedia(value) ? good(value) : bad(value, `No media detected (${value})`)
    ));
  }

  public ensureHead(): Promise<DimensionState<string>> {
    return this.ensure('head', () => this.readSetting('head', value =>
      isHeadClosed(value) ? good(value) : bad(value, 'Print head is open')
    ));
  }

  public ensurePause(): Promise<DimensionState<boolean>> {
    return this.ensure('pause', () => this.readSetting('pause', value => {
      const paused = toBool(value);
      if (paused === null) {
        return bad<boolean>(null, `Unrecognised pause state: ${value}`);
      }
      return paused ? bad(true, 'Printer is paused') : good(false);
    }));
  }

  public ensureHostStatus(): Promise<DimensionState<DimensionValues['hostStatus']>> {
    return this.ensure('hostStatus', () => this.readSetting('hostStatus', value => {
      const info = parseHostStatus(value);
      if (info.isOk) {
        return good(info);
      }
      return bad(info, info.errorMessage ?? `Printer error: ${value}`);
    }));
  }

  public ensureLanguage(): Promise<DimensionState<string>> {
    return this.ensure('language', () => this.readSetting('language', value => good(value)));
  }

  /**
   * Host-reported errors, reading the host status first when needed
   */
  public async ensureErrors(): Promise<ReadonlyArray<string>> {
    await this.ensureHostStatus();
    return this.errors;
  }

  /**
   * Populate every dimension enabled in the options, in parallel
   */
  public async readAllStatuses(): Promise<ReadinessSnapshot> {
    const reads: Array<Promise<unknown>> = [];
    if (this.options.checkConnection) reads.push(this.ensureConnection());
    if (this.options.checkMedia) reads.push(this.ensureMedia());
    if (this.options.checkHead) reads.push(this.ensureHead());
    if (this.options.checkPause) reads.push(this.ensurePause());
    if (this.options.checkErrors) reads.push(this.ensureHostStatus());
    if (this.options.checkLanguage) reads.push(this.ensureLanguage());
    await Promise.all(reads);
    return this.snapshot();
  }

  // ============================================================================
  // CACHED STATE
  // ============================================================================

  public getState<D extends ReadinessDimension>(dimension: D): DimensionStates[D] {
    return this.states[dimension];
  }

  public isChecked(dimension: ReadinessDimension): boolean {
    return this.states[dimension].kind !== 'unchecked';
  }

  /**
   * False when a dimension the options check (language aside) is bad, or the
   * host reported errors. Never queries.
   */
  public get isReady(): boolean {
    const blocking = BLOCKING_CHECKS.filter(([, flag]) => this.options[flag]);
    if (blocking.some(([dimension]) => this.states[dimension].kind === 'bad')) {
      return false;
    }
    return !this.options.checkErrors || this.hostErrors.length === 0;
  }

  public get errors(): ReadonlyArray<string> {
    return [...this.hostErrors];
  }

  public get warnings(): ReadonlyArray<string> {
    return [...this.warningList];
  }

  public get checkedAt(): Date | null {
    return this.lastCheckedAt;
  }

  public snapshot(): ReadinessSnapshot {
    return Object.freeze({
      ...this.states,
      errors: Object.freeze([...this.hostErrors]),
      warnings: Object.freeze([...this.warningList]),
      checkedAt: this.lastCheckedAt,
      isReady: this.isReady
    });
  }

  public reset(dimension: ReadinessDimension): void {
    this.generations[dimension]++;
    this.states = { ...this.states, [dimension]: UNCHECKED };
    delete this.pending[dimension];
    if (dimension === 'hostStatus') {
      this.hostErrors = [];
    }
  }

  public resetAll(): void {
    for (const dimension of READINESS_DIMENSIONS) {
      this.reset(dimension);
    }
    this.warningList = [];
    this.lastCheckedAt = null;
  }

  // ============================================================================
  // READ PLUMBING
  // ============================================================================

  private ensure<D extends ReadinessDimension>(
    dimension: D,
    read: () => Promise<DimensionState<DimensionValues[D]>>
  ): Promise<DimensionState<DimensionValues[D]>> {
    const cached: DimensionState<DimensionValues[D]> = this.states[dimension];
    if (cached.kind !== 'unchecked') {
      return Promise.resolve(cached);
    }

    const inFlight = this.pending[dimension];
    if (inFlight) {
      return inFlight;
    }

    const generation = this.generations[dimension];
    const current = () => this.generations[dimension] === generation;
    const promise = read()
      .then(state => {
        if (current()) {
          this.store(dimension, state);
        }
        return state;
      })
      .finally(() => {
        // A rejected read is not cached, so the next access queries again
        if (current()) {
          delete this.pending[dimension];
        }
      });
    this.pending = { ...this.pending, [dimension]: promise };
    return promise;
  }

  private store<D extends ReadinessDimension>(dimension: D, state: DimensionState<DimensionValues[D]>): void {
    this.states = { ...this.states, [dimension]: state };
    this.lastCheckedAt = new Date();

    if (dimension === 'hostStatus') {
      this.hostErrors = this.collectHostErrors();
    }
    logVerbose('PrinterReadiness', `${dimension}: ${state.kind}`);
  }

  private collectHostErrors(): string[] {
    const state = this.states.hostStatus;
    if (state.kind !== 'bad' || state.value === null) {
      return [];
    }
    const info = state.value;
    const errors = [state.detail];
    if (info.errorCode !== null) {
      errors.push(`Error code: ${info.errorCode}`);
    }
    return errors;
  }

  private async readSetting<D extends Exclude<ReadinessDimension, 'connection'>>(
    dimension: D,
    interpret: (value: string) => DimensionState<DimensionValues[D]>
  ): Promise<DimensionState<DimensionValues[D]>> {
    const key = DIMENSION_KEYS[dimension];
    const result = await this.bridge.getSetting(key);
    if (!result.success) {
      this.warningList.push(`Failed to read ${key}: ${result.error.message}`);
      logWarning('PrinterReadiness', `Failed to read ${key}: ${result.error.message}`);
      return bad<DimensionValues[D]>(null, result.error.message, result.error);
    }
    if (result.data === null) {
      this.warningList.push(`No response for ${key}`);
      return bad<DimensionValues[D]>(null, `No response for ${key}`);
    }
    return interpret(result.data);
  }
}
