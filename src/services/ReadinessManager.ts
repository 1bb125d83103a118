/**
 * @fileoverview Check-and-fix pass run before a print.
 *
 * prepareForPrint walks the configured checks in a fixed order (connection, media,
 * head, pause, errors, language, then buffer clear and flush). When a check fails
 * and its fix is enabled, the fix command is sent and the dimension is re-read up to
 * `maxAttempts` times, `checkDelayMs` apart, until it reports healthy. Every check
 * and fix is reported to the status callback and recorded in the correction log.
 */

import {
  ControlCommands,
  buildLanguageSwitchCommand,
  expectedLanguageSetting,
  isLanguageMatch
} from '../protocol/sgd-codec';
import type { PrinterLanguage } from '../types/printer';
import {
  CorrectionName,
  DimensionState,
  ReadinessOperationKind,
  ReadinessOperationType,
  ReadinessOptions,
  ReadinessSnapshot,
  ReadinessStatusCallback,
  createReadinessOptions
} from '../types/readiness';
import { ErrorCode, Result, failFromUnknown, ok } from '../utils/error.utils';
import { sleep } from '../utils/timeout.utils';
import { createLogger } from '../utils/logging';
import { CorrectedReadiness, CorrectionLog } from './CorrectedReadiness';
import { PrinterReadiness } from './PrinterReadiness';
import { TransportBridge } from './TransportBridge';

const logger = createLogger('ReadinessManager');

export interface ReadinessManagerOptions {
  /** Wait after a language switch before reading the language back */
  readonly languageSwitchSettleMs?: number;
  readonly onStatus?: ReadinessStatusCallback;
}

/**
 * State shared by the steps of one prepareForPrint run
 */
interface PreparationRun {
  readonly readiness: PrinterReadiness;
  readonly options: ReadinessOptions;
  readonly log: CorrectionLog;
  readonly onStatus?: ReadinessStatusCallback;
  languageIssue: string | null;
}

export class ReadinessManager {
  private readonly bridge: TransportBridge;
  private readonly languageSwitchSettleMs: number;
  private readonly onStatus?: ReadinessStatusCallback;

  constructor(bridge: TransportBridge, options: ReadinessManagerOptions = {}) {
    this.bridge = bridge;
    this.languageSwitchSettleMs = options.languageSwitchSettleMs ?? 500;
    this.onStatus = options.onStatus;
  }

  /**
   * Run the configured checks and fixes
   *
   * @param language - payload language; the language check is skipped when null
   */
  public async prepareForPrint(
    language: PrinterLanguage | null,
    options: Partial<ReadinessOptions> = {},
    onStatus?: ReadinessStatusCallback
  ): Promise<Result<CorrectedReadiness>> {
    const startedAt = Date.now();
    const run: PreparationRun = {
      readiness: new PrinterReadiness(this.bridge, options),
      options: createReadinessOptions(options),
      log: new CorrectionLog(),
      onStatus: onStatus ?? this.onStatus,
      languageIssue: null
    };

    try {
      if (run.options.checkConnection) await this.checkConnection(run);
      if (run.options.checkMedia) await this.checkMedia(run);
      if (run.options.checkHead) await this.checkHead(run);
      if (run.options.checkPause) await this.checkPause(run);
      if (run.options.checkErrors) await this.checkErrors(run);
      if (run.options.checkLanguage && language !== null) await this.checkLanguage(run, language);
      if (run.options.clearBuffer || run.options.fixBufferIssues) {
        await this.sendBufferCommand(run, 'clearBuffer', ControlCommands.CLEAR_BUFFER);
      }
      if (run.options.flushBuffer) {
        await this.sendBufferCommand(run, 'flushBuffer', ControlCommands.FLUSH_BUFFER);
      }
    } catch (error) {
      logger.error('Printer preparation failed', error);
      return failFromUnknown(error, ErrorCode.OPERATION_ERROR);
    }

    const snapshot = run.readiness.snapshot();
    const blockingIssues = collectBlockingIssues(snapshot, run.languageIssue);
    const result = new CorrectedReadiness(snapshot, run.log.records, {
      blockingIssues,
      elapsedMs: Date.now() - startedAt
    });
    logger.info(`Printer preparation completed: ${result.summary}`);
    return ok(result);
  }

  // ============================================================================
  // CHECKS
  // ============================================================================

  private async checkConnection(run: PreparationRun): Promise<void> {
    const state = await run.readiness.ensureConnection();
    this.reportCheck(run, 'connection', state, 'Connection check passed');
  }

  private async checkMedia(run: PreparationRun): Promise<void> {
    const state = await run.readiness.ensureMedia();
    if (state.kind === 'bad' && state.value !== null && run.options.fixMediaCalibration) {
      await this.applyFix(run, {
        name: 'calibrate',
        operationType: 'media',
        command: ControlCommands.CALIBRATE,
        reread: () => {
          run.readiness.reset('media');
          return run.readiness.ensureMedia();
        }
      });
      return;
    }
    this.reportCheck(run, 'media', state, 'Media check passed');
  }

  private async checkHead(run: PreparationRun): Promise<void> {
    const state = await run.readiness.ensureHead();
    this.reportCheck(run, 'head', state, 'Head check passed');
  }

  private async checkPause(run: PreparationRun): Promise<void> {
    const state = await run.readiness.ensurePause();
    if (state.kind === 'bad' && state.value === true && run.options.fixPausedPrinter) {
      await this.applyFix(run, {
        name: 'unpause',
        operationType: 'pause',
        command: ControlCommands.UNPAUSE,
        reread: () => {
          run.readiness.reset('pause');
          return run.readiness.ensurePause();
        }
      });
      return;
    }
    this.reportCheck(run, 'pause', state, 'Pause check passed');
  }

  private async checkErrors(run: PreparationRun): Promise<void> {
    const state = await run.readiness.ensureHostStatus();
    if (run.readiness.errors.length > 0 && run.options.fixPrinterErrors) {
      await this.applyFix(run, {
        name: 'clearErrors',
        operationType: 'errors',
        command: ControlCommands.CLEAR_ERRORS,
        reread: () => {
          run.readiness.reset('hostStatus');
          return run.readiness.ensureHostStatus();
        }
      });
      return;
    }
    this.reportCheck(run, 'errors', state, 'Error check passed');
  }

  private async checkLanguage(run: PreparationRun, language: PrinterLanguage): Promise<void> {
    const state = await run.readiness.ensureLanguage();
    if (state.kind !== 'good') {
      run.languageIssue = 'Unable to read language status';
      this.reportCheck(run, 'language', state, '');
      return;
    }

    const expected = expectedLanguageSetting(language);
    if (isLanguageMatch(state.value, language)) {
      this.emit(run, 'language', 'check', true, `Language check passed for ${language}`);
      return;
    }

    const mismatch = `Language mismatch: current=${state.value}, expected=${expected}`;
    if (!run.options.fixLanguageMismatch) {
      run.languageIssue = mismatch;
      this.emit(run, 'language', 'check', false, `Language check failed: ${mismatch}`, mismatch);
      return;
    }

    const fixed = await this.applyFix(run, {
      name: 'switchLanguage',
      operationType: 'language',
      command: buildLanguageSwitchCommand(language),
      settleMs: this.languageSwitchSettleMs,
      reread: () => {
        run.readiness.reset('language');
        return run.readiness.ensureLanguage();
      },
      isFixed: reread => reread.kind === 'good' && isLanguageMatch(reread.value, language)
    });
    if (!fixed) {
      run.languageIssue = mismatch;
    }
  }

  private async sendBufferCommand(run: PreparationRun, name: 'clearBuffer' | 'flushBuffer', command: string): Promise<void> {
    const result = await this.bridge.sendCommand(command);
    const label = name === 'clearBuffer' ? 'Buffer clear' : 'Buffer flush';
    if (result.success) {
      run.log.record(name, true);
      this.emit(run, 'buffer', 'fix', true, `${label} sent`);
    } else {
      run.log.record(name, false, result.error.message);
      this.emit(run, 'buffer', 'fix', false, `${label} failed: ${result.error.message}`, result.error.message);
    }
  }

  // ============================================================================
  // FIXES
  // ============================================================================

  /**
   * Send a fix command and re-read until the dimension reports healthy
   *
   * @returns whether the fix was confirmed
   */
  private async applyFix<T>(
    run: PreparationRun,
    fix: {
      name: CorrectionName;
      operationType: ReadinessOperationType;
      command: string;
      reread: () => Promise<DimensionState<T>>;
      isFixed?: (state: DimensionState<T>) => boolean;
      settleMs?: number;
    }
  ): Promise<boolean> {
    const isFixed = fix.isFixed ?? ((state: DimensionState<T>) => state.kind === 'good');
    const sent = await this.bridge.sendCommand(fix.command);
    if (!sent.success) {
      run.log.record(fix.name, false, sent.error.message);
      this.emit(run, fix.operationType, 'fix', false, `${fix.name} failed: ${sent.error.message}`, sent.error.message);
      return false;
    }

    if (fix.settleMs !== undefined) {
      await sleep(fix.settleMs);
    }

    let state: DimensionState<T> | null = null;
    for (let attempt = 1; attempt <= run.options.maxAttempts; attempt++) {
      await sleep(run.options.checkDelayMs);
      state = await fix.reread();
      if (isFixed(state)) {
        run.log.record(fix.name, true);
        this.emit(run, fix.operationType, 'fix', true, `${fix.name} applied`);
        return true;
      }
    }

    const detail = state && state.kind === 'bad' ? state.detail : 'state did not change';
    run.log.record(fix.name, false, detail);
    this.emit(run, fix.operationType, 'fix', false, `${fix.name} failed: ${detail}`, detail);
    return false;
  }

  // ============================================================================
  // REPORTING
  // ============================================================================

  private reportCheck<T>(
    run: PreparationRun,
    operationType: ReadinessOperationType,
    state: DimensionState<T>,
    passMessage: string
  ): void {
    if (state.kind === 'good') {
      this.emit(run, operationType, 'check', true, passMessage);
    } else if (state.kind === 'bad') {
      this.emit(run, operationType, 'check', false, state.detail, state.error?.message);
    }
  }

  private emit(
    run: PreparationRun,
    operationType: ReadinessOperationType,
    operationKind: ReadinessOperationKind,
    success: boolean,
    message: string,
    errorDetails?: string
  ): void {
    logger.verbose(message);
    run.onStatus?.({
      message,
      operationType,
      operationKind,
      success,
      errorDetails,
      timestamp: new Date()
    });
  }
}

/**
 * Issues that must be resolved before sending. Language is not part of the
 * snapshot's own readiness, so an unresolved mismatch is added separately.
 */
export function collectBlockingIssues(snapshot: ReadinessSnapshot, languageIssue: string | null = null): string[] {
  const issues: string[] = [];
  for (const state of [snapshot.connection, snapshot.media, snapshot.head, snapshot.pause]) {
    if (state.kind === 'bad') {
      issues.push(state.detail);
    }
  }
  if (snapshot.errors.length > 0) {
    issues.push(...snapshot.errors);
  } else if (snapshot.hostStatus.kind === 'bad') {
    issues.push(snapshot.hostStatus.detail);
  }
  if (languageIssue !== null) {
    issues.push(languageIssue);
  }
  return issues;
}
