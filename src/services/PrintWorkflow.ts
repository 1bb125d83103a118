/**
 * @fileoverview Print workflow state machine.
 *
 * One print walks initializing → validating → connecting → connected →
 * checkingStatus → sending → waitingForCompletion → completed. Any non-terminal step
 * may end in failed or cancelled. Recoverable failures re-enter connecting after
 * the retry delay until the attempt budget runs out.
 *
 * Every transition replaces the frozen PrintState and appends a PrintEvent to the
 * run's log; the same event is emitted under its own type and under `event`.
 * Nothing is emitted after the terminal event.
 *
 * Cancellation is cooperative. cancel() is observed between steps, during retry
 * delays and during the completion wait; a transport call already in flight is
 * not interrupted.
 */

import { SettingKeys, detectLanguage, expectedLanguageSetting } from '../protocol/sgd-codec';
import type { AppConfig } from '../types/config';
import type { DiscoveredDevice, PrinterLanguage, PrinterTransport } from '../types/printer';
import { ReadinessPresets } from '../types/readiness';
import type { ReadinessOperationEvent, ReadinessOptions } from '../types/readiness';
import { AutoCorrectionPresets } from '../types/auto-correction';
import {
  INITIAL_PRINT_STATE,
  PrintErrorInfo,
  PrintEvent,
  PrintOptions,
  PrintOptionsSchema,
  PrintState,
  PrintStep,
  PrintStepInfo,
  PrintWorkflowEventMap,
  STEP_PROGRESS,
  isRetryable,
  isTerminalStep,
  toPrintErrorInfo
} from '../types/print-workflow';
import { ErrorCode, ErrorInfo, Result, errorFromUnknown, fail, failWith, ok } from '../utils/error.utils';
import { EventEmitter } from '../utils/EventEmitter';
import { createLogger } from '../utils/logging';
import { RetryPolicy } from '../utils/RetryPolicy';
import { sleep } from '../utils/timeout.utils';
import { validateToResult } from '../utils/validation.utils';
import { getConfigManager } from '../managers/ConfigManager';
import { AutoCorrector } from './AutoCorrector';
import { CorrectionLog } from './CorrectedReadiness';
import { ReadinessManager } from './ReadinessManager';
import { SmartDeviceSelector } from './SmartDeviceSelector';
import type { SelectorContext } from './SmartDeviceSelector';
import { TransportBridge } from './TransportBridge';

const logger = createLogger('PrintWorkflow');

// ============================================================================
// DWELL ESTIMATE
// ============================================================================

const PER_CHAR_MS: Readonly<Record<PrinterLanguage, number>> = { zpl: 0.1, cpcl: 0.2 };
const PER_CHAR_UNKNOWN_MS = 0.15;
const JOB_OVERHEAD_MS = 1000;
const MECHANICAL_MS = 2000;
const MIN_DWELL_MS = 3000;

/**
 * Expected time for the printer to finish a job after the payload was sent
 */
export function estimateDwellMs(payload: string, language: PrinterLanguage | null, maxWaitMs: number): number {
  const perChar = language === null ? PER_CHAR_UNKNOWN_MS : PER_CHAR_MS[language];
  const estimate = Math.round(payload.length * perChar + JOB_OVERHEAD_MS + MECHANICAL_MS);
  return Math.min(Math.max(estimate, MIN_DWELL_MS), maxWaitMs);
}

// ============================================================================
// WORKFLOW
// ============================================================================

export interface PrintWorkflowDependencies {
  readonly transport: PrinterTransport;
  /** Overrides applied on top of the process configuration */
  readonly config?: Partial<AppConfig>;
  /** Connection history updated whenever a device is connected */
  readonly selectorContext?: SelectorContext;
}

/**
 * Per-run values fixed when print() starts
 */
interface PrintRun {
  readonly payload: string;
  readonly options: PrintOptions;
  readonly config: AppConfig;
  readonly bridge: TransportBridge;
  readonly signal: AbortSignal;
}

export class PrintWorkflow extends EventEmitter<PrintWorkflowEventMap> {
  private readonly transport: PrinterTransport;
  private readonly configOverrides: Partial<AppConfig>;
  private readonly selector: SmartDeviceSelector | null;

  private state: PrintState = INITIAL_PRINT_STATE;
  private events: PrintEvent[] = [];
  private running = false;
  private abortController: AbortController | null = null;
  private connectedAddress: string | null = null;

  constructor(dependencies: PrintWorkflowDependencies) {
    super();
    this.transport = dependencies.transport;
    this.configOverrides = dependencies.config ?? {};
    this.selector = dependencies.selectorContext
      ? new SmartDeviceSelector(dependencies.selectorContext, { preferNetwork: this.configOverrides.PreferNetworkTransport })
      : null;
  }

  // ============================================================================
  // PUBLIC API
  // ============================================================================

  public getState(): PrintState {
    return this.state;
  }

  public getEvents(): ReadonlyArray<PrintEvent> {
    return Object.freeze([...this.events]);
  }

  public get isRunning(): boolean {
    return this.running;
  }

  /**
   * Whether the last print reached completed, failed or cancelled
   */
  public get isFinished(): boolean {
    return isTerminalStep(this.state.step);
  }

  /**
   * Request cancellation of the running print
   *
   * @returns false when nothing is running
   */
  public cancel(): boolean {
    if (!this.running || this.abortController === null) {
      return false;
    }
    logger.info('Cancellation requested');
    this.abortController.abort();
    return true;
  }

  /**
   * Return to the idle state and drop the event log. Ignored while running.
   */
  public reset(): void {
    if (this.running) {
      logger.warn('Ignoring reset while a print is running');
      return;
    }
    this.state = INITIAL_PRINT_STATE;
    this.events = [];
  }

  public async print(payload: string, options: PrintOptions = {}): Promise<Result<void>> {
    if (this.running) {
      return fail(ErrorCode.OPERATION_ERROR, ['A print is already in progress']);
    }
    const validOptions = validateToResult(PrintOptionsSchema, options);
    if (!validOptions.success) {
      return validOptions;
    }

    const config: AppConfig = { ...getConfigManager().getConfig(), ...this.configOverrides };
    const abortController = new AbortController();
    const run: PrintRun = {
      payload,
      options,
      config,
      signal: abortController.signal,
      bridge: new TransportBridge(this.transport, {
        connectionMs: config.ConnectionTimeoutMs,
        printMs: config.PrintTimeoutMs,
        statusQueryMs: config.StatusQueryTimeoutMs
      })
    };

    this.running = true;
    this.abortController = abortController;
    this.events = [];
    const maxAttempts = options.maxAttempts ?? config.MaxPrintAttempts;
    this.state = Object.freeze({
      ...INITIAL_PRINT_STATE,
      isRunning: true,
      maxAttempts,
      message: 'Initializing print operation',
      startedAt: new Date()
    });

    try {
      return await this.execute(run, maxAttempts);
    } catch (error) {
      logger.error('Unexpected error during print', error);
      return this.finishFailed(errorFromUnknown(error, ErrorCode.OPERATION_ERROR));
    } finally {
      this.running = false;
      this.abortController = null;
    }
  }

  // ============================================================================
  // STATE MACHINE
  // ============================================================================

  private async execute(run: PrintRun, maxAttempts: number): Promise<Result<void>> {
    this.transition('initializing', 'Initializing print operation');
    this.transition('validating', 'Validating print data');

    const validated = this.validatePayload(run.payload, run.config);
    if (!validated.success) {
      return this.finishFailed(validated.error);
    }
    const language = validated.data;
    if (run.signal.aborted) {
      return this.finishCancelled();
    }

    const policy = RetryPolicy.ofWithBackoff(maxAttempts, run.config.RetryDelayMs, {
      multiplier: run.config.RetryBackoffMultiplier,
      maxDelayMs: run.config.MaxRetryDelayMs
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.update({ currentAttempt: attempt, currentIssues: [], currentError: null });
      const outcome = await this.attempt(run, language);

      if (run.signal.aborted) {
        return this.finishCancelled();
      }
      if (outcome.success) {
        this.transition('completed', 'Print completed successfully');
        this.update({ isRunning: false, isCompleted: true });
        this.record({ type: 'completed', timestamp: new Date(), stepInfo: this.stepInfo() });
        return ok(undefined);
      }

      const errorInfo = toPrintErrorInfo(outcome.error);
      this.update({ currentError: errorInfo });
      this.record({ type: 'errorOccurred', timestamp: new Date(), errorInfo, stepInfo: this.stepInfo() });

      if (attempt >= maxAttempts || !isRetryable(errorInfo.recoverability)) {
        return this.finishFailed(outcome.error, errorInfo);
      }

      const delayMs = policy.calculateDelay(attempt);
      this.record({
        type: 'retryAttempt',
        timestamp: new Date(),
        stepInfo: this.stepInfo(),
        attempt: attempt + 1,
        maxAttempts,
        delayMs
      });
      logger.info(`Retrying print (${attempt + 1}/${maxAttempts}) in ${delayMs}ms: ${errorInfo.message}`);
      const waited = await sleep(delayMs, run.signal);
      if (!waited) {
        return this.finishCancelled();
      }
    }

    return this.finishFailed(fail(ErrorCode.PRINT_RETRY_FAILED, [maxAttempts]).error);
  }

  private async attempt(run: PrintRun, language: PrinterLanguage): Promise<Result<void>> {
    const { bridge, options, signal } = run;
    const device = options.device;

    this.transition('connecting', device ? `Connecting to ${device.name}` : 'Connecting to printer');
    const connected = await this.ensureConnected(bridge, device);
    if (!connected.success || signal.aborted) {
      return connected;
    }

    this.transition('connected', 'Connected');
    if (signal.aborted) {
      return ok(undefined);
    }

    if (options.checkStatus ?? true) {
      this.transition('checkingStatus', 'Checking printer status');
      const checked = await this.checkStatus(run, language, device);
      if (!checked.success || signal.aborted) {
        return checked;
      }
    }

    this.transition('sending', 'Sending print data');
    const sent = await bridge.sendPayload(run.payload);
    if (!sent.success) {
      return sent;
    }
    const sentAt = Date.now();
    if (signal.aborted) {
      return ok(undefined);
    }

    if (options.waitForCompletion ?? true) {
      this.transition('waitingForCompletion', 'Waiting for print completion');
      await this.waitForCompletion(run, language, sentAt);
    }
    return ok(undefined);
  }

  // ============================================================================
  // STEPS
  // ============================================================================

  private validatePayload(payload: string, config: AppConfig): Result<PrinterLanguage> {
    if (payload.trim().length === 0) {
      return fail(ErrorCode.EMPTY_DATA);
    }
    const bytes = Buffer.byteLength(payload, 'utf8');
    if (bytes > config.MaxPayloadBytes) {
      return fail(ErrorCode.PRINT_DATA_TOO_LARGE, [bytes]);
    }
    const language = detectLanguage(payload);
    if (language === null) {
      return fail(ErrorCode.PRINT_DATA_INVALID_FORMAT);
    }
    return ok(language);
  }

  /**
   * Reuse an open connection to the same address, otherwise connect. Only a
   * fresh connection counts towards the device's history.
   */
  private async ensureConnected(bridge: TransportBridge, device: DiscoveredDevice | undefined): Promise<Result<void>> {
    const isOpen = await bridge.isConnected();
    const open = isOpen.success && isOpen.data;

    if (device === undefined) {
      return open ? ok(undefined) : fail(ErrorCode.NOT_CONNECTED);
    }
    if (open && this.connectedAddress === device.address) {
      logger.verbose(`Reusing connection to ${device.address}`);
      return ok(undefined);
    }

    const result = await bridge.connect(device.address);
    if (result.success) {
      this.connectedAddress = device.address;
      this.selector?.recordSuccessfulConnection(device.address);
    } else {
      this.connectedAddress = null;
      this.selector?.recordFailedConnection(device.address);
    }
    return result;
  }

  /**
   * Readiness pass, then the language switch, then corrections for whatever
   * still blocks. Blocking issues left after that fail the attempt.
   */
  private async checkStatus(run: PrintRun, language: PrinterLanguage, device: DiscoveredDevice | undefined): Promise<Result<void>> {
    const { bridge, options, config } = run;
    const readinessOptions: ReadinessOptions = { ...ReadinessPresets.forPrinting, ...options.readiness };
    const onStatus = (status: ReadinessOperationEvent | string): void => {
      this.record({ type: 'statusUpdate', timestamp: new Date(), status });
    };
    const manager = new ReadinessManager(bridge, { languageSwitchSettleMs: config.LanguageSwitchSettleMs, onStatus });
    const corrector = new AutoCorrector(bridge, options.autoCorrection ?? AutoCorrectionPresets.safe, {
      onStatus,
      address: device?.address
    });
    const log = new CorrectionLog();

    let prepared = await manager.prepareForPrint(language, readinessOptions);
    if (!prepared.success) {
      return prepared;
    }

    if (!(await corrector.switchLanguageForData(run.payload, log))) {
      const current = await bridge.getSetting(SettingKeys.LANGUAGES);
      const reported = current.success && current.data !== null ? current.data : 'unknown';
      return fail(ErrorCode.LANGUAGE_MISMATCH, [expectedLanguageSetting(language), reported]);
    }

    if (!prepared.data.isReady) {
      const corrected = await corrector.correctReadiness(prepared.data.snapshot, log);
      if (corrected.success && corrected.data) {
        prepared = await manager.prepareForPrint(language, readinessOptions);
        if (!prepared.success) {
          return prepared;
        }
      }
    }

    const issues = prepared.data.blockingIssues;
    this.update({ currentIssues: issues });
    if (!prepared.data.isReady) {
      const summary = issues.length > 0 ? issues.join('; ') : 'readiness checks failed';
      return fail(ErrorCode.PRINTER_NOT_READY, [summary]);
    }
    if (log.size > 0) {
      logger.info(`Corrections during status check: ${log.records.map(entry => entry.name).join(', ')}`);
    }
    return ok(undefined);
  }

  private async waitForCompletion(run: PrintRun, language: PrinterLanguage, sentAt: number): Promise<void> {
    const estimateMs = estimateDwellMs(run.payload, language, run.config.MaxCompletionWaitMs);
    const remainingMs = estimateMs - (Date.now() - sentAt);
    if (remainingMs <= 0) {
      return;
    }
    this.record({
      type: 'progressUpdate',
      timestamp: new Date(),
      progressInfo: {
        progress: this.state.progress,
        currentOperation: 'Waiting for print completion',
        elapsedMs: this.elapsedMs(),
        estimatedRemainingMs: remainingMs
      }
    });
    await sleep(remainingMs, run.signal);
  }

  // ============================================================================
  // STATE AND EVENTS
  // ============================================================================

  private transition(step: PrintStep, message: string): void {
    const progress = step === 'failed' || step === 'cancelled' ? this.state.progress : STEP_PROGRESS[step];
    this.update({ step, message, progress });
    logger.verbose(`${step}: ${message}`);
    this.record({ type: 'stepChanged', timestamp: new Date(), stepInfo: this.stepInfo() });
  }

  private finishFailed(error: ErrorInfo, errorInfo: PrintErrorInfo = toPrintErrorInfo(error)): Result<void> {
    if (this.state.currentError === null) {
      this.update({ currentError: errorInfo });
      this.record({ type: 'errorOccurred', timestamp: new Date(), errorInfo, stepInfo: this.stepInfo() });
    }
    this.transition('failed', `Print failed: ${errorInfo.message}`);
    this.update({ isRunning: false });
    logger.warn(`Print failed after ${this.state.currentAttempt} attempt(s): ${errorInfo.message}`);
    return failWith(error);
  }

  private finishCancelled(): Result<void> {
    this.transition('cancelled', 'Print operation cancelled');
    this.update({ isRunning: false, isCancelled: true });
    this.record({ type: 'cancelled', timestamp: new Date(), stepInfo: this.stepInfo() });
    return fail(ErrorCode.OPERATION_CANCELLED);
  }

  private update(patch: Partial<PrintState>): void {
    this.state = Object.freeze({
      ...this.state,
      ...patch,
      currentIssues: Object.freeze([...(patch.currentIssues ?? this.state.currentIssues)]),
      elapsedMs: this.elapsedMs()
    });
  }

  private elapsedMs(): number {
    return this.state.startedAt ? Date.now() - this.state.startedAt.getTime() : 0;
  }

  private stepInfo(): PrintStepInfo {
    return {
      step: this.state.step,
      message: this.state.message,
      attempt: this.state.currentAttempt,
      maxAttempts: this.state.maxAttempts,
      elapsedMs: this.state.elapsedMs,
      progress: this.state.progress
    };
  }

  /**
   * Append to the log and emit, unless the run already ended
   */
  private record(event: PrintEvent): void {
    const last = this.events[this.events.length - 1];
    if (last && (last.type === 'completed' || last.type === 'cancelled' || (last.type === 'stepChanged' && last.stepInfo.step === 'failed'))) {
      return;
    }
    this.events.push(event);
    this.dispatch(event);
    this.emit('event', event);
  }

  private dispatch(event: PrintEvent): void {
    switch (event.type) {
      case 'stepChanged': this.emit('stepChanged', event); break;
      case 'progressUpdate': this.emit('progressUpdate', event); break;
      case 'errorOccurred': this.emit('errorOccurred', event); break;
      case 'retryAttempt': this.emit('retryAttempt', event); break;
      case 'statusUpdate': this.emit('statusUpdate', event); break;
      case 'completed': this.emit('completed', event); break;
      case 'cancelled': this.emit('cancelled', event); break;
    }
  }
}
