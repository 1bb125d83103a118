/**
 * @fileoverview Bounded self-healing against a readiness snapshot.
 *
 * Each enabled correction whose trigger holds is attempted once:
 * - connection lost → reconnect to the known address
 * - paused → unpause, confirmed by reading `device.pause` back
 * - host errors reported → clear-errors
 * - media absent → calibrate
 * - snapshot not ready → clear the receive buffer
 *
 * Corrections are independent. A failure is reported and logged, and the remaining
 * corrections still run. Nothing here throws.
 */

import {
  ControlCommands,
  SettingKeys,
  buildLanguageSwitchCommand,
  detectLanguage,
  isLanguageMatch
} from '../protocol/sgd-codec';
import {
  AutoCorrectionOptions,
  createAutoCorrectionOptions,
  hasAnyEnabled
} from '../types/auto-correction';
import type { CorrectionName, ReadinessSnapshot } from '../types/readiness';
import { hasMediaIn, isPausedIn } from '../types/readiness';
import { ErrorCode, Result, failFromUnknown, ok } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';
import { CorrectionLog } from './CorrectedReadiness';
import { StateChangeVerifier } from './StateChangeVerifier';
import { TransportBridge } from './TransportBridge';

const UNPAUSE_CHECK_DELAY_MS = 200;
const CALIBRATION_SETTLE_MS = 1000;

export interface AutoCorrectorDependencies {
  /** Receives a human-readable line for every correction step */
  readonly onStatus?: (message: string) => void;
  /** Address to reconnect to when the connection was lost */
  readonly address?: string;
}

export class AutoCorrector {
  private readonly bridge: TransportBridge;
  private readonly verifier: StateChangeVerifier;
  public readonly options: AutoCorrectionOptions;
  private readonly onStatus?: (message: string) => void;
  private readonly address?: string;

  constructor(
    bridge: TransportBridge,
    options: Partial<AutoCorrectionOptions> = {},
    dependencies: AutoCorrectorDependencies = {}
  ) {
    this.bridge = bridge;
    this.verifier = new StateChangeVerifier(bridge);
    this.options = createAutoCorrectionOptions(options);
    this.onStatus = dependencies.onStatus;
    this.address = dependencies.address;
  }

  /**
   * Attempt every enabled correction whose trigger holds in `snapshot`
   *
   * @returns true when at least one correction was attempted and succeeded
   */
  public async correctReadiness(snapshot: ReadinessSnapshot, log?: CorrectionLog): Promise<Result<boolean>> {
    if (!hasAnyEnabled(this.options)) {
      return ok(false);
    }

    let corrected = false;
    const attempt = async (name: CorrectionName, description: string, run: () => Promise<Result<unknown>>): Promise<void> => {
      this.report(`${description}...`);
      let outcome: Result<unknown>;
      try {
        outcome = await run();
      } catch (error) {
        outcome = failFromUnknown(error, ErrorCode.INTERNAL_ERROR);
      }
      if (outcome.success) {
        corrected = true;
        log?.record(name, true);
        this.report(`${name} succeeded`);
      } else {
        log?.record(name, false, outcome.error.message);
        this.report(`${name} failed: ${outcome.error.message}`);
      }
    };

    const address = this.address;
    if (this.options.enableReconnect && address !== undefined && snapshot.connection.kind === 'bad') {
      await attempt('reconnect', `Connection lost, reconnecting to ${address}`, () => this.bridge.connect(address));
    }

    if (this.options.enableUnpause && isPausedIn(snapshot) === true) {
      await attempt('unpause', 'Printer is paused, attempting to unpause', () =>
        this.verifier.setBooleanState({
          operationName: 'Unpause printer',
          command: ControlCommands.UNPAUSE,
          key: SettingKeys.PAUSE,
          desiredState: false,
          checkDelayMs: UNPAUSE_CHECK_DELAY_MS,
          maxAttempts: this.options.maxAttempts
        })
      );
    }

    if (this.options.enableClearErrors && snapshot.errors.length > 0) {
      await attempt('clearErrors', 'Attempting to clear errors', () =>
        this.verifier.executeWithDelay('Clear errors', ControlCommands.CLEAR_ERRORS, this.options.attemptDelayMs)
      );
    }

    if (this.options.enableCalibration && hasMediaIn(snapshot) === false) {
      await attempt('calibrate', 'No media detected, attempting to calibrate', () =>
        this.verifier.executeWithDelay('Calibrate printer', ControlCommands.CALIBRATE, CALIBRATION_SETTLE_MS)
      );
    }

    if (this.options.enableBufferClear && !snapshot.isReady) {
      await attempt('clearBuffer', 'Clearing receive buffer', () =>
        this.bridge.sendCommand(ControlCommands.CLEAR_BUFFER)
      );
    }

    return ok(corrected);
  }

  /**
   * Make the printer's language match the payload's
   *
   * The current language is read fresh, never from a cache. When the payload
   * language or the current setting cannot be determined, nothing is sent.
   *
   * @returns false only when a needed switch could not be confirmed
   */
  public async switchLanguageForData(payload: string, log?: CorrectionLog): Promise<boolean> {
    if (!this.options.enableLanguageSwitch) {
      return true;
    }

    const language = detectLanguage(payload);
    if (language === null) {
      return true;
    }

    const current = await this.bridge.getSetting(SettingKeys.LANGUAGES);
    if (!current.success || current.data === null) {
      logWarning('AutoCorrector', 'Could not read current printer language');
      return true;
    }
    if (isLanguageMatch(current.data, language)) {
      logVerbose('AutoCorrector', `Language already ${current.data}`);
      return true;
    }

    this.report(`Switching printer language from ${current.data} to ${language}`);
    const result = await this.verifier.setStringState({
      operationName: `Switch language to ${language}`,
      command: buildLanguageSwitchCommand(language),
      key: SettingKeys.LANGUAGES,
      validator: value => value !== null && isLanguageMatch(value, language),
      checkDelayMs: this.options.attemptDelayMs,
      maxAttempts: this.options.maxAttempts,
      errorCode: ErrorCode.LANGUAGE_MISMATCH
    });

    if (result.success) {
      log?.record('switchLanguage', true);
      this.report(`Switched printer to ${language}`);
      return true;
    }
    log?.record('switchLanguage', false, result.error.message);
    this.report(`Language switch failed: ${result.error.message}`);
    return false;
  }

  private report(message: string): void {
    logVerbose('AutoCorrector', message);
    this.onStatus?.(message);
  }
}
