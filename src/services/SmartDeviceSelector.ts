/**
 * @fileoverview Scores discovered printers and picks the best one to connect to.
 *
 * A device's score is the sum of five factors: transport preference, model
 * priority, past connection success, reported availability and discovery
 * stability. A previously selected device that is still being reported wins
 * outright. All memory lives in the caller's SelectorContext.
 *
 * Key exports:
 * - SmartDeviceSelector: scoring, selection and streaming discovery
 * - DEFAULT_SELECTOR_WEIGHTS: tunable scoring table
 * - sortedPrinters(): selection first, then the rest in discovery order
 */

import type {
  DeviceAvailability,
  DeviceDiscoverySource,
  DiscoveredDevice,
  ConnectionHistoryStore,
  ScoredDevice,
  ScoreBreakdown,
  SmartDiscoveryResult
} from '../types/printer';
import { getConfigManager } from '../managers/ConfigManager';
import { createLogger } from '../utils/logging';
import { DiscoveryLog } from './ConnectionHistory';

const logger = createLogger('SmartDeviceSelector');

// ============================================================================
// WEIGHTS
// ============================================================================

interface Threshold {
  readonly minCount: number;
  readonly score: number;
}

export interface SelectorWeights {
  readonly transport: { readonly preferred: number; readonly other: number };
  /** Checked in order against the upper-cased device name; first match wins */
  readonly models: ReadonlyArray<{ readonly pattern: string; readonly score: number }>;
  readonly modelFallback: number;
  /** Descending by minCount */
  readonly history: ReadonlyArray<Threshold>;
  readonly availability: Readonly<Record<DeviceAvailability, number>>;
  /** Descending by minCount */
  readonly stability: ReadonlyArray<Threshold>;
}

export const DEFAULT_SELECTOR_WEIGHTS: SelectorWeights = {
  transport: { preferred: 30, other: 20 },
  models: [
    { pattern: 'RW420', score: 25 },
    { pattern: 'ZQ521', score: 23 },
    { pattern: 'ZQ520', score: 22 },
    { pattern: 'ZQ510', score: 20 },
    { pattern: 'ZQ', score: 15 }
  ],
  modelFallback: 5,
  history: [
    { minCount: 5, score: 15 },
    { minCount: 3, score: 10 },
    { minCount: 1, score: 5 }
  ],
  availability: { connected: 10, ready: 8, found: 5, unknown: 3 },
  stability: [
    { minCount: 5, score: 20 },
    { minCount: 3, score: 15 },
    { minCount: 2, score: 10 },
    { minCount: 1, score: 5 }
  ]
};

function thresholdScore(thresholds: ReadonlyArray<Threshold>, count: number): number {
  return thresholds.find(threshold => count >= threshold.minCount)?.score ?? 0;
}

// ============================================================================
// SELECTOR
// ============================================================================

export interface SelectorContext {
  readonly history: ConnectionHistoryStore;
  readonly discoveryLog: DiscoveryLog;
}

export interface SelectionOptions {
  readonly previouslySelected?: DiscoveredDevice | null;
  readonly preferNetwork?: boolean;
}

export class SmartDeviceSelector {
  private readonly context: SelectorContext;
  private readonly weights: SelectorWeights;
  private readonly preferNetwork: boolean;

  constructor(context: SelectorContext, options: { weights?: SelectorWeights; preferNetwork?: boolean } = {}) {
    this.context = context;
    this.weights = options.weights ?? DEFAULT_SELECTOR_WEIGHTS;
    this.preferNetwork = options.preferNetwork ?? getConfigManager().get('PreferNetworkTransport');
  }

  public scoreDevices(devices: ReadonlyArray<DiscoveredDevice>, preferNetwork = this.preferNetwork): ScoredDevice[] {
    return devices.map(device => {
      const breakdown = this.breakdownFor(device, preferNetwork);
      const score = breakdown.transport + breakdown.model + breakdown.history + breakdown.availability + breakdown.stability;
      return { device, score, breakdown };
    });
  }

  /**
   * Record the batch as sighted and pick the best device
   *
   * @returns null when `devices` is empty
   */
  public selectOptimalPrinter(
    devices: ReadonlyArray<DiscoveredDevice>,
    options: SelectionOptions = {}
  ): DiscoveredDevice | null {
    if (devices.length === 0) {
      return null;
    }
    this.context.discoveryLog.record(devices);

    const previous = options.previouslySelected;
    if (previous) {
      const stillPresent = devices.find(device => device.address === previous.address);
      if (stillPresent) {
        logger.verbose(`Keeping previously selected printer ${stillPresent.name}`);
        return stillPresent;
      }
    }

    let best: ScoredDevice | null = null;
    for (const scored of this.scoreDevices(devices, options.preferNetwork ?? this.preferNetwork)) {
      // Strictly greater keeps the earliest device on a tie
      if (best === null || scored.score > best.score) {
        best = scored;
      }
    }
    if (best === null) {
      return null;
    }
    logger.info(`Selected printer ${best.device.name} (score: ${best.score})`);
    return best.device;
  }

  public recordSuccessfulConnection(address: string): number {
    const count = this.context.history.incrementSuccessCount(address);
    logger.verbose(`Recorded successful connection for ${address} (${count})`);
    return count;
  }

  public recordFailedConnection(address: string): void {
    logger.info(`Recorded failed connection for ${address}`);
  }

  /**
   * Follow a discovery run, yielding whenever the selection changes and once
   * more with `isComplete` when the source ends
   */
  public async *smartDiscovery(
    source: DeviceDiscoverySource,
    options: SelectionOptions = {}
  ): AsyncGenerator<SmartDiscoveryResult, void, undefined> {
    const clock = this.context.discoveryLog;
    const startedAt = clock.now();
    let selection: DiscoveredDevice | null = null;
    let allPrinters: ReadonlyArray<DiscoveredDevice> = [];

    for await (const batch of source) {
      allPrinters = [...batch];
      const next = this.selectOptimalPrinter(batch, {
        preferNetwork: options.preferNetwork,
        previouslySelected: options.previouslySelected ?? selection
      });
      if (next !== null && (selection === null || next.address !== selection.address)) {
        selection = next;
        yield { selectedPrinter: selection, allPrinters, isComplete: false, durationMs: clock.now() - startedAt };
      }
    }

    logger.info(`Smart discovery completed with ${allPrinters.length} printers`);
    yield { selectedPrinter: selection, allPrinters, isComplete: true, durationMs: clock.now() - startedAt };
  }

  private breakdownFor(device: DiscoveredDevice, preferNetwork: boolean): ScoreBreakdown {
    const isPreferred = (device.transportType === 'network') === preferNetwork;
    const name = device.name.toUpperCase();
    const model = this.weights.models.find(entry => name.includes(entry.pattern))?.score ?? this.weights.modelFallback;

    return {
      transport: isPreferred ? this.weights.transport.preferred : this.weights.transport.other,
      model,
      history: thresholdScore(this.weights.history, this.context.history.getSuccessCount(device.address)),
      availability: this.weights.availability[device.status],
      stability: thresholdScore(this.weights.stability, this.context.discoveryLog.recentSightings(device.address))
    };
  }
}

/**
 * Selection first, then the remaining devices in discovery order
 */
export function sortedPrinters(result: SmartDiscoveryResult): DiscoveredDevice[] {
  const selected = result.selectedPrinter;
  if (selected === null) {
    return [...result.allPrinters];
  }
  return [selected, ...result.allPrinters.filter(device => device.address !== selected.address)];
}

export function createSelectorContext(history: ConnectionHistoryStore, discoveryLog = new DiscoveryLog()): SelectorContext {
  return { history, discoveryLog };
}
