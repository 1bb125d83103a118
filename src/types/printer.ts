/**
 * @fileoverview Printer, transport and discovery type definitions.
 *
 * Key exports:
 * - PrinterLanguage: payload markup languages the orchestration layer recognises
 * - DiscoveredDevice: a device reported by discovery, with transport and availability
 * - PrinterTransport: the byte-level collaborator; every method resolves to a Result
 * - ConnectionHistoryStore: per-address success counter owned by the caller
 * - DeviceDiscoverySource: async stream of discovery batches
 */

import type { Result } from '../utils/error.utils';

/**
 * Payload markup languages
 */
export type PrinterLanguage = 'zpl' | 'cpcl';

/**
 * How a device is reached
 */
export type TransportType = 'network' | 'radio';

/**
 * Availability reported alongside a discovered device
 */
export type DeviceAvailability = 'connected' | 'ready' | 'found' | 'unknown';

/**
 * Device reported by discovery
 */
export interface DiscoveredDevice {
  readonly address: string;
  readonly name: string;
  readonly transportType: TransportType;
  readonly status: DeviceAvailability;
}

/**
 * Byte-level transport to one printer at a time.
 *
 * Implementations must not throw; failures are reported as failed Results.
 * Callers still guard against a throwing implementation.
 */
export interface PrinterTransport {
  connect(address: string): Promise<Result<void>>;
  disconnect(): Promise<Result<void>>;
  isConnected(): Promise<Result<boolean>>;
  /**
   * Send a getvar for `key` and resolve with the raw response text
   */
  query(key: string): Promise<Result<string>>;
  sendRaw(bytes: Uint8Array): Promise<Result<void>>;
}

/**
 * Address → successful connection count. Get and increment only.
 */
export interface ConnectionHistoryStore {
  getSuccessCount(address: string): number;
  incrementSuccessCount(address: string): number;
}

/**
 * A discovery run. Each yielded batch is the full list of devices seen so far.
 */
export type DeviceDiscoverySource = AsyncIterable<ReadonlyArray<DiscoveredDevice>>;

/**
 * Per-factor contribution to a device's score
 */
export interface ScoreBreakdown {
  readonly transport: number;
  readonly model: number;
  readonly history: number;
  readonly availability: number;
  readonly stability: number;
}

export interface ScoredDevice {
  readonly device: DiscoveredDevice;
  readonly score: number;
  readonly breakdown: ScoreBreakdown;
}

/**
 * Progress of a smart discovery run
 */
export interface SmartDiscoveryResult {
  readonly selectedPrinter: DiscoveredDevice | null;
  readonly allPrinters: ReadonlyArray<DiscoveredDevice>;
  readonly isComplete: boolean;
  readonly durationMs: number;
}

/**
 * Per-call transport timeouts in milliseconds
 */
export interface TransportTimeouts {
  readonly connectionMs: number;
  readonly printMs: number;
  readonly statusQueryMs: number;
}

export const DEFAULT_TRANSPORT_TIMEOUTS: TransportTimeouts = {
  connectionMs: 10000,
  printMs: 30000,
  statusQueryMs: 5000
};
