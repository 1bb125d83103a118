/**
 * @fileoverview Caller-owned memory used by device selection.
 *
 * InMemoryConnectionHistory counts successful connections per address.
 * DiscoveryLog remembers when each address was seen by discovery so that devices
 * reported consistently score as more stable. Both are plain objects the caller
 * creates and passes in; nothing is shared between instances.
 */

import type { ConnectionHistoryStore, DiscoveredDevice } from '../types/printer';

export type Clock = () => number;

export class InMemoryConnectionHistory implements ConnectionHistoryStore {
  private readonly counts = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [address, count] of Object.entries(initial)) {
      this.counts.set(address, count);
    }
  }

  public getSuccessCount(address: string): number {
    return this.counts.get(address) ?? 0;
  }

  public incrementSuccessCount(address: string): number {
    const next = this.getSuccessCount(address) + 1;
    this.counts.set(address, next);
    return next;
  }

  public toJSON(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

export interface DiscoveryLogOptions {
  /** Sightings older than this are dropped */
  readonly retentionMs?: number;
  /** Window counted by recentSightings() */
  readonly stabilityWindowMs?: number;
  /** Addresses not seen for this long are forgotten */
  readonly forgetAfterMs?: number;
}

export class DiscoveryLog {
  private readonly clock: Clock;
  private readonly retentionMs: number;
  private readonly stabilityWindowMs: number;
  private readonly forgetAfterMs: number;
  private readonly sightings = new Map<string, number[]>();
  private readonly lastSeen = new Map<string, number>();

  constructor(clock: Clock = Date.now, options: DiscoveryLogOptions = {}) {
    this.clock = clock;
    this.retentionMs = options.retentionMs ?? 60_000;
    this.stabilityWindowMs = options.stabilityWindowMs ?? 30_000;
    this.forgetAfterMs = options.forgetAfterMs ?? 120_000;
  }

  /**
   * Note one sighting of every device in a discovery batch
   */
  public record(devices: ReadonlyArray<DiscoveredDevice>): void {
    const now = this.clock();
    for (const device of devices) {
      const kept = (this.sightings.get(device.address) ?? []).filter(time => now - time < this.retentionMs);
      kept.push(now);
      this.sightings.set(device.address, kept);
      this.lastSeen.set(device.address, now);
    }

    for (const [address, seenAt] of this.lastSeen) {
      if (now - seenAt > this.forgetAfterMs) {
        this.lastSeen.delete(address);
        this.sightings.delete(address);
      }
    }
  }

  /**
   * Sightings of `address` within the stability window
   */
  public recentSightings(address: string): number {
    const now = this.clock();
    return (this.sightings.get(address) ?? []).filter(time => now - time < this.stabilityWindowMs).length;
  }

  public sightingCount(address: string): number {
    return this.sightings.get(address)?.length ?? 0;
  }

  public now(): number {
    return this.clock();
  }
}
