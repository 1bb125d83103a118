/**
 * @fileoverview Readiness snapshot paired with the log of corrections applied to reach it.
 */

import type { CorrectionName, CorrectionRecord, ReadinessSnapshot } from '../types/readiness';

/**
 * Append-only correction log
 */
export class CorrectionLog {
  private readonly entries: CorrectionRecord[] = [];

  public record(name: CorrectionName, success: boolean, error?: string): CorrectionRecord {
    const entry: CorrectionRecord = Object.freeze(
      error === undefined
        ? { name, success, timestamp: new Date() }
        : { name, success, error, timestamp: new Date() }
    );
    this.entries.push(entry);
    return entry;
  }

  public get records(): ReadonlyArray<CorrectionRecord> {
    return [...this.entries];
  }

  public get size(): number {
    return this.entries.length;
  }
}

export class CorrectedReadiness {
  public readonly snapshot: ReadinessSnapshot;
  public readonly corrections: ReadonlyArray<CorrectionRecord>;
  public readonly blockingIssues: ReadonlyArray<string>;
  public readonly elapsedMs: number;
  public readonly timestamp: Date;

  constructor(
    snapshot: ReadinessSnapshot,
    corrections: ReadonlyArray<CorrectionRecord> = [],
    details: { blockingIssues?: ReadonlyArray<string>; elapsedMs?: number } = {}
  ) {
    this.snapshot = snapshot;
    this.corrections = Object.freeze([...corrections]);
    this.blockingIssues = Object.freeze([...(details.blockingIssues ?? [])]);
    this.elapsedMs = details.elapsedMs ?? 0;
    this.timestamp = new Date();
  }

  public get isReady(): boolean {
    return this.snapshot.isReady && this.blockingIssues.length === 0;
  }

  public get hasCorrections(): boolean {
    return this.corrections.length > 0;
  }

  public get allCorrectionsSuccessful(): boolean {
    return this.corrections.every(entry => entry.success);
  }

  public get hasFailedCorrections(): boolean {
    return this.corrections.some(entry => !entry.success);
  }

  public get appliedCorrections(): CorrectionName[] {
    return this.corrections.filter(entry => entry.success).map(entry => entry.name);
  }

  public get failedCorrections(): CorrectionName[] {
    return this.corrections.filter(entry => !entry.success).map(entry => entry.name);
  }

  /**
   * `Fixed: unpause, clearErrors; Failed: calibrate`
   */
  public get correctionSummary(): string {
    if (!this.hasCorrections) {
      return 'No corrections applied';
    }
    const parts: string[] = [];
    if (this.appliedCorrections.length > 0) parts.push(`Fixed: ${this.appliedCorrections.join(', ')}`);
    if (this.failedCorrections.length > 0) parts.push(`Failed: ${this.failedCorrections.join(', ')}`);
    return parts.join('; ');
  }

  public get detailedCorrectionInfo(): string {
    if (!this.hasCorrections) {
      return 'No corrections attempted';
    }
    const lines = [`Corrections applied at ${this.timestamp.toISOString()}:`];
    for (const entry of this.corrections) {
      const outcome = entry.success ? 'SUCCESS' : 'FAILED';
      lines.push(entry.error ? `  - ${entry.name}: ${outcome} (${entry.error})` : `  - ${entry.name}: ${outcome}`);
    }
    return lines.join('\n');
  }

  public get summary(): string {
    return `Ready: ${this.isReady}, Fixes: ${this.appliedCorrections.length}, Failed: ${this.failedCorrections.length}`;
  }
}
