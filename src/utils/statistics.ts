// src/utils/statistics.ts

import type {
  ConversionStatisticsDetails,
  ConversionStatisticsSnapshot,
} from '../types/signal-types.js';

const MAX_RECENT_ERRORS = 10;

/**
 * Counters kept by the conversion engine.
 * Every update is a synchronous read-modify-write, so calls interleaving on
 * the event loop cannot lose increments.
 */
export class ConversionStatistics {
  private received: number = 0;
  private converted: number = 0;
  private signalsEmitted: number = 0;
  private errors: number = 0;
  private lastErrorMessage: string | null = null;
  private lastErrorTimestamp: string | null = null;
  private lastErrors: string[] = [];
  private receivedById: Map<number, number> = new Map();
  private totalResets: number = 0;

  /**
   * Records a conversion attempt.
   * @param frameId - identifier of the frame, when it could be read
   */
  recordReceived(frameId?: number): void {
    this.received++;
    if (frameId !== undefined) {
      this.receivedById.set(frameId, (this.receivedById.get(frameId) ?? 0) + 1);
    }
  }

  /**
   * Records a conversion that produced at least one value.
   */
  recordConverted(signalCount: number): void {
    this.converted++;
    this.signalsEmitted += signalCount;
  }

  recordError(error: unknown): void {
    this.errors++;
    this.lastErrorMessage = error instanceof Error ? error.message : String(error);
    this.lastErrorTimestamp = new Date().toISOString();
    this.lastErrors.push(this.lastErrorMessage);
    if (this.lastErrors.length > MAX_RECENT_ERRORS) this.lastErrors.shift();
  }

  /**
   * Copy of the four counters.
   */
  snapshot(): ConversionStatisticsSnapshot {
    return {
      received: this.received,
      converted: this.converted,
      signalsEmitted: this.signalsEmitted,
      errors: this.errors,
    };
  }

  /**
   * Snapshot plus error history; nothing in it is shared with this object.
   */
  details(): ConversionStatisticsDetails {
    return {
      ...this.snapshot(),
      lastError: this.lastError,
      recentErrors: this.recentErrors,
      conversionRate: this.conversionRate,
      receivedByFrameId: this.receivedByFrameId(),
      resetCount: this.totalResets,
    };
  }

  /** Number of conversion attempts per frame id */
  receivedByFrameId(): Map<number, number> {
    return new Map(this.receivedById);
  }

  get lastError(): { message: string; timestamp: string } | null {
    if (this.lastErrorMessage === null || this.lastErrorTimestamp === null) return null;
    return { message: this.lastErrorMessage, timestamp: this.lastErrorTimestamp };
  }

  get recentErrors(): string[] {
    return [...this.lastErrors];
  }

  /**
   * Share of received frames that produced values, in percent.
   */
  get conversionRate(): number | null {
    return this.received === 0 ? null : (this.converted / this.received) * 100;
  }

  get resetCount(): number {
    return this.totalResets;
  }

  reset(): void {
    this.received = 0;
    this.converted = 0;
    this.signalsEmitted = 0;
    this.errors = 0;
    this.lastErrorMessage = null;
    this.lastErrorTimestamp = null;
    this.lastErrors = [];
    this.receivedById.clear();
    this.totalResets++;
  }
}
