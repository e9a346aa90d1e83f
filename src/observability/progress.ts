/**
 * Running counters for one transfer.
 *
 * Every component of a transfer reports through the same TransferProgress
 * instance. Updates happen on the event loop thread between awaits, so
 * plain increments are race-free.
 */

import type { RecordFailure } from '../types/index.js';
import type { MetricsCollector } from './metrics.js';
import { TransferMetricNames } from './metrics.js';

export interface ProgressSnapshot {
  read: number;
  written: number;
  failed: number;
  elapsedMs: number;
}

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

export type CapacityKind = 'read' | 'write';

/**
 * Provider requests of one kind and the capacity they consumed.
 */
export interface CapacityUsage {
  /** Requests that succeeded */
  requests: number;
  /** Attempts the provider throttled */
  throttles: number;
  consumedUnits: number;
  /** Largest consumption of a single request */
  maxUnits: number;
}

function emptyUsage(): CapacityUsage {
  return { requests: 0, throttles: 0, consumedUnits: 0, maxUnits: 0 };
}

export interface TransferProgressOptions {
  /** Failures kept for the summary; the count is always exact */
  maxReportedFailures?: number;
  onProgress?: ProgressListener;
  metrics?: MetricsCollector;
  /** Labels attached to every metric */
  labels?: Record<string, string>;
}

export class TransferProgress {
  private readCount = 0;
  private writtenCount = 0;
  private failedCount = 0;
  private readonly reported: RecordFailure[] = [];
  private readonly usage: Record<CapacityKind, CapacityUsage> = { read: emptyUsage(), write: emptyUsage() };
  private readonly startedAt = Date.now();
  private readonly maxReportedFailures: number;
  private readonly onProgress?: ProgressListener;
  private readonly metrics?: MetricsCollector;
  private readonly labels?: Record<string, string>;

  constructor(options: TransferProgressOptions = {}) {
    this.maxReportedFailures = options.maxReportedFailures ?? 100;
    this.onProgress = options.onProgress;
    this.metrics = options.metrics;
    this.labels = options.labels;
  }

  recordRead(count: number = 1): void {
    this.readCount += count;
    this.metrics?.incrementCounter(TransferMetricNames.ITEMS_READ, count, this.labels);
    this.notify();
  }

  recordWritten(count: number): void {
    if (count <= 0) {
      return;
    }
    this.writtenCount += count;
    this.metrics?.incrementCounter(TransferMetricNames.ITEMS_WRITTEN, count, this.labels);
    this.notify();
  }

  recordFailure(failure: RecordFailure): void {
    this.failedCount++;
    if (this.reported.length < this.maxReportedFailures) {
      this.reported.push(failure);
    }
    this.metrics?.incrementCounter(TransferMetricNames.ITEMS_FAILED, 1, {
      ...this.labels,
      reason: failure.reason,
    });
    this.notify();
  }

  /**
   * Counts one successful provider request and the units it reported.
   */
  recordRequest(kind: CapacityKind, consumedUnits?: number): void {
    const usage = this.usage[kind];
    usage.requests++;
    if (consumedUnits === undefined || consumedUnits <= 0) {
      return;
    }
    usage.consumedUnits += consumedUnits;
    usage.maxUnits = Math.max(usage.maxUnits, consumedUnits);
    this.metrics?.incrementCounter(TransferMetricNames.CONSUMED_CAPACITY, consumedUnits, { ...this.labels, kind });
  }

  recordThrottle(kind: CapacityKind): void {
    this.usage[kind].throttles++;
  }

  capacity(): Record<CapacityKind, CapacityUsage> {
    return { read: { ...this.usage.read }, write: { ...this.usage.write } };
  }

  get read(): number {
    return this.readCount;
  }

  get written(): number {
    return this.writtenCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get failures(): RecordFailure[] {
    return [...this.reported];
  }

  snapshot(): ProgressSnapshot {
    return {
      read: this.readCount,
      written: this.writtenCount,
      failed: this.failedCount,
      elapsedMs: Date.now() - this.startedAt,
    };
  }

  private notify(): void {
    this.onProgress?.(this.snapshot());
  }
}
