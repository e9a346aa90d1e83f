/**
 * Transfer outcomes.
 */

import { OperationCancelledError, PartialFailureError } from '../error/index.js';
import type { CapacityKind, CapacityUsage, TransferProgress } from '../observability/index.js';
import type { RecordFailure } from '../types/index.js';

export type TransferOperation = 'copy' | 'export' | 'import' | 'truncate' | 'wipe';

/**
 * - `completed`: every record was transferred
 * - `partial`: the run finished but some records failed
 * - `aborted`: an error stopped the run
 * - `cancelled`: the caller's signal stopped the run
 */
export type TransferStatus = 'completed' | 'partial' | 'aborted' | 'cancelled';

export interface TransferSummary {
  operation: TransferOperation;
  /** Source first, then destination where there is one */
  tables: string[];
  status: TransferStatus;
  read: number;
  written: number;
  failed: number;
  /** The first failures, up to `maxReportedFailures` */
  failures: RecordFailure[];
  elapsedMs: number;
  /** Items written per second of elapsed time */
  itemsPerSecond: number;
  /** Provider requests, throttles and consumed capacity units */
  capacity: Record<CapacityKind, CapacityUsage>;
  /** Set when aborted */
  error?: Error;
}

export function buildSummary(
  operation: TransferOperation,
  tables: string[],
  progress: TransferProgress,
  outcome: { error?: unknown; cancelled: boolean }
): TransferSummary {
  const snapshot = progress.snapshot();
  const summary: TransferSummary = {
    operation,
    tables,
    status: 'completed',
    read: snapshot.read,
    written: snapshot.written,
    failed: snapshot.failed,
    failures: progress.failures,
    elapsedMs: snapshot.elapsedMs,
    itemsPerSecond: snapshot.elapsedMs > 0 ? Math.round((snapshot.written * 1000) / snapshot.elapsedMs) : 0,
    capacity: progress.capacity(),
  };

  if (outcome.error instanceof OperationCancelledError || (outcome.error === undefined && outcome.cancelled)) {
    summary.status = 'cancelled';
  } else if (outcome.error !== undefined) {
    summary.status = 'aborted';
    summary.error = outcome.error instanceof Error ? outcome.error : new Error(String(outcome.error));
  } else if (snapshot.failed > 0) {
    summary.status = 'partial';
  }
  return summary;
}

/**
 * Process exit code for a summary: 0 completed, 1 partial, 2 aborted, 130 cancelled.
 */
export function exitCodeFor(summary: TransferSummary): number {
  switch (summary.status) {
    case 'completed':
      return 0;
    case 'partial':
      return 1;
    case 'aborted':
      return 2;
    case 'cancelled':
      return 130;
  }
}

/**
 * Throws unless the transfer completed.
 *
 * @throws {PartialFailureError} When records failed
 * @throws The abort error, or {@link OperationCancelledError}
 */
export function assertComplete(summary: TransferSummary): void {
  switch (summary.status) {
    case 'completed':
      return;
    case 'partial':
      throw new PartialFailureError(
        summary.failed,
        summary.failures.slice(0, 10).map((failure) => failure.key ?? { position: failure.position })
      );
    case 'aborted':
      throw summary.error ?? new Error(`${summary.operation} aborted`);
    case 'cancelled':
      throw new OperationCancelledError(`${summary.operation} cancelled`);
  }
}
