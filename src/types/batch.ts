/**
 * Batch write types.
 */

import type { Item, Key } from './item.js';

export type WriteMode = 'put' | 'delete';

export type WriteRequest = { type: 'put'; item: Item } | { type: 'delete'; key: Key };

/**
 * Result of one batch submit. Requests not listed in `unprocessed` succeeded.
 */
export interface BatchWriteOutcome {
  unprocessed: WriteRequest[];
  /** Write capacity units the request consumed, when the provider reports it */
  consumedCapacity?: number;
}

export type FailureReason = 'unprocessed' | 'malformed' | 'rejected';

/**
 * A record that was permanently not written.
 */
export interface RecordFailure {
  /** Key of the record, when it could be determined */
  key?: Key;
  /** Source position for records read from a file (1-based line or row) */
  position?: number;
  reason: FailureReason;
  code: string;
  message: string;
}

export interface WriteSummary {
  written: number;
  failed: number;
  /** The first failures, bounded by the configured report limit */
  failures: RecordFailure[];
}
