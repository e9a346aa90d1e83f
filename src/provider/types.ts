/**
 * Table service boundary.
 *
 * The engine talks to the store only through {@link TableService}; the
 * DynamoDB implementation and the in-memory test double both satisfy it.
 */

import type {
  BatchWriteOutcome,
  Page,
  ScanPageRequest,
  TableDefinition,
  TableDescriptor,
  WriteRequest,
} from '../types/index.js';

export interface ProviderLimits {
  /** Upper bound for a scan page; unset means the provider sizes pages itself */
  maxPageSize?: number;
  maxBatchItems: number;
  maxBatchBytes: number;
  maxItemBytes: number;
  /** Whether empty SS/NS/BS values can be stored */
  allowsEmptySets: boolean;
}

export interface ProviderCapabilities {
  /** Scan accepts a filter and applies it before returning a page */
  filterPushdown: boolean;
}

export type TableWaitState = 'ACTIVE' | 'DELETED';

/**
 * A key-value table store. `TToken` is the continuation token type, which
 * callers only pass back unchanged.
 */
export interface TableService<TToken = unknown> {
  readonly limits: ProviderLimits;
  readonly capabilities: ProviderCapabilities;

  /** Resolves to undefined when the table does not exist */
  describeTable(tableName: string): Promise<TableDescriptor | undefined>;
  listTables(): AsyncIterable<string>;
  scanPage(request: ScanPageRequest<TToken>): Promise<Page<TToken>>;
  /** Deleting a missing key succeeds */
  batchWrite(tableName: string, requests: WriteRequest[]): Promise<BatchWriteOutcome>;
  createTable(definition: TableDefinition): Promise<void>;
  deleteTable(tableName: string): Promise<void>;
  /** Rejects with OperationCancelledError when the signal aborts first */
  waitForTable(tableName: string, state: TableWaitState, signal?: AbortSignal): Promise<void>;
}

export const DYNAMODB_LIMITS: ProviderLimits = {
  maxBatchItems: 25,
  maxBatchBytes: 16 * 1024 * 1024,
  maxItemBytes: 400 * 1024,
  allowsEmptySets: false,
};
