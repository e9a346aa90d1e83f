/**
 * Scan request and page types.
 *
 * `TToken` is the provider's continuation token. Engine code only ever
 * hands back a token it received.
 */

import type { Filter } from './filter.js';
import type { Item } from './item.js';

export interface ScanSegment {
  index: number;
  total: number;
}

export interface ScanPageRequest<TToken> {
  tableName: string;
  /** Maximum items to evaluate for this page */
  limit?: number;
  /** Token from the previous page; absent for the first page */
  token?: TToken;
  /** Pushed down only when the provider supports it */
  filter?: Filter;
  /** Attribute names to return */
  projection?: string[];
  segment?: ScanSegment;
  signal?: AbortSignal;
}

export interface Page<TToken> {
  items: Item[];
  /** Items evaluated before any provider-side filter was applied */
  scannedCount: number;
  /** Absent on the final page */
  token?: TToken;
  /** Read capacity units the request consumed, when the provider reports it */
  consumedCapacity?: number;
}
