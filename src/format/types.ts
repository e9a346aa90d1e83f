/**
 * Shared types for the file format adapters.
 */

import type { MalformedValueError } from '../error/index.js';
import type { Item, ScalarType } from '../types/index.js';

export type FileFormat = 'jsonl' | 'csv';

/**
 * One record read from a file. A record that cannot be decoded carries the
 * error instead of an item, so the caller decides whether to stop.
 */
export type SourceRecord =
  | { position: number; item: Item; error?: undefined }
  | { position: number; item?: undefined; error: MalformedValueError };

export interface ReadOptions {
  /** Scalar types of key attributes; they win over type inference */
  hints?: Record<string, ScalarType>;
}

/**
 * Sink for encoded items. `write` resolves once the stream accepts more data.
 */
export interface ItemWriter {
  write(item: Item): Promise<void>;
  /** Flushes and closes the underlying stream */
  end(): Promise<void>;
}
