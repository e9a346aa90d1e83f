/**
 * Default configuration values.
 * @module config/defaults
 */

import { createDefaultRetryConfig } from '../resilience/index.js';
import type { TransferConfig, TransferConfigInput } from './config.js';

/**
 * Default AWS region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 5000;

/**
 * Default maximum number of connections in the connection pool.
 */
export const DEFAULT_MAX_CONNECTIONS = 50;

/**
 * Endpoint used when DYNAMODB_LOCAL is set.
 */
export const DEFAULT_LOCAL_ENDPOINT = 'http://localhost:8000';

/**
 * Creates the default transfer configuration:
 * one scan segment, four concurrent batches, eight retry rounds,
 * lenient record handling and a CSV header from a pre-scan.
 */
export function createDefaultTransferConfig(): TransferConfig {
  return {
    segments: 1,
    maxConcurrency: 4,
    maxRetryRounds: 8,
    scanRetry: createDefaultRetryConfig(),
    writeRetry: createDefaultRetryConfig(),
    strict: false,
    maxReportedFailures: 100,
    csvHeader: 'prescan',
  };
}

/**
 * Fills unset fields from the defaults.
 */
export function resolveTransferConfig(overrides: TransferConfigInput = {}): TransferConfig {
  const defaults = createDefaultTransferConfig();
  return {
    ...defaults,
    ...overrides,
    scanRetry: { ...defaults.scanRetry, ...overrides.scanRetry },
    writeRetry: { ...defaults.writeRetry, ...overrides.writeRetry },
  };
}
