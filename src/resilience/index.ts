/**
 * Resilience patterns for service calls
 */

export { RetryExecutor, isRetryableError, throwIfAborted, sleep, createDefaultRetryConfig } from './retry.js';
export type { RetryOptions } from './retry.js';
export type { RetryConfig, RetryEvent } from './types.js';
