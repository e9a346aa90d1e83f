/**
 * Configuration interfaces for the resilience layer
 */

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first */
  maxAttempts: number;
  /** Base delay in milliseconds before the first retry of a throttled request */
  baseDelayMs: number;
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays */
  jitterFactor?: number;
}

/**
 * Information passed to retry listeners before each backoff sleep
 */
export interface RetryEvent {
  /** Attempt that just failed (1-indexed) */
  attempt: number;
  delayMs: number;
  error: unknown;
  throttled: boolean;
}
