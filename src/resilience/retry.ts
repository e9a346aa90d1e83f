/**
 * Retry executor with exponential backoff and jitter
 */

import { DynamoDBError, OperationCancelledError, ThroughputError } from '../error/index.js';
import type { RetryConfig, RetryEvent } from './types.js';

export interface RetryOptions {
  /** Stops further attempts and interrupts backoff sleeps */
  signal?: AbortSignal;
  /** Called before each backoff sleep */
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Executes operations with retry logic and exponential backoff
 *
 * - Retries errors flagged retryable (throttling, 5xx, timeouts)
 * - Throttling starts from `baseDelayMs`; other retryable errors from twice that
 * - Adds jitter to prevent thundering herd
 */
export class RetryExecutor {
  private readonly config: RetryConfig;

  constructor(config: RetryConfig) {
    this.config = config;
  }

  get maxAttempts(): number {
    return Math.max(1, this.config.maxAttempts);
  }

  /**
   * Execute an operation with retry logic
   * @throws The last error if it is not retryable or all attempts are used;
   * {@link OperationCancelledError} if the signal aborts first
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const { signal, onRetry } = options;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);
      try {
        return await operation(attempt);
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.maxAttempts) {
          throw error;
        }

        const throttled = error instanceof ThroughputError;
        const delayMs = this.calculateDelay(attempt, throttled);
        onRetry?.({ attempt, delayMs, error, throttled });
        await sleep(delayMs, signal);
      }
    }
  }

  /**
   * Exponential backoff delay for the given attempt (1-indexed), capped and jittered
   */
  calculateDelay(attempt: number, throttled: boolean): number {
    const baseDelay = throttled ? this.config.baseDelayMs : this.config.baseDelayMs * 2;
    const exponentialDelay = baseDelay * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterFactor = this.config.jitterFactor ?? 0.5;
    const jitter = cappedDelay * Math.random() * jitterFactor;

    return Math.floor(cappedDelay + jitter);
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof DynamoDBError && error.isRetryable;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

/**
 * Sleeps for `ms`, rejecting with {@link OperationCancelledError} when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Default retry configuration
 *
 * - maxAttempts: 10
 * - baseDelayMs: 50
 * - maxDelayMs: 20000 (20 seconds max wait)
 * - jitterFactor: 0.5 (add up to 50% jitter)
 */
export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 10,
    baseDelayMs: 50,
    maxDelayMs: 20000,
    jitterFactor: 0.5,
  };
}
