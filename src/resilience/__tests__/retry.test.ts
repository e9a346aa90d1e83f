/**
 * Tests for RetryExecutor
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryExecutor, createDefaultRetryConfig, sleep } from '../retry.js';
import {
  InternalServerError,
  OperationCancelledError,
  ThrottlingExceptionError,
  ValidationError,
} from '../../error/index.js';
import type { RetryEvent } from '../types.js';

const fastConfig = { maxAttempts: 4, baseDelayMs: 1, maxDelayMs: 5, jitterFactor: 0 };

describe('RetryExecutor', () => {
  describe('execute', () => {
    it('should succeed on first attempt', async () => {
      const executor = new RetryExecutor(fastConfig);
      const operation = vi.fn().mockResolvedValue(42);

      await expect(executor.execute(operation)).resolves.toBe(42);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(operation).toHaveBeenCalledWith(1);
    });

    it('should retry throttling until it succeeds', async () => {
      const executor = new RetryExecutor(fastConfig);
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new ThrottlingExceptionError())
        .mockRejectedValueOnce(new InternalServerError())
        .mockResolvedValueOnce('done');
      const events: RetryEvent[] = [];

      const result = await executor.execute(operation, { onRetry: (event) => events.push(event) });

      expect(result).toBe('done');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(events.map((event) => [event.attempt, event.delayMs, event.throttled])).toEqual([
        [1, 1, true],
        [2, 4, false],
      ]);
    });

    it('should not retry non-retryable errors', async () => {
      const executor = new RetryExecutor(fastConfig);
      const error = new ValidationError('bad request');
      const operation = vi.fn().mockRejectedValue(error);

      await expect(executor.execute(operation)).rejects.toBe(error);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should throw the last error once attempts are exhausted', async () => {
      const executor = new RetryExecutor(fastConfig);
      const error = new ThrottlingExceptionError();
      const operation = vi.fn().mockRejectedValue(error);

      await expect(executor.execute(operation)).rejects.toBe(error);
      expect(operation).toHaveBeenCalledTimes(4);
    });

    it('should stop retrying when the signal aborts', async () => {
      const executor = new RetryExecutor({ ...fastConfig, baseDelayMs: 1000, maxDelayMs: 1000 });
      const controller = new AbortController();
      const operation = vi.fn().mockImplementation(async () => {
        setTimeout(() => controller.abort(), 5);
        throw new ThrottlingExceptionError();
      });

      await expect(executor.execute(operation, { signal: controller.signal })).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('calculateDelay', () => {
    it('should grow exponentially and cap at maxDelayMs', () => {
      const executor = new RetryExecutor({ maxAttempts: 10, baseDelayMs: 50, maxDelayMs: 300, jitterFactor: 0 });

      expect(executor.calculateDelay(1, true)).toBe(50);
      expect(executor.calculateDelay(2, true)).toBe(100);
      expect(executor.calculateDelay(3, true)).toBe(200);
      expect(executor.calculateDelay(4, true)).toBe(300);
      expect(executor.calculateDelay(1, false)).toBe(100);
    });

    it('should add at most jitterFactor of the delay', () => {
      const executor = new RetryExecutor(createDefaultRetryConfig());
      vi.spyOn(Math, 'random').mockReturnValue(0.999);

      expect(executor.calculateDelay(1, true)).toBe(74);
      vi.restoreAllMocks();
    });
  });

  describe('sleep', () => {
    it('should reject immediately with an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
    });
  });
});
