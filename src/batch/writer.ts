/**
 * Streaming batch writer.
 *
 * Pulls items from an async source, groups them into provider-sized
 * batches and keeps a bounded number of batches in flight. Items the
 * service leaves unprocessed are resubmitted in rounds with backoff.
 */

import { extractKey, itemSize, keyFingerprint } from '../codec/index.js';
import {
  DestinationUnavailableError,
  DynamoDBError,
  MalformedValueError,
  OperationCancelledError,
} from '../error/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import {
  logRetry,
  NoopLogger,
  NoopMetricsCollector,
  TransferMetricNames,
  TransferProgress,
} from '../observability/index.js';
import type { TableService } from '../provider/index.js';
import { createDefaultRetryConfig, isRetryableError, RetryExecutor, sleep } from '../resilience/index.js';
import type { RetryConfig } from '../resilience/index.js';
import type { Item, Key, KeySchema, Value, WriteMode, WriteRequest, WriteSummary } from '../types/index.js';
import { isSetValue } from '../types/index.js';

export interface WriteTarget {
  tableName: string;
  keySchema: KeySchema;
}

export interface WriteOptions {
  /** Batches in flight at once (default 4) */
  maxConcurrency?: number;
  /** Resubmits of unprocessed items per batch (default 8) */
  maxRetryRounds?: number;
  /** Retry budget for thrown errors; its delays also pace the resubmit rounds */
  retry?: RetryConfig;
  /** Stops pulling and submitting; batches in flight settle */
  signal?: AbortSignal;
  /** Throw on the first malformed item instead of recording it */
  strict?: boolean;
  /** Shared counters; a private instance is used when omitted */
  progress?: TransferProgress;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface PendingWrite {
  request: WriteRequest;
  key: Key;
  fingerprint: string;
}

/**
 * Writes (`put`) or deletes (`delete`) every item of a stream.
 *
 * Records the service refuses are reported in the summary rather than
 * thrown, so one bad record never stops the rest.
 *
 * @throws {DestinationUnavailableError} When a batch keeps failing with
 * retryable errors; batches already in flight are awaited first
 *
 * @example
 * ```typescript
 * const summary = await writeItems(service, { tableName: 'Users', keySchema }, items, 'put');
 * console.log(`${summary.written} written, ${summary.failed} failed`);
 * ```
 */
export async function writeItems(
  service: TableService<unknown>,
  target: WriteTarget,
  items: AsyncIterable<Item>,
  mode: WriteMode,
  options: WriteOptions = {}
): Promise<WriteSummary> {
  const writer = new BatchWriter(service, target, mode, options);
  return writer.run(items);
}

class BatchWriter {
  private readonly progress: TransferProgress;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly executor: RetryExecutor;
  private readonly maxConcurrency: number;
  private readonly maxRetryRounds: number;
  private readonly strict: boolean;
  private readonly signal?: AbortSignal;
  private readonly labels: Record<string, string>;

  private readonly inFlight = new Set<Promise<void>>();
  private fatal?: Error;
  private batch: PendingWrite[] = [];
  private batchBytes = 0;
  private batchKeys = new Set<string>();

  constructor(
    private readonly service: TableService<unknown>,
    private readonly target: WriteTarget,
    private readonly mode: WriteMode,
    options: WriteOptions
  ) {
    this.progress = options.progress ?? new TransferProgress();
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.executor = new RetryExecutor(options.retry ?? createDefaultRetryConfig());
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 4);
    this.maxRetryRounds = Math.max(0, options.maxRetryRounds ?? 8);
    this.strict = options.strict ?? false;
    this.signal = options.signal;
    this.labels = { table: target.tableName };
  }

  async run(items: AsyncIterable<Item>): Promise<WriteSummary> {
    try {
      await this.consume(items);
    } catch (error) {
      await Promise.allSettled(this.inFlight);
      throw error;
    }
    await Promise.allSettled(this.inFlight);

    if (this.fatal) {
      throw this.fatal;
    }
    return {
      written: this.progress.written,
      failed: this.progress.failed,
      failures: this.progress.failures,
    };
  }

  private async consume(items: AsyncIterable<Item>): Promise<void> {
    const { maxBatchItems, maxBatchBytes } = this.service.limits;

    for await (const item of items) {
      if (this.fatal || this.signal?.aborted) {
        break;
      }
      this.progress.recordRead();

      const pending = this.prepare(item);
      if (!pending) {
        continue;
      }
      const size = itemSize(pending.request.type === 'put' ? pending.request.item : pending.key);

      if (
        this.batchKeys.has(pending.fingerprint) ||
        this.batch.length >= maxBatchItems ||
        this.batchBytes + size > maxBatchBytes
      ) {
        await this.submit();
      }
      this.batch.push(pending);
      this.batchBytes += size;
      this.batchKeys.add(pending.fingerprint);
      if (this.batch.length >= maxBatchItems) {
        await this.submit();
      }
    }

    if (!this.fatal && !this.signal?.aborted && this.batch.length > 0) {
      await this.submit();
    }
  }

  /**
   * Checks one item against the key schema and the provider limits.
   * Returns undefined after recording a failure.
   */
  private prepare(item: Item): PendingWrite | undefined {
    const { keySchema } = this.target;
    const { maxItemBytes, allowsEmptySets } = this.service.limits;
    let key: Key | undefined;
    try {
      key = extractKey(item, keySchema);
      const fingerprint = keyFingerprint(key, keySchema);
      if (this.mode === 'delete') {
        return { request: { type: 'delete', key }, key, fingerprint };
      }
      const size = itemSize(item);
      if (size > maxItemBytes) {
        throw new MalformedValueError(`Item size ${size} exceeds the limit of ${maxItemBytes} bytes`);
      }
      if (!allowsEmptySets) {
        const attribute = Object.keys(item).find((name) => containsEmptySet(item[name]));
        if (attribute !== undefined) {
          throw new MalformedValueError(`Attribute '${attribute}' contains an empty set`);
        }
      }
      return { request: { type: 'put', item }, key, fingerprint };
    } catch (error) {
      if (!(error instanceof MalformedValueError) || this.strict) {
        throw error;
      }
      this.progress.recordFailure({ key, reason: 'malformed', code: error.code, message: error.message });
      return undefined;
    }
  }

  private async submit(): Promise<void> {
    const batch = this.batch;
    this.batch = [];
    this.batchBytes = 0;
    this.batchKeys = new Set();

    while (this.inFlight.size >= this.maxConcurrency) {
      await Promise.race(this.inFlight);
    }
    if (this.fatal) {
      return;
    }

    const task: Promise<void> = this.writeBatch(batch)
      .catch((error: unknown) => {
        this.fatal ??= error instanceof Error ? error : new Error(String(error));
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async writeBatch(batch: PendingWrite[]): Promise<void> {
    const { tableName } = this.target;
    let remaining = batch;

    for (let round = 0; ; round++) {
      this.metrics.incrementCounter(TransferMetricNames.BATCHES_SUBMITTED, 1, this.labels);

      let unprocessed: WriteRequest[];
      try {
        const requests = remaining.map((pending) => pending.request);
        const outcome = await this.executor.execute(() => this.service.batchWrite(tableName, requests), {
          signal: this.signal,
          onRetry: (event) => {
            if (event.throttled) {
              this.metrics.incrementCounter(TransferMetricNames.THROTTLES, 1, this.labels);
              this.progress.recordThrottle('write');
            }
            logRetry(this.logger, tableName, 'batchWrite', event);
          },
        });
        this.progress.recordRequest('write', outcome.consumedCapacity);
        unprocessed = outcome.unprocessed;
      } catch (error) {
        if (error instanceof OperationCancelledError && this.signal?.aborted) {
          return;
        }
        if (isRetryableError(error)) {
          throw new DestinationUnavailableError(
            tableName,
            this.executor.maxAttempts,
            error instanceof Error ? error : undefined
          );
        }
        this.rejectAll(remaining, error);
        return;
      }

      const left = new Set(unprocessed.map((request) => this.fingerprintOf(request)));
      const stillPending = remaining.filter((pending) => left.has(pending.fingerprint));
      this.progress.recordWritten(remaining.length - stillPending.length);
      remaining = stillPending;
      if (remaining.length === 0) {
        return;
      }

      this.metrics.recordHistogram(TransferMetricNames.BATCH_UNPROCESSED, remaining.length, this.labels);
      if (round >= this.maxRetryRounds) {
        this.logger.warn('Items still unprocessed after retry rounds', {
          tableName,
          rounds: round,
          count: remaining.length,
        });
        for (const pending of remaining) {
          this.progress.recordFailure({
            key: pending.key,
            reason: 'unprocessed',
            code: 'UnprocessedItems',
            message: `Still unprocessed after ${round} retry round(s)`,
          });
        }
        return;
      }

      this.metrics.incrementCounter(TransferMetricNames.RETRY_ROUNDS, 1, this.labels);
      try {
        await sleep(this.executor.calculateDelay(round + 1, true), this.signal);
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          return;
        }
        throw error;
      }
    }
  }

  private rejectAll(batch: PendingWrite[], error: unknown): void {
    const code = error instanceof DynamoDBError ? error.code : error instanceof Error ? error.name : 'Unknown';
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn('Batch rejected', { tableName: this.target.tableName, count: batch.length, code, message });
    for (const pending of batch) {
      this.progress.recordFailure({ key: pending.key, reason: 'rejected', code, message });
    }
  }

  private fingerprintOf(request: WriteRequest): string {
    const { keySchema } = this.target;
    const record = request.type === 'put' ? request.item : request.key;
    return keyFingerprint(extractKey(record, keySchema), keySchema);
  }
}

function containsEmptySet(value: Value | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  if (isSetValue(value)) {
    return value.value.length === 0;
  }
  if (value.type === 'L') {
    return value.value.some(containsEmptySet);
  }
  if (value.type === 'M') {
    return Object.values(value.value).some(containsEmptySet);
  }
  return false;
}
