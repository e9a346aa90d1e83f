import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, logRetry } from '../logging.js';
import { InMemoryMetricsCollector, TransferMetricNames } from '../metrics.js';
import { TransferProgress } from '../progress.js';
import type { ProgressSnapshot } from '../progress.js';
import { InternalServerError, ThrottlingExceptionError } from '../../error/index.js';
import { Values } from '../../types/index.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ConsoleLogger', () => {
  it('should drop messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger('info');

    logger.debug('hidden');
    logger.info('shown', { table: 'Users' });

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/^\[.+\] \[INFO\] shown \{"table":"Users"\}$/);
  });

  it('should log throttling as a warning with its context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logRetry(new ConsoleLogger('warn'), 'Users', 'scan', {
      attempt: 2,
      delayMs: 100,
      error: new ThrottlingExceptionError(),
      throttled: true,
    });

    expect(warn.mock.calls[0]?.[0]).toContain(
      'Request throttled, backing off {"tableName":"Users","operation":"scan","attempt":2,"delayMs":100,"errorCode":"ThrottlingException"}'
    );
  });

  it('should word other retryable failures apart from throttling', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logRetry(new ConsoleLogger('warn'), 'Users', 'batchWrite', {
      attempt: 1,
      delayMs: 40,
      error: new InternalServerError(),
      throttled: false,
    });

    expect(warn.mock.calls[0]?.[0]).toContain(
      'Request failed, retrying {"tableName":"Users","operation":"batchWrite","attempt":1,"delayMs":40,"errorCode":"InternalServerError"}'
    );
  });
});

describe('InMemoryMetricsCollector', () => {
  it('should key counters by sorted labels', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.incrementCounter('requests', 1, { table: 'a', op: 'scan' });
    metrics.incrementCounter('requests', 2, { op: 'scan', table: 'a' });

    expect(metrics.getCounter('requests', { table: 'a', op: 'scan' })).toBe(3);
    expect(metrics.getMetrics().counters).toEqual({ 'requests:op=scan,table=a': 3 });
  });

  it('should summarize histograms', () => {
    const metrics = new InMemoryMetricsCollector();
    metrics.recordHistogram('latency', 2);
    metrics.recordHistogram('latency', 4);

    expect(metrics.getMetrics().histograms.latency).toEqual({
      count: 2,
      sum: 6,
      min: 2,
      max: 4,
      mean: 3,
      values: [2, 4],
    });
  });
});

describe('TransferProgress', () => {
  it('should count and cap reported failures', () => {
    const metrics = new InMemoryMetricsCollector();
    const progress = new TransferProgress({ maxReportedFailures: 1, metrics });

    progress.recordRead(3);
    progress.recordWritten(1);
    progress.recordFailure({ key: { id: Values.string('a') }, reason: 'unprocessed', code: 'X', message: 'x' });
    progress.recordFailure({ key: { id: Values.string('b') }, reason: 'malformed', code: 'Y', message: 'y' });

    expect(progress.read).toBe(3);
    expect(progress.written).toBe(1);
    expect(progress.failed).toBe(2);
    expect(progress.failures).toHaveLength(1);
    expect(progress.failures[0]?.code).toBe('X');
    expect(metrics.getCounter(TransferMetricNames.ITEMS_FAILED, { reason: 'malformed' })).toBe(1);
  });

  it('should total consumed capacity per request kind', () => {
    const metrics = new InMemoryMetricsCollector();
    const progress = new TransferProgress({ metrics, labels: { operation: 'copy' } });

    progress.recordRequest('read', 0.5);
    progress.recordRequest('read', 2);
    progress.recordRequest('read');
    progress.recordThrottle('read');
    progress.recordRequest('write', 25);

    expect(progress.capacity()).toEqual({
      read: { requests: 3, throttles: 1, consumedUnits: 2.5, maxUnits: 2 },
      write: { requests: 1, throttles: 0, consumedUnits: 25, maxUnits: 25 },
    });
    expect(metrics.getCounter(TransferMetricNames.CONSUMED_CAPACITY, { operation: 'copy', kind: 'read' })).toBe(2.5);
  });

  it('should notify listeners with running counts', () => {
    const snapshots: ProgressSnapshot[] = [];
    const progress = new TransferProgress({ onProgress: (snapshot) => snapshots.push(snapshot) });

    progress.recordRead();
    progress.recordWritten(0);
    progress.recordWritten(2);

    expect(snapshots.map(({ read, written, failed }) => ({ read, written, failed }))).toEqual([
      { read: 1, written: 0, failed: 0 },
      { read: 1, written: 2, failed: 0 },
    ]);
  });
});
