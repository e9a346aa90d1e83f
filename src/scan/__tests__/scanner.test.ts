/**
 * Tests for scanTable
 */

import { describe, it, expect } from 'vitest';
import { scanTable } from '../scanner.js';
import type { PageEvent } from '../scanner.js';
import { SourceUnavailableError, ValidationError } from '../../error/index.js';
import { parseFilter } from '../../filter/index.js';
import { InMemoryMetricsCollector, TransferMetricNames } from '../../observability/index.js';
import { InMemoryTableService, tableDefinition } from '../../testing/index.js';
import type { Item } from '../../types/index.js';
import { Values } from '../../types/index.js';

const fastRetry = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2, jitterFactor: 0 };

function user(n: number): Item {
  return {
    id: Values.string(`user-${n}`),
    status: Values.string(n % 3 === 0 ? 'active' : 'inactive'),
    visits: Values.number(n),
  };
}

function usersService(count: number, options: { filterPushdown?: boolean } = {}): InMemoryTableService {
  const items = Array.from({ length: count }, (_, n) => user(n));
  return new InMemoryTableService(options).addTable(
    tableDefinition('Users', { partitionKey: { name: 'id', type: 'S' } }),
    items
  );
}

async function collect(iterable: AsyncIterable<Item>): Promise<Item[]> {
  const items: Item[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

function ids(items: Item[]): string[] {
  return items
    .map((item) => {
      const id = item['id'];
      return id?.type === 'S' ? id.value : '';
    })
    .sort();
}

describe('scanTable', () => {
  it('should not request anything before the first item is pulled', async () => {
    const service = usersService(5);
    const iterator = scanTable(service, 'Users');

    expect(service.countOperations('scanPage')).toBe(0);
    await iterator.next();
    expect(service.countOperations('scanPage')).toBe(1);
  });

  it('should return every item exactly once across pages', async () => {
    const service = usersService(250);

    const items = await collect(scanTable(service, 'Users', { pageSize: 7 }));

    expect(items).toHaveLength(250);
    expect(new Set(ids(items)).size).toBe(250);
    expect(service.countOperations('scanPage')).toBe(36);
  });

  it('should yield nothing for an empty table', async () => {
    const service = usersService(0);

    await expect(collect(scanTable(service, 'Users'))).resolves.toEqual([]);
    expect(service.countOperations('scanPage')).toBe(1);
  });

  it('should give the same items with and without filter push-down', async () => {
    const filter = parseFilter('status = active');
    const pushed = usersService(60, { filterPushdown: true });
    const local = usersService(60, { filterPushdown: false });

    const pushedItems = await collect(scanTable(pushed, 'Users', { filter, pageSize: 8 }));
    const localItems = await collect(scanTable(local, 'Users', { filter, pageSize: 8 }));

    expect(pushedItems).toHaveLength(20);
    expect(ids(localItems)).toEqual(ids(pushedItems));
  });

  it('should keep going past pages that filter down to nothing', async () => {
    const service = usersService(30, { filterPushdown: false });

    const items = await collect(scanTable(service, 'Users', { filter: parseFilter('id = user-29'), pageSize: 2 }));

    expect(ids(items)).toEqual(['user-29']);
    expect(service.countOperations('scanPage')).toBe(15);
  });

  it('should fetch filter attributes but return only the projection', async () => {
    const service = usersService(9, { filterPushdown: false });

    const items = await collect(
      scanTable(service, 'Users', { filter: parseFilter('status = active'), projection: ['id'] })
    );

    expect(items).toHaveLength(3);
    expect(items.every((item) => Object.keys(item).join() === 'id')).toBe(true);
    expect(service.getOperationLog()[0]?.params?.['projection']).toEqual(['id', 'status']);
  });

  it('should stop after the limit with a single small page', async () => {
    const service = usersService(100);

    const items = await collect(scanTable(service, 'Users', { limit: 5 }));

    expect(items).toHaveLength(5);
    expect(service.countOperations('scanPage')).toBe(1);
    expect(service.getOperationLog()[0]?.params?.['limit']).toBe(5);
  });

  it('should retry throttled pages and count the throttles', async () => {
    const service = usersService(10).failScanPages(2);
    const metrics = new InMemoryMetricsCollector();

    const items = await collect(scanTable(service, 'Users', { retry: fastRetry, metrics }));

    expect(items).toHaveLength(10);
    expect(metrics.getCounter(TransferMetricNames.THROTTLES, { table: 'Users' })).toBe(2);
    expect(metrics.getCounter(TransferMetricNames.PAGES_FETCHED, { table: 'Users' })).toBe(1);
  });

  it('should raise SourceUnavailableError when retries run out', async () => {
    const service = usersService(10).failScanPages(10);

    await expect(collect(scanTable(service, 'Users', { retry: fastRetry }))).rejects.toBeInstanceOf(
      SourceUnavailableError
    );
    expect(service.countOperations('scanPage')).toBe(3);
  });

  it('should pass non-retryable errors through unchanged', async () => {
    const error = new ValidationError('bad scan');
    const service = usersService(10).failScanPages(1, () => error);

    await expect(collect(scanTable(service, 'Users', { retry: fastRetry }))).rejects.toBe(error);
    expect(service.countOperations('scanPage')).toBe(1);
  });

  it('should merge parallel segments without losing items', async () => {
    const service = usersService(100);

    const items = await collect(scanTable(service, 'Users', { segments: 4, maxConcurrency: 2, pageSize: 10 }));

    expect(new Set(ids(items)).size).toBe(100);
    const segments = service
      .getOperationLog()
      .map((operation) => operation.params?.['segment'])
      .filter((segment) => segment !== undefined);
    expect(segments).toHaveLength(service.countOperations('scanPage'));
  });

  it('should finish the current page and stop when aborted', async () => {
    const service = usersService(50);
    const controller = new AbortController();
    const items: Item[] = [];

    for await (const item of scanTable(service, 'Users', { pageSize: 10, signal: controller.signal })) {
      items.push(item);
      if (items.length === 3) {
        controller.abort();
      }
    }

    expect(items).toHaveLength(10);
    expect(service.countOperations('scanPage')).toBe(1);
  });

  it('should report each page', async () => {
    const service = usersService(12);
    const events: PageEvent[] = [];

    await collect(scanTable(service, 'Users', { pageSize: 5, onPage: (event) => events.push(event) }));

    expect(events.map((event) => event.items)).toEqual([5, 5, 2]);
    expect(events.every((event) => event.tableName === 'Users' && event.segment === 0)).toBe(true);
  });
});
