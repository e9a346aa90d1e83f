/**
 * Paginated table scanning.
 */

import { OperationCancelledError, SourceUnavailableError } from '../error/index.js';
import { evaluateFilter, filterAttributes } from '../filter/index.js';
import type { Logger, MetricsCollector, TransferProgress } from '../observability/index.js';
import { logRetry, NoopLogger, NoopMetricsCollector, TransferMetricNames } from '../observability/index.js';
import type { TableService } from '../provider/index.js';
import { createDefaultRetryConfig, isRetryableError, RetryExecutor } from '../resilience/index.js';
import type { RetryConfig } from '../resilience/index.js';
import type { Filter, Item, Page, ScanSegment } from '../types/index.js';

export interface PageEvent {
  tableName: string;
  /** Segment index; 0 for a sequential scan */
  segment: number;
  /** Items delivered from this page after filtering */
  items: number;
  scannedCount: number;
}

export interface ScanOptions {
  filter?: Filter;
  /** Attribute names to return; all attributes when empty */
  projection?: string[];
  /** Items evaluated per request; defaults to the provider's page size */
  pageSize?: number;
  /** Stop after this many items */
  limit?: number;
  /** Parallel scan segments (default 1) */
  segments?: number;
  /** Segments scanned at the same time (default 4) */
  maxConcurrency?: number;
  retry?: RetryConfig;
  /** Aborting stops further page requests; the iterator then ends quietly */
  signal?: AbortSignal;
  onPage?: (event: PageEvent) => void;
  /** Receives request counts, consumed read capacity and throttles */
  progress?: TransferProgress;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface ScanContext<TToken> {
  service: TableService<TToken>;
  tableName: string;
  executor: RetryExecutor;
  pushdown: boolean;
  filter?: Filter;
  projection?: string[];
  requestProjection?: string[];
  pageSize?: number;
  limit?: number;
  signal?: AbortSignal;
  onPage?: (event: PageEvent) => void;
  progress?: TransferProgress;
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Lazily iterates the items of a table.
 *
 * Nothing is requested until the first item is pulled, and at most one page
 * per segment is held in memory. When the service cannot evaluate filters,
 * pages are filtered here instead; both give the same items.
 *
 * @throws {SourceUnavailableError} When a page cannot be fetched within the retry budget
 *
 * @example
 * ```typescript
 * for await (const item of scanTable(service, 'Users', { filter: parseFilter('status = active') })) {
 *   console.log(item);
 * }
 * ```
 */
export async function* scanTable<TToken>(
  service: TableService<TToken>,
  tableName: string,
  options: ScanOptions = {}
): AsyncGenerator<Item, void, undefined> {
  const { limit } = options;
  if (limit !== undefined && limit <= 0) {
    return;
  }

  const context = createContext(service, tableName, options);
  const segments = Math.max(1, options.segments ?? 1);
  const source =
    segments > 1
      ? mergeSegments(context, segments, Math.max(1, options.maxConcurrency ?? 4))
      : scanSegment(context, undefined);

  let yielded = 0;
  for await (const item of source) {
    yield item;
    yielded++;
    if (limit !== undefined && yielded >= limit) {
      return;
    }
  }
}

function createContext<TToken>(
  service: TableService<TToken>,
  tableName: string,
  options: ScanOptions
): ScanContext<TToken> {
  const pushdown = service.capabilities.filterPushdown;
  const projection = options.projection && options.projection.length > 0 ? options.projection : undefined;

  // A client-side filter needs its attributes even when the caller did not ask for them
  let requestProjection = projection;
  if (projection && options.filter && !pushdown) {
    requestProjection = [...new Set([...projection, ...filterAttributes(options.filter)])];
  }

  return {
    service,
    tableName,
    executor: new RetryExecutor(options.retry ?? createDefaultRetryConfig()),
    pushdown,
    filter: options.filter,
    projection,
    requestProjection,
    pageSize: options.pageSize,
    limit: options.limit,
    signal: options.signal,
    onPage: options.onPage,
    progress: options.progress,
    logger: options.logger ?? new NoopLogger(),
    metrics: options.metrics ?? new NoopMetricsCollector(),
  };
}

async function* scanSegment<TToken>(
  context: ScanContext<TToken>,
  segment: ScanSegment | undefined
): AsyncGenerator<Item, void, undefined> {
  const { filter, signal } = context;
  let token: TToken | undefined;
  let delivered = 0;

  do {
    if (signal?.aborted) {
      return;
    }

    const remaining = context.limit === undefined ? undefined : context.limit - delivered;
    const page = await fetchPage(context, segment, token, pageLimit(context, remaining));
    if (page === undefined) {
      return;
    }

    const items =
      filter && !context.pushdown ? page.items.filter((item) => evaluateFilter(filter, item)) : page.items;

    context.metrics.incrementCounter(TransferMetricNames.PAGES_FETCHED, 1, { table: context.tableName });
    context.logger.debug('Fetched scan page', {
      tableName: context.tableName,
      segment: segment?.index ?? 0,
      items: items.length,
      scannedCount: page.scannedCount,
      hasMore: page.token !== undefined,
    });
    context.onPage?.({
      tableName: context.tableName,
      segment: segment?.index ?? 0,
      items: items.length,
      scannedCount: page.scannedCount,
    });

    for (const item of items) {
      yield context.requestProjection === context.projection ? item : project(item, context.projection);
      delivered++;
    }
    token = page.token;
  } while (token !== undefined);
}

function pageLimit<TToken>(context: ScanContext<TToken>, remaining: number | undefined): number | undefined {
  const candidates = [context.pageSize, context.service.limits.maxPageSize];
  // Only a filter-free scan knows the next page needs no more than what is left
  if (!context.filter) {
    candidates.push(remaining);
  }
  const defined = candidates.filter((candidate): candidate is number => candidate !== undefined);
  return defined.length > 0 ? Math.max(1, Math.min(...defined)) : undefined;
}

/**
 * Fetches one page under the retry budget. Resolves to undefined when the
 * scan was cancelled while waiting.
 */
async function fetchPage<TToken>(
  context: ScanContext<TToken>,
  segment: ScanSegment | undefined,
  token: TToken | undefined,
  limit: number | undefined
): Promise<Page<TToken> | undefined> {
  const { service, tableName, signal, executor } = context;
  try {
    const page = await executor.execute(
      () =>
        service.scanPage({
          tableName,
          limit,
          token,
          filter: context.pushdown ? context.filter : undefined,
          projection: context.requestProjection,
          segment,
          signal,
        }),
      {
        signal,
        onRetry: (event) => {
          if (event.throttled) {
            context.metrics.incrementCounter(TransferMetricNames.THROTTLES, 1, { table: tableName });
            context.progress?.recordThrottle('read');
          }
          logRetry(context.logger, tableName, 'scan', event);
        },
      }
    );
    context.progress?.recordRequest('read', page.consumedCapacity);
    return page;
  } catch (error) {
    if (error instanceof OperationCancelledError && signal?.aborted) {
      return undefined;
    }
    if (isRetryableError(error)) {
      throw new SourceUnavailableError(tableName, executor.maxAttempts, error instanceof Error ? error : undefined);
    }
    throw error;
  }
}

/**
 * Runs up to `maxConcurrency` segment scans and yields items as they arrive.
 * Each running segment has exactly one outstanding pull.
 */
async function* mergeSegments<TToken>(
  context: ScanContext<TToken>,
  total: number,
  maxConcurrency: number
): AsyncGenerator<Item, void, undefined> {
  type Pull = { index: number; result: IteratorResult<Item, void> };

  const running = new Map<number, AsyncGenerator<Item, void, undefined>>();
  const pulls = new Map<number, Promise<Pull>>();
  let nextSegment = 0;

  const pull = (index: number, iterator: AsyncGenerator<Item, void, undefined>): void => {
    pulls.set(
      index,
      iterator.next().then((result) => ({ index, result }))
    );
  };
  const startNext = (): void => {
    while (running.size < maxConcurrency && nextSegment < total) {
      const index = nextSegment++;
      const iterator = scanSegment(context, { index, total });
      running.set(index, iterator);
      pull(index, iterator);
    }
  };

  try {
    startNext();
    while (pulls.size > 0) {
      const { index, result } = await Promise.race(pulls.values());
      pulls.delete(index);
      const iterator = running.get(index);
      if (result.done || iterator === undefined) {
        running.delete(index);
        startNext();
        continue;
      }
      yield result.value;
      pull(index, iterator);
    }
  } finally {
    const closing = [...running.values()].map((iterator) => iterator.return(undefined));
    await Promise.allSettled([...pulls.values(), ...closing]);
  }
}

function project(item: Item, projection: string[] | undefined): Item {
  if (!projection) {
    return item;
  }
  const projected: Item = {};
  for (const name of projection) {
    const value = Object.hasOwn(item, name) ? item[name] : undefined;
    if (value !== undefined) {
      projected[name] = value;
    }
  }
  return projected;
}
