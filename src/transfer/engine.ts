/**
 * Transfer orchestration: table summaries, copy, export, import, truncate
 * and wipe on top of the scanner and the batch writer.
 */

import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import { writeItems } from '../batch/index.js';
import type { WriteOptions } from '../batch/index.js';
import { extractKey } from '../codec/index.js';
import type { CsvHeaderMode, TransferConfig, TransferConfigInput } from '../config/index.js';
import { resolveTransferConfig, validateTransferConfig } from '../config/index.js';
import { MalformedValueError, SchemaMismatchError, TableNotFoundError } from '../error/index.js';
import { parseFilter } from '../filter/index.js';
import { CsvWriter, JsonLinesWriter, readCsv, readJsonLines } from '../format/index.js';
import type { FileFormat, ItemWriter, SourceRecord } from '../format/index.js';
import type { Logger, MetricsCollector, ProgressListener } from '../observability/index.js';
import {
  logError,
  logOperation,
  NoopLogger,
  NoopMetricsCollector,
  TransferMetricNames,
  TransferProgress,
} from '../observability/index.js';
import type { TableService } from '../provider/index.js';
import { RetryExecutor, throwIfAborted } from '../resilience/index.js';
import { scanTable } from '../scan/index.js';
import type { ScanOptions } from '../scan/index.js';
import type { Filter, Item, Key, KeySchema, TableDescriptor, TableSummary } from '../types/index.js';
import { keyAttributeNames, keyTypeHints, sameKeySchema, toTableDefinition } from '../types/index.js';
import { buildSummary } from './summary.js';
import type { TransferOperation, TransferSummary } from './summary.js';

export interface TransferEngineOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  config?: TransferConfigInput;
}

export interface RunOptions {
  /** Stops new page fetches and batch submits; in-flight batches settle */
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface CopyOptions extends RunOptions {
  filter?: string;
  /** Create a missing destination from the source definition (default true) */
  createDestination?: boolean;
}

export interface ExportOptions extends RunOptions {
  filter?: string;
  csvHeader?: CsvHeaderMode;
}

export interface ImportOptions extends RunOptions {
  strict?: boolean;
}

export interface TruncateOptions extends RunOptions {
  filter?: string;
  /**
   * Delete item by item even without a filter (default true). When false,
   * an unfiltered truncate drops and recreates the table instead.
   */
  deleteOnly?: boolean;
}

const DEFAULT_HEAD_COUNT = 20;

/**
 * Runs transfers against one table service.
 *
 * Problems found before any data moves (a bad filter, a missing table, a
 * key schema mismatch) are thrown. Anything after that is reported in the
 * returned {@link TransferSummary}.
 *
 * @example
 * ```typescript
 * const engine = new TransferEngine(createTableService({ region: 'us-east-1' }));
 * const summary = await engine.copy('Users', 'UsersBackup');
 * process.exitCode = exitCodeFor(summary);
 * ```
 */
export class TransferEngine<TToken = unknown> {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly config: TransferConfig;
  private readonly metadataRetry: RetryExecutor;

  constructor(
    private readonly service: TableService<TToken>,
    options: TransferEngineOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.config = resolveTransferConfig(options.config);
    validateTransferConfig(this.config);
    this.metadataRetry = new RetryExecutor(this.config.scanRetry);
  }

  // ==========================================================================
  // Table summaries
  // ==========================================================================

  async list(): Promise<TableSummary[]> {
    const summaries: TableSummary[] = [];
    for await (const name of this.service.listTables()) {
      const descriptor = await this.describe(name);
      // Deleted between listing and describing
      if (descriptor) {
        summaries.push({
          name,
          status: descriptor.status,
          itemCount: descriptor.itemCount,
          sizeBytes: descriptor.sizeBytes,
        });
      }
    }
    return summaries;
  }

  /**
   * @throws {TableNotFoundError}
   */
  async info(tableName: string): Promise<TableDescriptor> {
    const descriptor = await this.describe(tableName);
    if (!descriptor) {
      throw new TableNotFoundError(tableName);
    }
    return descriptor;
  }

  /**
   * First `count` items, read with a single small page where possible.
   */
  async head(tableName: string, count: number = DEFAULT_HEAD_COUNT): Promise<Item[]> {
    const items: Item[] = [];
    const scan = scanTable(this.service, tableName, {
      limit: count,
      retry: this.config.scanRetry,
      logger: this.logger,
      metrics: this.metrics,
    });
    for await (const item of scan) {
      items.push(item);
    }
    return items;
  }

  // ==========================================================================
  // Transfers
  // ==========================================================================

  /**
   * Copies every item (or every item matching `filter`) into `destination`.
   *
   * @throws {InvalidFilterSyntaxError} Before any table is touched
   * @throws {TableNotFoundError} When the source, or a destination that may not be created, is missing
   * @throws {SchemaMismatchError} When the destination key differs from the source key
   */
  async copy(source: string, destination: string, options: CopyOptions = {}): Promise<TransferSummary> {
    const filter = parseFilterOption(options.filter);
    const sourceTable = await this.info(source);
    const keySchema = await this.prepareDestination(
      sourceTable,
      destination,
      options.createDestination ?? true,
      options
    );

    return this.run('copy', [source, destination], options, async (progress) => {
      const items = scanTable(this.service, source, this.scanOptions(options, progress, { filter }));
      await writeItems(
        this.service,
        { tableName: destination, keySchema },
        items,
        'put',
        this.writeOptions(options, progress, this.config.strict)
      );
    });
  }

  /**
   * Writes a table's items to a file path or stream.
   *
   * @throws {InvalidFilterSyntaxError} Before any table is touched
   * @throws {TableNotFoundError}
   */
  async export(
    tableName: string,
    format: FileFormat,
    sink: string | Writable,
    options: ExportOptions = {}
  ): Promise<TransferSummary> {
    const filter = parseFilterOption(options.filter);
    const { keySchema } = await this.info(tableName);

    return this.run('export', [tableName], options, async (progress) => {
      const output = await openOutput(sink);
      let writer: ItemWriter | undefined;
      const openCsv = (header: string[]): CsvWriter => {
        const csv = new CsvWriter(output.stream(), header);
        writer = csv;
        return csv;
      };
      try {
        if (format === 'jsonl') {
          const jsonl = new JsonLinesWriter(output.stream());
          writer = jsonl;
          const items = scanTable(this.service, tableName, this.scanOptions(options, progress, { filter }));
          for await (const item of items) {
            progress.recordRead();
            await this.exportItem(jsonl, item, keySchema, progress);
          }
        } else {
          await this.exportCsv(tableName, keySchema, filter, options, progress, openCsv);
        }
      } finally {
        if (writer) {
          await writer.end();
        } else {
          await output.discard();
        }
      }
    });
  }

  /**
   * Loads items from a file path or stream. Key attributes are decoded as
   * the table's key types.
   *
   * @throws {TableNotFoundError}
   */
  async import(
    tableName: string,
    source: string | Readable,
    format: FileFormat,
    options: ImportOptions = {}
  ): Promise<TransferSummary> {
    const { keySchema } = await this.info(tableName);
    const strict = options.strict ?? this.config.strict;

    return this.run('import', [tableName], options, async (progress) => {
      const input = typeof source === 'string' ? createReadStream(source) : source;
      const hints = keyTypeHints(keySchema);
      const records = format === 'jsonl' ? readJsonLines(input, { hints }) : readCsv(input, { hints });
      try {
        await writeItems(
          this.service,
          { tableName, keySchema },
          decodedItems(records, progress, strict),
          'put',
          this.writeOptions(options, progress, strict)
        );
      } finally {
        if (typeof source === 'string') {
          input.destroy();
        }
      }
    });
  }

  /**
   * Deletes the items matching `filter`, or all items.
   *
   * @throws {InvalidFilterSyntaxError} Before any table is touched
   * @throws {TableNotFoundError}
   */
  async truncate(tableName: string, options: TruncateOptions = {}): Promise<TransferSummary> {
    const filter = parseFilterOption(options.filter);
    if (!filter && options.deleteOnly === false) {
      return this.wipe(tableName, options);
    }
    const { keySchema } = await this.info(tableName);

    return this.run('truncate', [tableName], options, async (progress) => {
      const keys = scanTable(
        this.service,
        tableName,
        this.scanOptions(options, progress, { filter, projection: keyAttributeNames(keySchema) })
      );
      await writeItems(
        this.service,
        { tableName, keySchema },
        keys,
        'delete',
        this.writeOptions(options, progress, false)
      );
    });
  }

  /**
   * Drops the table and recreates it empty with the same definition.
   * Once the drop has started the table is always recreated, even if the
   * signal aborts.
   *
   * @throws {TableNotFoundError}
   */
  async wipe(tableName: string, options: RunOptions = {}): Promise<TransferSummary> {
    const descriptor = await this.info(tableName);
    const definition = toTableDefinition(descriptor);

    return this.run('wipe', [tableName], options, async () => {
      throwIfAborted(options.signal);
      await this.metadataRetry.execute(() => this.service.deleteTable(tableName));
      await this.service.waitForTable(tableName, 'DELETED');
      await this.metadataRetry.execute(() => this.service.createTable(definition));
      await this.service.waitForTable(tableName, 'ACTIVE');
      this.logger.info('Table recreated', { tableName, removedItems: descriptor.itemCount });
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async describe(tableName: string): Promise<TableDescriptor | undefined> {
    return this.metadataRetry.execute(() => this.service.describeTable(tableName));
  }

  private async prepareDestination(
    source: TableDescriptor,
    destination: string,
    create: boolean,
    options: RunOptions
  ): Promise<KeySchema> {
    const existing = await this.describe(destination);
    if (existing) {
      if (!sameKeySchema(source.keySchema, existing.keySchema)) {
        throw new SchemaMismatchError(
          `Key schema of ${destination} (${describeKey(existing.keySchema)}) does not match ` +
            `${source.name} (${describeKey(source.keySchema)})`,
          { source: source.name, destination }
        );
      }
      return existing.keySchema;
    }
    if (!create) {
      throw new TableNotFoundError(destination);
    }

    this.logger.info('Creating destination table', { source: source.name, destination });
    await this.metadataRetry.execute(() => this.service.createTable(toTableDefinition(source, destination)), {
      signal: options.signal,
    });
    await this.service.waitForTable(destination, 'ACTIVE', options.signal);
    return source.keySchema;
  }

  private async exportCsv(
    tableName: string,
    keySchema: KeySchema,
    filter: Filter | undefined,
    options: ExportOptions,
    progress: TransferProgress,
    open: (header: string[]) => CsvWriter
  ): Promise<void> {
    const header = new Set(keyAttributeNames(keySchema));
    const collect = (item: Item): void => {
      for (const name of Object.keys(item)) {
        header.add(name);
      }
    };

    const scanAll = () => scanTable(this.service, tableName, this.scanOptions(options, progress, { filter }));

    if ((options.csvHeader ?? this.config.csvHeader) === 'prescan') {
      for await (const item of scanAll()) {
        collect(item);
      }
      if (options.signal?.aborted) {
        return;
      }
      const writer = open([...header]);
      for await (const item of scanAll()) {
        progress.recordRead();
        await this.exportItem(writer, item, keySchema, progress);
      }
      return;
    }

    // Header from the first page only; later attributes outside it fail per item
    let firstPage: number | undefined;
    const buffered: Item[] = [];
    let writer: CsvWriter | undefined;
    const scan = scanTable(
      this.service,
      tableName,
      this.scanOptions(options, progress, {
        filter,
        onPage: (event) => {
          firstPage ??= event.items;
        },
      })
    );

    for await (const item of scan) {
      progress.recordRead();
      if (writer) {
        await this.exportItem(writer, item, keySchema, progress);
        continue;
      }
      buffered.push(item);
      collect(item);
      if (buffered.length >= (firstPage ?? 0)) {
        writer = open([...header]);
        for (const pending of buffered.splice(0)) {
          await this.exportItem(writer, pending, keySchema, progress);
        }
      }
    }

    writer ??= open([...header]);
    for (const pending of buffered) {
      await this.exportItem(writer, pending, keySchema, progress);
    }
  }

  private async exportItem(
    writer: ItemWriter,
    item: Item,
    keySchema: KeySchema,
    progress: TransferProgress
  ): Promise<void> {
    try {
      await writer.write(item);
      progress.recordWritten(1);
    } catch (error) {
      if (!(error instanceof MalformedValueError) || this.config.strict) {
        throw error;
      }
      progress.recordFailure({
        key: keyOf(item, keySchema),
        reason: 'malformed',
        code: error.code,
        message: error.message,
      });
    }
  }

  private scanOptions(
    options: RunOptions,
    progress: TransferProgress,
    overrides: Partial<ScanOptions>
  ): ScanOptions {
    return {
      pageSize: this.config.pageSize,
      segments: this.config.segments,
      maxConcurrency: this.config.maxConcurrency,
      retry: this.config.scanRetry,
      signal: options.signal,
      progress,
      logger: this.logger,
      metrics: this.metrics,
      ...overrides,
    };
  }

  private writeOptions(options: RunOptions, progress: TransferProgress, strict: boolean): WriteOptions {
    return {
      maxConcurrency: this.config.maxConcurrency,
      maxRetryRounds: this.config.maxRetryRounds,
      retry: this.config.writeRetry,
      strict,
      signal: options.signal,
      progress,
      logger: this.logger,
      metrics: this.metrics,
    };
  }

  private async run(
    operation: TransferOperation,
    tables: string[],
    options: RunOptions,
    body: (progress: TransferProgress) => Promise<void>
  ): Promise<TransferSummary> {
    const progress = new TransferProgress({
      maxReportedFailures: this.config.maxReportedFailures,
      onProgress: options.onProgress,
      metrics: this.metrics,
      labels: { operation },
    });
    this.logger.info('Transfer started', { operation, tables });

    let error: unknown;
    try {
      await body(progress);
    } catch (caught) {
      error = caught;
    }

    const summary = buildSummary(operation, tables, progress, {
      error,
      cancelled: options.signal?.aborted ?? false,
    });
    this.metrics.recordHistogram(TransferMetricNames.OPERATION_DURATION, summary.elapsedMs / 1000, { operation });
    if (summary.error) {
      logError(this.logger, operation, summary.error);
    } else {
      logOperation(this.logger, operation, tables.join(' -> '), summary.elapsedMs, {
        status: summary.status,
        read: summary.read,
        written: summary.written,
        failed: summary.failed,
        itemsPerSecond: summary.itemsPerSecond,
        readUnits: summary.capacity.read.consumedUnits,
        writeUnits: summary.capacity.write.consumedUnits,
        throttles: summary.capacity.read.throttles + summary.capacity.write.throttles,
      });
    }
    return summary;
  }
}

/**
 * Export destination. A path is opened before the scan starts, so a bad path
 * fails the run up front.
 */
interface Output {
  /** Called once, by the writer that consumes the stream */
  stream(): Writable;
  /** Releases the destination when no writer was created */
  discard(): Promise<void>;
}

async function openOutput(sink: string | Writable): Promise<Output> {
  if (typeof sink !== 'string') {
    const stream = sink;
    return {
      stream: () => stream,
      discard: async () => {
        stream.end();
      },
    };
  }
  const handle = await open(sink, 'w');
  return {
    stream: () => handle.createWriteStream(),
    discard: () => handle.close(),
  };
}

/**
 * Passes decoded items through and records the records that failed to decode.
 */
async function* decodedItems(
  records: AsyncIterable<SourceRecord>,
  progress: TransferProgress,
  strict: boolean
): AsyncGenerator<Item> {
  for await (const record of records) {
    if (record.error === undefined) {
      yield record.item;
      continue;
    }
    if (strict) {
      throw record.error;
    }
    progress.recordRead();
    progress.recordFailure({
      position: record.position,
      reason: 'malformed',
      code: record.error.code,
      message: record.error.message,
    });
  }
}

function parseFilterOption(text: string | undefined): Filter | undefined {
  return text === undefined || text.trim().length === 0 ? undefined : parseFilter(text);
}

function keyOf(item: Item, keySchema: KeySchema): Key | undefined {
  try {
    return extractKey(item, keySchema);
  } catch (error) {
    if (error instanceof MalformedValueError) {
      return undefined;
    }
    throw error;
  }
}

function describeKey(schema: KeySchema): string {
  const parts = [`${schema.partitionKey.name}:${schema.partitionKey.type}`];
  if (schema.sortKey) {
    parts.push(`${schema.sortKey.name}:${schema.sortKey.type}`);
  }
  return parts.join(', ');
}
