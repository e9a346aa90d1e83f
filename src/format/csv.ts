/**
 * CSV: a header row of attribute names, then one row per item.
 *
 * Every present value is written quoted and an absent attribute as an empty
 * unquoted field, so the reader can tell an empty string from a missing
 * attribute.
 */

import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { parse } from 'csv-parse';
import type { CastingContext } from 'csv-parse';
import { stringify } from 'csv-stringify';
import type { Stringifier } from 'csv-stringify';
import { decodeCell, encodeCell } from '../codec/index.js';
import { MalformedValueError } from '../error/index.js';
import type { Item } from '../types/index.js';
import type { ItemWriter, ReadOptions, SourceRecord } from './types.js';

/** A parsed row; `null` marks an empty unquoted field */
type CsvRow = Array<string | null>;

export class CsvWriter implements ItemWriter {
  private readonly stringifier: Stringifier;
  private readonly done: Promise<void>;
  private readonly columns: Set<string>;
  private failure?: Error;

  constructor(
    stream: Writable,
    private readonly header: string[]
  ) {
    this.columns = new Set(header);
    this.stringifier = stringify({ header: true, columns: header, quoted_string: true });
    this.done = pipeline(this.stringifier, stream);
    this.done.catch((error: unknown) => {
      this.failure = error instanceof Error ? error : new Error(String(error));
    });
  }

  /**
   * @throws {MalformedValueError} When the item has attributes outside the header
   */
  async write(item: Item): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    const extra = Object.keys(item).filter((name) => !this.columns.has(name));
    if (extra.length > 0) {
      throw new MalformedValueError(`Attributes outside the CSV header: ${extra.join(', ')}`, { attributes: extra });
    }

    const row = this.header.map((name) => encodeCell(Object.hasOwn(item, name) ? item[name] : undefined));
    if (!this.stringifier.write(row)) {
      await once(this.stringifier, 'drain');
    }
  }

  async end(): Promise<void> {
    this.stringifier.end();
    await this.done;
  }
}

/**
 * Reads rows after the header. Positions are 1-based row numbers counting
 * the header as row 1.
 *
 * @throws {MalformedValueError} When the header itself is unusable
 */
export async function* readCsv(input: Readable, options: ReadOptions = {}): AsyncGenerator<SourceRecord> {
  const parser = parse({
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    cast: (value: string, context: CastingContext) => (value === '' && !context.quoting ? null : value),
  });
  input.pipe(parser);
  input.on('error', (error) => parser.destroy(error));

  const rows: AsyncIterable<unknown> = parser;
  let header: string[] | undefined;
  let position = 0;

  for await (const row of rows) {
    position++;
    if (!isCsvRow(row)) {
      yield { position, error: new MalformedValueError(`Row ${position}: unreadable row`, { position }) };
      continue;
    }
    if (header === undefined) {
      header = readHeader(row);
      continue;
    }
    yield decodeRow(header, row, position, options);
  }
}

function isCsvRow(row: unknown): row is CsvRow {
  return Array.isArray(row) && row.every((cell) => cell === null || typeof cell === 'string');
}

function readHeader(row: CsvRow): string[] {
  const names: string[] = [];
  for (const cell of row) {
    if (cell === null || cell.length === 0) {
      throw new MalformedValueError('CSV header contains an empty attribute name');
    }
    if (names.includes(cell)) {
      throw new MalformedValueError(`CSV header repeats attribute '${cell}'`);
    }
    names.push(cell);
  }
  return names;
}

function decodeRow(header: string[], row: CsvRow, position: number, options: ReadOptions): SourceRecord {
  if (row.length !== header.length) {
    return {
      position,
      error: new MalformedValueError(`Row ${position}: expected ${header.length} fields, got ${row.length}`, {
        position,
      }),
    };
  }

  const item: Item = {};
  for (let column = 0; column < header.length; column++) {
    const name = header[column] ?? '';
    const hint = options.hints && Object.hasOwn(options.hints, name) ? options.hints[name] : undefined;
    try {
      const value = decodeCell(row[column] ?? null, hint);
      if (value !== undefined) {
        item[name] = value;
      }
    } catch (error) {
      if (error instanceof MalformedValueError) {
        return {
          position,
          error: new MalformedValueError(`Row ${position}, attribute '${name}': ${error.message}`, { position }),
        };
      }
      throw error;
    }
  }
  return { position, item };
}
