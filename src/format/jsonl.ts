/**
 * JSON-lines: one flat-encoded item per line.
 */

import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { decodeItem, encodeItem, isFlatObject } from '../codec/index.js';
import type { FlatValue } from '../codec/index.js';
import { MalformedValueError } from '../error/index.js';
import type { Item } from '../types/index.js';
import type { ItemWriter, ReadOptions, SourceRecord } from './types.js';

export class JsonLinesWriter implements ItemWriter {
  private readonly done: Promise<void>;
  private failure?: Error;

  constructor(private readonly stream: Writable) {
    this.done = finished(stream);
    this.done.catch((error: unknown) => {
      this.failure = error instanceof Error ? error : new Error(String(error));
    });
  }

  /**
   * Rejects with the stream's error once the stream has failed.
   */
  async write(item: Item): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    const line = `${JSON.stringify(encodeItem(item))}\n`;
    if (!this.stream.write(line)) {
      // An errored stream never drains
      await Promise.race([once(this.stream, 'drain'), this.done]);
    }
  }

  async end(): Promise<void> {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    await this.done;
  }
}

/**
 * Reads records line by line. Blank lines are skipped; positions are 1-based
 * line numbers.
 */
export async function* readJsonLines(input: Readable, options: ReadOptions = {}): AsyncGenerator<SourceRecord> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let position = 0;

  for await (const line of lines) {
    position++;
    if (line.trim().length === 0) {
      continue;
    }
    yield decodeLine(line, position, options);
  }
}

function decodeLine(line: string, position: number, options: ReadOptions): SourceRecord {
  let parsed: FlatValue;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    return {
      position,
      error: new MalformedValueError(`Line ${position}: invalid JSON`, {
        position,
        cause: error instanceof Error ? error.message : String(error),
      }),
    };
  }

  if (!isFlatObject(parsed)) {
    return { position, error: new MalformedValueError(`Line ${position}: expected a JSON object`, { position }) };
  }

  try {
    return { position, item: decodeItem(parsed, options.hints) };
  } catch (error) {
    if (error instanceof MalformedValueError) {
      return { position, error: new MalformedValueError(`Line ${position}: ${error.message}`, { position }) };
    }
    throw error;
  }
}
