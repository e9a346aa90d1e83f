/**
 * Streaming file formats for export and import.
 */

export { JsonLinesWriter, readJsonLines } from './jsonl.js';
export { CsvWriter, readCsv } from './csv.js';
export type { FileFormat, SourceRecord, ReadOptions, ItemWriter } from './types.js';
