/**
 * Transfer orchestration and outcomes.
 */

export { TransferEngine } from './engine.js';
export type {
  TransferEngineOptions,
  RunOptions,
  CopyOptions,
  ExportOptions,
  ImportOptions,
  TruncateOptions,
} from './engine.js';
export { buildSummary, exitCodeFor, assertComplete } from './summary.js';
export type { TransferSummary, TransferStatus, TransferOperation } from './summary.js';
