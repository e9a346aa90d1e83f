/**
 * Data transfer engine for Amazon DynamoDB.
 *
 * @example
 * ```typescript
 * import { TransferEngine, createTableService, exitCodeFor } from 'dynamo-transfer';
 *
 * const engine = new TransferEngine(createTableService({ region: 'eu-west-1' }));
 * const summary = await engine.export('Users', 'jsonl', 'users.jsonl', { filter: 'status = active' });
 * process.exitCode = exitCodeFor(summary);
 * ```
 *
 * @module dynamo-transfer
 */

export * from './types/index.js';
export * from './error/index.js';
export * from './config/index.js';
export * from './resilience/index.js';
export * from './observability/index.js';
export * from './codec/index.js';
export * from './filter/index.js';
export * from './provider/index.js';
export * from './client/index.js';
export * from './scan/index.js';
export * from './batch/index.js';
export * from './format/index.js';
export * from './transfer/index.js';
export * from './testing/index.js';
