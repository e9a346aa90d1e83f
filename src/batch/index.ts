/**
 * Batched writes and deletes.
 */

export { writeItems } from './writer.js';
export type { WriteTarget, WriteOptions } from './writer.js';
