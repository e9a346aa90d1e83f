/**
 * Test doubles for the table service boundary.
 */

export { InMemoryTableService, tableDefinition } from './mock.js';
export type { InMemoryTableServiceOptions, MemoryToken, Operation, WriteMatcher } from './mock.js';
