/**
 * Filter language: parsing, client-side evaluation and push-down translation.
 */

export { parseFilter } from './parser.js';
export { evaluateFilter, filterAttributes } from './evaluate.js';
export { toFilterExpression } from './expression.js';
export type { FilterExpression } from './expression.js';
