/**
 * Filter predicate AST.
 */

import type { Value } from './value.js';

export type Filter =
  | { kind: 'equals'; attribute: string; value: Value }
  | { kind: 'notEquals'; attribute: string; value: Value }
  | { kind: 'exists'; attribute: string }
  | { kind: 'notExists'; attribute: string }
  | { kind: 'and'; clauses: Filter[] };

export type FilterKind = Filter['kind'];
