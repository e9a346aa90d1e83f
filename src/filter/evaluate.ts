import { valuesEqual } from '../codec/index.js';
import type { Filter, Item, Value } from '../types/index.js';

function attributeOf(item: Item, name: string): Value | undefined {
  return Object.hasOwn(item, name) ? item[name] : undefined;
}

/**
 * Applies a filter to one record. A missing attribute never equals a value,
 * so `notEquals` holds for it.
 */
export function evaluateFilter(filter: Filter, item: Item): boolean {
  switch (filter.kind) {
    case 'equals': {
      const value = attributeOf(item, filter.attribute);
      return value !== undefined && valuesEqual(value, filter.value);
    }
    case 'notEquals': {
      const value = attributeOf(item, filter.attribute);
      return value === undefined || !valuesEqual(value, filter.value);
    }
    case 'exists':
      return attributeOf(item, filter.attribute) !== undefined;
    case 'notExists':
      return attributeOf(item, filter.attribute) === undefined;
    case 'and':
      return filter.clauses.every((clause) => evaluateFilter(clause, item));
  }
}

/**
 * Attribute names a filter reads.
 */
export function filterAttributes(filter: Filter): string[] {
  if (filter.kind === 'and') {
    return [...new Set(filter.clauses.flatMap(filterAttributes))];
  }
  return [filter.attribute];
}
