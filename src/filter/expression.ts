/**
 * Filter to DynamoDB FilterExpression translation.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { toAttributeValue } from '../codec/index.js';
import type { Filter } from '../types/index.js';

/**
 * Result of building a filter expression
 */
export interface FilterExpression {
  /** The complete filter expression string */
  expression: string;
  /** Expression attribute names mapping (#attr -> actual attribute name) */
  names: Record<string, string>;
  /** Expression attribute values mapping (:val -> actual value) */
  values: Record<string, AttributeValue>;
}

/**
 * Builds placeholder-based expressions. Each distinct attribute name gets
 * one `#attrN` placeholder; each value gets its own `:valN`.
 */
class ExpressionBuilder {
  private readonly names: Record<string, string> = {};
  private readonly values: Record<string, AttributeValue> = {};
  private readonly placeholders = new Map<string, string>();
  private valueCounter = 0;

  build(filter: Filter): FilterExpression {
    const expression = this.render(filter, false);
    return { expression, names: { ...this.names }, values: { ...this.values } };
  }

  private render(filter: Filter, nested: boolean): string {
    switch (filter.kind) {
      case 'equals':
        return `${this.name(filter.attribute)} = ${this.value(filter)}`;
      case 'notEquals':
        return `${this.name(filter.attribute)} <> ${this.value(filter)}`;
      case 'exists':
        return `attribute_exists(${this.name(filter.attribute)})`;
      case 'notExists':
        return `attribute_not_exists(${this.name(filter.attribute)})`;
      case 'and': {
        const joined = filter.clauses.map((clause) => this.render(clause, true)).join(' AND ');
        return nested && filter.clauses.length > 1 ? `(${joined})` : joined;
      }
    }
  }

  private name(attribute: string): string {
    const existing = this.placeholders.get(attribute);
    if (existing) {
      return existing;
    }
    const placeholder = `#attr${this.placeholders.size}`;
    this.placeholders.set(attribute, placeholder);
    this.names[placeholder] = attribute;
    return placeholder;
  }

  private value(filter: Extract<Filter, { kind: 'equals' | 'notEquals' }>): string {
    const placeholder = `:val${this.valueCounter}`;
    this.valueCounter++;
    this.values[placeholder] = toAttributeValue(filter.value);
    return placeholder;
  }
}

/**
 * Renders a filter as a DynamoDB FilterExpression.
 *
 * @example
 * ```typescript
 * toFilterExpression(parseFilter('status = archived AND attribute_exists(owner)'));
 * // {
 * //   expression: '#attr0 = :val0 AND attribute_exists(#attr1)',
 * //   names: { '#attr0': 'status', '#attr1': 'owner' },
 * //   values: { ':val0': { S: 'archived' } },
 * // }
 * ```
 */
export function toFilterExpression(filter: Filter): FilterExpression {
  return new ExpressionBuilder().build(filter);
}
