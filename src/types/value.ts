/**
 * Typed attribute value model.
 *
 * Mirrors the DynamoDB attribute value union. Numbers are kept as decimal
 * strings so that no precision is lost between source and destination.
 */

// ============================================================================
// Value Types
// ============================================================================

export type Value =
  | { type: 'NULL' }
  | { type: 'BOOL'; value: boolean }
  | { type: 'N'; value: string }
  | { type: 'S'; value: string }
  | { type: 'B'; value: Uint8Array }
  | { type: 'L'; value: Value[] }
  | { type: 'M'; value: Record<string, Value> }
  | { type: 'SS'; value: string[] }
  | { type: 'NS'; value: string[] }
  | { type: 'BS'; value: Uint8Array[] };

export type ValueType = Value['type'];

/**
 * Narrows a Value to the member with the given tag.
 */
export type ValueOf<T extends ValueType> = Extract<Value, { type: T }>;

/**
 * Scalar types allowed for key attributes.
 */
export type ScalarType = 'S' | 'N' | 'B';

// ============================================================================
// Value Construction
// ============================================================================

/**
 * Constructors for each Value member.
 *
 * @example
 * ```typescript
 * const item = {
 *   id: Values.string('1'),
 *   tags: Values.stringSet(['a', 'b']),
 * };
 * ```
 */
export const Values = {
  null: (): Value => ({ type: 'NULL' }),
  boolean: (value: boolean): Value => ({ type: 'BOOL', value }),
  number: (value: number | string): Value => ({ type: 'N', value: String(value) }),
  string: (value: string): Value => ({ type: 'S', value }),
  binary: (value: Uint8Array): Value => ({ type: 'B', value }),
  list: (value: Value[]): Value => ({ type: 'L', value }),
  map: (value: Record<string, Value>): Value => ({ type: 'M', value }),
  stringSet: (value: string[]): Value => ({ type: 'SS', value }),
  numberSet: (value: Array<number | string>): Value => ({ type: 'NS', value: value.map(String) }),
  binarySet: (value: Uint8Array[]): Value => ({ type: 'BS', value }),
} as const;

/**
 * Returns true for the three set members of the union.
 */
export function isSetValue(value: Value): value is ValueOf<'SS'> | ValueOf<'NS'> | ValueOf<'BS'> {
  return value.type === 'SS' || value.type === 'NS' || value.type === 'BS';
}
