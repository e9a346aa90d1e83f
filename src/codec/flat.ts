/**
 * Flat JSON encoding of Value.
 *
 * Plain JSON covers most values directly. The rest use a one-key tagged
 * object:
 *
 * - `{"N": "<decimal>"}` for numbers a JSON number cannot carry exactly
 * - `{"B": "<base64>"}` for binary
 * - `{"S": [...]}`, `{"N": [...]}`, `{"B": [...]}` for string, number and binary sets
 * - `{"M": {...}}` for maps that would otherwise look like one of the above
 */

import { MalformedValueError } from '../error/index.js';
import type { Item, ScalarType, Value } from '../types/index.js';
import { decodeBase64, encodeBase64 } from './binary.js';
import { isDecimalText, isExactJsonNumber, normalizeDecimal, numberToDecimal } from './number.js';

export type FlatValue = null | boolean | number | string | FlatValue[] | FlatObject;

export interface FlatObject {
  [key: string]: FlatValue;
}

export type FlatItem = FlatObject;

const TAGS = new Set(['S', 'N', 'B', 'M']);

// ============================================================================
// Encoding
// ============================================================================

export function encodeValue(value: Value): FlatValue {
  switch (value.type) {
    case 'NULL':
      return null;
    case 'BOOL':
      return value.value;
    case 'N':
      return isExactJsonNumber(value.value) ? Number(value.value) : { N: value.value };
    case 'S':
      return value.value;
    case 'B':
      return { B: encodeBase64(value.value) };
    case 'L':
      return value.value.map(encodeValue);
    case 'M': {
      const encoded = encodeItem(value.value);
      return looksTagged(encoded) ? { M: encoded } : encoded;
    }
    case 'SS':
      return { S: [...value.value] };
    case 'NS':
      return { N: value.value.map(encodeNumber) };
    case 'BS':
      return { B: value.value.map(encodeBase64) };
  }
}

export function encodeItem(item: Item): FlatItem {
  const encoded: FlatItem = {};
  for (const [name, value] of Object.entries(item)) {
    encoded[name] = encodeValue(value);
  }
  return encoded;
}

function encodeNumber(decimal: string): number | string {
  return isExactJsonNumber(decimal) ? Number(decimal) : decimal;
}

function looksTagged(object: FlatObject): boolean {
  const keys = Object.keys(object);
  return keys.length === 1 && TAGS.has(keys[0] ?? '');
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decodes a flat value. A scalar hint (from the table's key schema) takes
 * precedence over syntactic inference.
 *
 * @throws {MalformedValueError} On heterogeneous sets, bad number or base64
 * text, or a value that does not fit its hint
 */
export function decodeValue(flat: FlatValue, hint?: ScalarType): Value {
  if (hint !== undefined) {
    return decodeHinted(flat, hint);
  }

  if (flat === null) {
    return { type: 'NULL' };
  }
  if (typeof flat === 'boolean') {
    return { type: 'BOOL', value: flat };
  }
  if (typeof flat === 'number') {
    return { type: 'N', value: numberToDecimal(flat) };
  }
  if (typeof flat === 'string') {
    return { type: 'S', value: flat };
  }
  if (Array.isArray(flat)) {
    return { type: 'L', value: flat.map((element) => decodeValue(element)) };
  }

  const tagged = decodeTagged(flat);
  return tagged ?? { type: 'M', value: decodeItem(flat) };
}

export function decodeItem(flat: FlatItem, hints: Record<string, ScalarType> = {}): Item {
  const item: Item = {};
  for (const [name, value] of Object.entries(flat)) {
    try {
      item[name] = decodeValue(value, hints[name]);
    } catch (error) {
      if (error instanceof MalformedValueError) {
        throw new MalformedValueError(`Attribute '${name}': ${error.message}`, {
          ...error.details,
          attribute: name,
        });
      }
      throw error;
    }
  }
  return item;
}

function decodeTagged(object: FlatObject): Value | undefined {
  const keys = Object.keys(object);
  const tag = keys[0];
  if (keys.length !== 1 || tag === undefined || !TAGS.has(tag)) {
    return undefined;
  }
  const payload = object[tag] ?? null;

  switch (tag) {
    case 'S':
      if (typeof payload === 'string') {
        return { type: 'S', value: payload };
      }
      if (Array.isArray(payload)) {
        return { type: 'SS', value: uniqueBy(payload.map((element) => setString(element, 'S')), (s) => s) };
      }
      break;
    case 'N':
      if (typeof payload === 'string') {
        return { type: 'N', value: decimalText(payload) };
      }
      if (Array.isArray(payload)) {
        return { type: 'NS', value: uniqueBy(payload.map(setNumber), normalizeDecimal) };
      }
      break;
    case 'B':
      if (typeof payload === 'string') {
        return { type: 'B', value: decodeBase64(payload) };
      }
      if (Array.isArray(payload)) {
        const encoded = uniqueBy(payload.map((element) => setString(element, 'B')), (s) => s);
        return { type: 'BS', value: encoded.map(decodeBase64) };
      }
      break;
    case 'M':
      if (isFlatObject(payload)) {
        return { type: 'M', value: decodeItem(payload) };
      }
      break;
  }

  throw new MalformedValueError(`Tagged value '${tag}' has an invalid payload`, { tag });
}

function decodeHinted(flat: FlatValue, hint: ScalarType): Value {
  const tagged = taggedText(flat, hint);
  switch (hint) {
    case 'S':
      if (typeof flat === 'string') {
        return { type: 'S', value: flat };
      }
      if (typeof flat === 'number') {
        return { type: 'S', value: numberToDecimal(flat) };
      }
      if (tagged !== undefined) {
        return { type: 'S', value: tagged };
      }
      break;
    case 'N':
      if (typeof flat === 'number') {
        return { type: 'N', value: numberToDecimal(flat) };
      }
      if (typeof flat === 'string') {
        return { type: 'N', value: decimalText(flat) };
      }
      if (tagged !== undefined) {
        return { type: 'N', value: decimalText(tagged) };
      }
      break;
    case 'B':
      if (typeof flat === 'string') {
        return { type: 'B', value: decodeBase64(flat) };
      }
      if (tagged !== undefined) {
        return { type: 'B', value: decodeBase64(tagged) };
      }
      break;
  }
  throw new MalformedValueError(`Expected a value of type ${hint}, got ${describe(flat)}`, { expected: hint });
}

function taggedText(flat: FlatValue, tag: ScalarType): string | undefined {
  if (!isFlatObject(flat)) {
    return undefined;
  }
  const keys = Object.keys(flat);
  const payload = flat[tag];
  return keys.length === 1 && typeof payload === 'string' ? payload : undefined;
}

function setString(element: FlatValue, tag: 'S' | 'B'): string {
  if (typeof element !== 'string') {
    throw new MalformedValueError(`Set '${tag}' has a heterogeneous element: ${describe(element)}`, { tag });
  }
  return element;
}

function setNumber(element: FlatValue): string {
  if (typeof element === 'number') {
    return numberToDecimal(element);
  }
  if (typeof element === 'string' && isDecimalText(element)) {
    return element;
  }
  throw new MalformedValueError(`Set 'N' has a heterogeneous element: ${describe(element)}`, { tag: 'N' });
}

function decimalText(text: string): string {
  if (!isDecimalText(text)) {
    throw new MalformedValueError(`Invalid number: ${text}`, { value: text });
  }
  return text;
}

function uniqueBy<T>(elements: T[], identity: (element: T) => string): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const element of elements) {
    const id = identity(element);
    if (!seen.has(id)) {
      seen.add(id);
      unique.push(element);
    }
  }
  return unique;
}

export function isFlatObject(value: FlatValue | undefined): value is FlatObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(flat: FlatValue): string {
  if (flat === null) {
    return 'null';
  }
  if (Array.isArray(flat)) {
    return 'array';
  }
  return typeof flat;
}
