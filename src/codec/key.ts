/**
 * Primary key extraction and identity.
 */

import { MalformedValueError } from '../error/index.js';
import type { Item, Key, KeyAttribute, KeySchema, Value } from '../types/index.js';
import { keyAttributeNames } from '../types/index.js';
import { encodeBase64 } from './binary.js';
import { normalizeDecimal } from './number.js';

/**
 * Returns the key attributes of an item.
 *
 * @throws {MalformedValueError} When a key attribute is missing, null or
 * not of the declared scalar type
 */
export function extractKey(item: Item, schema: KeySchema): Key {
  const key: Key = { [schema.partitionKey.name]: keyValue(item, schema.partitionKey) };
  if (schema.sortKey) {
    key[schema.sortKey.name] = keyValue(item, schema.sortKey);
  }
  return key;
}

function keyValue(item: Item, attribute: KeyAttribute): Value {
  const value = Object.hasOwn(item, attribute.name) ? item[attribute.name] : undefined;
  if (value === undefined || value.type === 'NULL') {
    throw new MalformedValueError(`Missing key attribute '${attribute.name}'`, { attribute: attribute.name });
  }
  if (value.type !== attribute.type) {
    throw new MalformedValueError(
      `Key attribute '${attribute.name}' must be of type ${attribute.type}, got ${value.type}`,
      { attribute: attribute.name }
    );
  }
  return value;
}

/**
 * Stable string identity of a key. Equal numbers in different notations
 * share an identity.
 */
export function keyFingerprint(key: Key, schema: KeySchema): string {
  return JSON.stringify(
    keyAttributeNames(schema).map((name) => {
      const value: Value | undefined = Object.hasOwn(key, name) ? key[name] : undefined;
      switch (value?.type) {
        case 'S':
          return ['S', value.value];
        case 'N':
          return ['N', normalizeDecimal(value.value)];
        case 'B':
          return ['B', encodeBase64(value.value)];
        default:
          return [value?.type ?? 'absent'];
      }
    })
  );
}
