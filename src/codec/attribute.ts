/**
 * Conversion between the AWS SDK attribute value shape and Value.
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { MalformedValueError } from '../error/index.js';
import type { Item, Value } from '../types/index.js';

export function fromAttributeValue(attribute: AttributeValue): Value {
  if (attribute.NULL !== undefined) {
    return { type: 'NULL' };
  }
  if (attribute.BOOL !== undefined) {
    return { type: 'BOOL', value: attribute.BOOL };
  }
  if (attribute.N !== undefined) {
    return { type: 'N', value: attribute.N };
  }
  if (attribute.S !== undefined) {
    return { type: 'S', value: attribute.S };
  }
  if (attribute.B !== undefined) {
    return { type: 'B', value: attribute.B };
  }
  if (attribute.L !== undefined) {
    return { type: 'L', value: attribute.L.map(fromAttributeValue) };
  }
  if (attribute.M !== undefined) {
    return { type: 'M', value: fromAttributeMap(attribute.M) };
  }
  if (attribute.SS !== undefined) {
    return { type: 'SS', value: attribute.SS };
  }
  if (attribute.NS !== undefined) {
    return { type: 'NS', value: attribute.NS };
  }
  if (attribute.BS !== undefined) {
    return { type: 'BS', value: attribute.BS };
  }
  throw new MalformedValueError('Attribute value has no recognized type', {
    keys: Object.keys(attribute),
  });
}

export function toAttributeValue(value: Value): AttributeValue {
  switch (value.type) {
    case 'NULL':
      return { NULL: true };
    case 'BOOL':
      return { BOOL: value.value };
    case 'N':
      return { N: value.value };
    case 'S':
      return { S: value.value };
    case 'B':
      return { B: value.value };
    case 'L':
      return { L: value.value.map(toAttributeValue) };
    case 'M':
      return { M: toAttributeMap(value.value) };
    case 'SS':
      return { SS: value.value };
    case 'NS':
      return { NS: value.value };
    case 'BS':
      return { BS: value.value };
  }
}

export function fromAttributeMap(attributes: Record<string, AttributeValue>): Item {
  const item: Item = {};
  for (const [name, attribute] of Object.entries(attributes)) {
    item[name] = fromAttributeValue(attribute);
  }
  return item;
}

export function toAttributeMap(item: Item): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = {};
  for (const [name, value] of Object.entries(item)) {
    attributes[name] = toAttributeValue(value);
  }
  return attributes;
}
