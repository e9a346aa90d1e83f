import type { Value } from '../types/index.js';
import { encodeBase64 } from './binary.js';
import { normalizeDecimal } from './number.js';

/**
 * Type-aware equality. Values of different types are never equal; numbers
 * compare by decimal value and sets ignore element order.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'NULL':
      return b.type === 'NULL';
    case 'BOOL':
      return b.type === 'BOOL' && a.value === b.value;
    case 'N':
      return b.type === 'N' && normalizeDecimal(a.value) === normalizeDecimal(b.value);
    case 'S':
      return b.type === 'S' && a.value === b.value;
    case 'B':
      return b.type === 'B' && bytesEqual(a.value, b.value);
    case 'L':
      return (
        b.type === 'L' &&
        a.value.length === b.value.length &&
        a.value.every((element, index) => {
          const other = b.value[index];
          return other !== undefined && valuesEqual(element, other);
        })
      );
    case 'M': {
      if (b.type !== 'M') {
        return false;
      }
      const keys = Object.keys(a.value);
      return (
        keys.length === Object.keys(b.value).length &&
        keys.every((key) => {
          const left = a.value[key];
          const right = Object.hasOwn(b.value, key) ? b.value[key] : undefined;
          return left !== undefined && right !== undefined && valuesEqual(left, right);
        })
      );
    }
    case 'SS':
      return b.type === 'SS' && sameMembers(a.value, b.value, (s) => s);
    case 'NS':
      return b.type === 'NS' && sameMembers(a.value, b.value, normalizeDecimal);
    case 'BS':
      return b.type === 'BS' && sameMembers(a.value, b.value, encodeBase64);
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.byteLength === b.byteLength && a.every((byte, index) => byte === b[index]);
}

function sameMembers<T>(a: T[], b: T[], identity: (element: T) => string): boolean {
  const left = new Set(a.map(identity));
  const right = new Set(b.map(identity));
  return left.size === right.size && [...left].every((id) => right.has(id));
}
