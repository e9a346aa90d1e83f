/**
 * Item size estimation using the service's sizing rules.
 */

import type { Item, Value } from '../types/index.js';
import { normalizeDecimal } from './number.js';

const utf8Length = (text: string): number => Buffer.byteLength(text, 'utf8');

function numberSize(decimal: string): number {
  const normalized = normalizeDecimal(decimal);
  const digits = normalized === '0' ? 1 : normalized.replace(/^-/, '').split('e')[0]?.length ?? 1;
  return Math.ceil(digits / 2) + 1;
}

function valueSize(value: Value): number {
  switch (value.type) {
    case 'NULL':
    case 'BOOL':
      return 1;
    case 'N':
      return numberSize(value.value);
    case 'S':
      return utf8Length(value.value);
    case 'B':
      return value.value.byteLength;
    case 'L':
      return 3 + value.value.reduce((total, element) => total + 1 + valueSize(element), 0);
    case 'M':
      return (
        3 +
        Object.entries(value.value).reduce(
          (total, [name, element]) => total + 1 + utf8Length(name) + valueSize(element),
          0
        )
      );
    case 'SS':
      return value.value.reduce((total, element) => total + utf8Length(element), 0);
    case 'NS':
      return value.value.reduce((total, element) => total + numberSize(element), 0);
    case 'BS':
      return value.value.reduce((total, element) => total + element.byteLength, 0);
  }
}

/**
 * Estimated stored size in bytes: attribute name bytes plus value bytes.
 */
export function itemSize(item: Item): number {
  let total = 0;
  for (const [name, value] of Object.entries(item)) {
    total += utf8Length(name) + valueSize(value);
  }
  return total;
}
