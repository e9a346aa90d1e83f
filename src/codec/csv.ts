/**
 * CSV cell encoding of Value.
 *
 * A cell is `undefined` when the attribute is absent; the CSV writer emits
 * it as an empty unquoted field and the reader gives it back as `null`.
 */

import { MalformedValueError } from '../error/index.js';
import type { ScalarType, Value } from '../types/index.js';
import { decodeBase64 } from './binary.js';
import { decodeValue, encodeValue, type FlatValue } from './flat.js';
import { isDecimalText, isJsonNumberText } from './number.js';

export function encodeCell(value: Value | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  switch (value.type) {
    case 'NULL':
      return 'null';
    case 'BOOL':
      return value.value ? 'true' : 'false';
    case 'N':
    case 'S':
      return value.value;
    case 'B':
    case 'L':
    case 'M':
    case 'SS':
    case 'NS':
    case 'BS':
      return JSON.stringify(encodeValue(value));
  }
}

/**
 * Decodes a cell. `null` (an empty unquoted field) is an absent attribute.
 *
 * @throws {MalformedValueError} If the text does not parse as the hinted type
 */
export function decodeCell(cell: string | null, hint?: ScalarType): Value | undefined {
  if (cell === null) {
    return undefined;
  }

  switch (hint) {
    case 'S':
      return { type: 'S', value: cell };
    case 'N':
      if (!isDecimalText(cell)) {
        throw new MalformedValueError(`Invalid number: ${cell}`, { value: cell });
      }
      return { type: 'N', value: cell };
    case 'B':
      return { type: 'B', value: decodeBase64(cell) };
    case undefined:
      return inferCell(cell);
  }
}

function inferCell(cell: string): Value {
  if (cell === 'true' || cell === 'false') {
    return { type: 'BOOL', value: cell === 'true' };
  }
  if (cell === 'null') {
    return { type: 'NULL' };
  }
  if (isJsonNumberText(cell)) {
    return { type: 'N', value: cell };
  }
  if (cell.startsWith('{') || cell.startsWith('[')) {
    const parsed = parseJson(cell);
    if (parsed !== undefined) {
      return decodeValue(parsed);
    }
  }
  return { type: 'S', value: cell };
}

function parseJson(text: string): FlatValue | undefined {
  try {
    const parsed: FlatValue = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
