/**
 * Type codec: SDK attribute values, flat JSON values and CSV cells.
 */

export { fromAttributeValue, toAttributeValue, fromAttributeMap, toAttributeMap } from './attribute.js';
export { encodeValue, decodeValue, encodeItem, decodeItem, isFlatObject } from './flat.js';
export type { FlatValue, FlatObject, FlatItem } from './flat.js';
export { encodeCell, decodeCell } from './csv.js';
export {
  isDecimalText,
  isJsonNumberText,
  normalizeDecimal,
  decimalEquals,
  isExactJsonNumber,
  numberToDecimal,
} from './number.js';
export { encodeBase64, decodeBase64 } from './binary.js';
export { itemSize } from './size.js';
export { valuesEqual } from './equality.js';
export { extractKey, keyFingerprint } from './key.js';
