/**
 * Decimal number helpers.
 *
 * Number values are decimal strings. These helpers validate them, decide
 * whether a JSON number can carry them exactly, and compare them without
 * going through floating point.
 */

import { MalformedValueError } from '../error/index.js';

/** Any number text the service accepts: sign, digits, optional fraction and exponent */
const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** JSON number syntax; used when inferring a type from untyped text */
const JSON_NUMBER_PATTERN = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/;

export function isDecimalText(text: string): boolean {
  const match = DECIMAL_PATTERN.exec(text);
  return match !== null && ((match[2] ?? '').length > 0 || (match[3] ?? '').length > 0);
}

export function isJsonNumberText(text: string): boolean {
  return JSON_NUMBER_PATTERN.test(text);
}

/**
 * Canonical form used for equality: `[-]<digits>e<exponent>` with no
 * leading or trailing zeros in the digits, or `0`.
 *
 * @throws {MalformedValueError} If the text is not a decimal number
 */
export function normalizeDecimal(text: string): string {
  const match = DECIMAL_PATTERN.exec(text);
  const integerPart = match?.[2] ?? '';
  const fractionPart = match?.[3] ?? '';
  if (!match || (integerPart.length === 0 && fractionPart.length === 0)) {
    throw new MalformedValueError(`Invalid number: ${text}`, { value: text });
  }

  let digits = (integerPart + fractionPart).replace(/^0+/, '');
  if (digits.length === 0) {
    return '0';
  }
  let exponent = parseInt(match[4] ?? '0', 10) - fractionPart.length;
  const trimmed = digits.replace(/0+$/, '');
  exponent += digits.length - trimmed.length;
  digits = trimmed;

  return `${match[1] === '-' ? '-' : ''}${digits}e${exponent}`;
}

export function decimalEquals(a: string, b: string): boolean {
  return normalizeDecimal(a) === normalizeDecimal(b);
}

/**
 * True when `JSON.parse(String(Number(text)))` gives back exactly `text`,
 * i.e. a JSON number carries this decimal without loss.
 */
export function isExactJsonNumber(text: string): boolean {
  const parsed = Number(text);
  if (!Number.isFinite(parsed) || String(parsed) !== text) {
    return false;
  }
  return !Number.isInteger(parsed) || Number.isSafeInteger(parsed);
}

/**
 * Decimal text for a JSON number read from a flat file.
 *
 * @throws {MalformedValueError} For NaN or infinities
 */
export function numberToDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new MalformedValueError(`Number is not finite: ${value}`, { value: String(value) });
  }
  return String(value);
}
