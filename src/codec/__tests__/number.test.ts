import { describe, it, expect } from 'vitest';
import {
  decimalEquals,
  isDecimalText,
  isExactJsonNumber,
  isJsonNumberText,
  normalizeDecimal,
} from '../number.js';
import { MalformedValueError } from '../../error/index.js';

describe('normalizeDecimal', () => {
  it('should strip leading and trailing zeros', () => {
    expect(normalizeDecimal('1.50')).toBe('15e-1');
    expect(normalizeDecimal('001.5')).toBe('15e-1');
    expect(normalizeDecimal('-12e3')).toBe('-12e3');
    expect(normalizeDecimal('12000')).toBe('12e3');
  });

  it('should map every zero to 0', () => {
    expect(normalizeDecimal('0')).toBe('0');
    expect(normalizeDecimal('-0.000')).toBe('0');
    expect(normalizeDecimal('0e10')).toBe('0');
  });

  it('should throw on text that is not a number', () => {
    expect(() => normalizeDecimal('abc')).toThrow(MalformedValueError);
    expect(() => normalizeDecimal('.')).toThrow(MalformedValueError);
    expect(() => normalizeDecimal('')).toThrow(MalformedValueError);
  });
});

describe('decimalEquals', () => {
  it('should compare by value', () => {
    expect(decimalEquals('1', '1.0')).toBe(true);
    expect(decimalEquals('100', '1e2')).toBe(true);
    expect(decimalEquals('0.1', '1e-1')).toBe(true);
    expect(decimalEquals('12345678901234567890', '12345678901234567891')).toBe(false);
  });
});

describe('isExactJsonNumber', () => {
  it('should accept canonical safe numbers', () => {
    expect(isExactJsonNumber('42')).toBe(true);
    expect(isExactJsonNumber('-0.5')).toBe(true);
    expect(isExactJsonNumber('9007199254740991')).toBe(true);
  });

  it('should reject values that lose precision or form', () => {
    expect(isExactJsonNumber('9007199254740993')).toBe(false);
    expect(isExactJsonNumber('1.0')).toBe(false);
    expect(isExactJsonNumber('1e21')).toBe(false);
    expect(isExactJsonNumber('-0')).toBe(false);
  });
});

describe('number syntax', () => {
  it('should accept service number text', () => {
    expect(isDecimalText('007')).toBe(true);
    expect(isDecimalText('+1.')).toBe(true);
    expect(isDecimalText('.5e-3')).toBe(true);
    expect(isDecimalText('1.2.3')).toBe(false);
  });

  it('should only infer JSON number syntax', () => {
    expect(isJsonNumberText('12.5e3')).toBe(true);
    expect(isJsonNumberText('007')).toBe(false);
    expect(isJsonNumberText('+1')).toBe(false);
    expect(isJsonNumberText('1.')).toBe(false);
  });
});
