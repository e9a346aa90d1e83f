import { describe, it, expect } from 'vitest';
import { decodeCell, encodeCell } from '../csv.js';
import { MalformedValueError } from '../../error/index.js';
import { Values } from '../../types/index.js';

describe('encodeCell', () => {
  it('should leave absent attributes undefined', () => {
    expect(encodeCell(undefined)).toBeUndefined();
  });

  it('should write scalars as text', () => {
    expect(encodeCell(Values.string('hello'))).toBe('hello');
    expect(encodeCell(Values.string(''))).toBe('');
    expect(encodeCell(Values.number('1.50'))).toBe('1.50');
    expect(encodeCell(Values.boolean(false))).toBe('false');
    expect(encodeCell(Values.null())).toBe('null');
  });

  it('should write composite values as flat JSON text', () => {
    expect(encodeCell(Values.stringSet(['a', 'b']))).toBe('{"S":["a","b"]}');
    expect(encodeCell(Values.map({ a: Values.number('1') }))).toBe('{"a":1}');
    expect(encodeCell(Values.list([Values.string('x')]))).toBe('["x"]');
    expect(encodeCell(Values.binary(new Uint8Array([1, 2, 3])))).toBe('{"B":"AQID"}');
  });
});

describe('decodeCell', () => {
  it('should read an empty unquoted cell as absent', () => {
    expect(decodeCell(null)).toBeUndefined();
    expect(decodeCell('')).toEqual({ type: 'S', value: '' });
  });

  it('should infer scalar types in order', () => {
    expect(decodeCell('true')).toEqual({ type: 'BOOL', value: true });
    expect(decodeCell('null')).toEqual({ type: 'NULL' });
    expect(decodeCell('42')).toEqual({ type: 'N', value: '42' });
    expect(decodeCell('007')).toEqual({ type: 'S', value: '007' });
    expect(decodeCell('hello')).toEqual({ type: 'S', value: 'hello' });
  });

  it('should decode JSON text as flat values', () => {
    expect(decodeCell('{"S":["a"]}')).toEqual({ type: 'SS', value: ['a'] });
    expect(decodeCell('[1,"a"]')).toEqual({
      type: 'L',
      value: [
        { type: 'N', value: '1' },
        { type: 'S', value: 'a' },
      ],
    });
    expect(decodeCell('{oops')).toEqual({ type: 'S', value: '{oops' });
  });

  it('should parse against the hinted type', () => {
    expect(decodeCell('42', 'S')).toEqual({ type: 'S', value: '42' });
    expect(decodeCell('007', 'N')).toEqual({ type: 'N', value: '007' });
    expect(() => decodeCell('x', 'N')).toThrow(MalformedValueError);
  });
});
