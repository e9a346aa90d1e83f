import { describe, it, expect } from 'vitest';
import { evaluateFilter, filterAttributes } from '../evaluate.js';
import { toFilterExpression } from '../expression.js';
import { parseFilter } from '../parser.js';
import { Values } from '../../types/index.js';
import type { Item } from '../../types/index.js';

const item: Item = {
  id: Values.string('1'),
  status: Values.string('active'),
  count: Values.number('10'),
  verified: Values.boolean(false),
};

const matches = (text: string): boolean => evaluateFilter(parseFilter(text), item);

describe('evaluateFilter', () => {
  it('should compare strings exactly', () => {
    expect(matches('status = active')).toBe(true);
    expect(matches('status = Active')).toBe(false);
  });

  it('should compare numbers by value', () => {
    expect(matches('count = 10.0')).toBe(true);
    expect(matches('count = 1e1')).toBe(true);
    expect(matches('count != 11')).toBe(true);
  });

  it('should never equate values of different types', () => {
    expect(matches('count = "10"')).toBe(false);
    expect(matches('verified = "false"')).toBe(false);
    expect(matches('verified = false')).toBe(true);
  });

  it('should treat missing attributes as unequal', () => {
    expect(matches('missing = x')).toBe(false);
    expect(matches('missing != x')).toBe(true);
  });

  it('should check existence', () => {
    expect(matches('attribute_exists(status)')).toBe(true);
    expect(matches('attribute_not_exists(status)')).toBe(false);
    expect(matches('attribute_not_exists(constructor)')).toBe(true);
  });

  it('should require every clause of a conjunction', () => {
    expect(matches('status = active AND count = 10')).toBe(true);
    expect(matches('status = active AND count = 11')).toBe(false);
  });
});

describe('filterAttributes', () => {
  it('should list each attribute once', () => {
    expect(filterAttributes(parseFilter('a = 1 AND b exists AND a != 2'))).toEqual(['a', 'b']);
  });
});

describe('toFilterExpression', () => {
  it('should use placeholders for names and values', () => {
    expect(toFilterExpression(parseFilter('status = archived AND attribute_exists(owner)'))).toEqual({
      expression: '#attr0 = :val0 AND attribute_exists(#attr1)',
      names: { '#attr0': 'status', '#attr1': 'owner' },
      values: { ':val0': { S: 'archived' } },
    });
  });

  it('should reuse the placeholder of a repeated attribute', () => {
    expect(toFilterExpression(parseFilter('a = 1 AND a <> 2'))).toEqual({
      expression: '#attr0 = :val0 AND #attr0 <> :val1',
      names: { '#attr0': 'a' },
      values: { ':val0': { N: '1' }, ':val1': { N: '2' } },
    });
  });

  it('should render single clauses without values', () => {
    expect(toFilterExpression(parseFilter('deleted not_exists'))).toEqual({
      expression: 'attribute_not_exists(#attr0)',
      names: { '#attr0': 'deleted' },
      values: {},
    });
  });
});
