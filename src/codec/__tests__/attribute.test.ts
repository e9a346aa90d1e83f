import { describe, it, expect } from 'vitest';
import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { fromAttributeMap, fromAttributeValue, toAttributeMap } from '../attribute.js';
import { itemSize } from '../size.js';
import { Values } from '../../types/index.js';
import type { Item } from '../../types/index.js';

describe('attribute conversion', () => {
  it('should convert nested SDK attribute values', () => {
    const attributes: Record<string, AttributeValue> = {
      id: { S: 'user-1' },
      score: { N: '10.50' },
      tags: { SS: ['a', 'b'] },
      meta: { M: { nested: { L: [{ BOOL: true }, { NULL: true }] } } },
    };

    expect(fromAttributeMap(attributes)).toEqual({
      id: Values.string('user-1'),
      score: Values.number('10.50'),
      tags: Values.stringSet(['a', 'b']),
      meta: Values.map({ nested: Values.list([Values.boolean(true), Values.null()]) }),
    });
  });

  it('should convert back without changing number text', () => {
    const item: Item = {
      big: Values.number('123456789012345678901234567890'),
      bytes: Values.binarySet([new Uint8Array([1])]),
    };
    expect(toAttributeMap(item)).toEqual({
      big: { N: '123456789012345678901234567890' },
      bytes: { BS: [new Uint8Array([1])] },
    });
    expect(fromAttributeMap(toAttributeMap(item))).toEqual(item);
  });

  it('should throw on an attribute value with no known member', () => {
    const unknown: AttributeValue = { $unknown: ['X', 'y'] };
    expect(() => fromAttributeValue(unknown)).toThrow('Attribute value has no recognized type');
  });
});

describe('itemSize', () => {
  it('should count name and value bytes', () => {
    expect(itemSize({ id: Values.string('abc') })).toBe(5);
    expect(itemSize({ n: Values.number('123') })).toBe(4);
    expect(itemSize({ ok: Values.boolean(true), é: Values.string('é') })).toBe(3 + 4);
  });
});
