/**
 * faultscope Tests: MemberNotFound Extractor
 */

import { describe, expect, it } from 'vitest';
import {
  listMembers,
  MAX_LISTED_MEMBERS,
  type ExtractionResult,
  type MemberNotFoundDetail,
} from '../../src/index.js';
import { extractMemberNotFound } from '../../src/extractors/member-not-found.js';
import { frame, raised } from '../helpers/frames.js';

class Cart {
  items: string[] = [];

  checkoutNow(): number {
    return this.items.length;
  }
}

function manyKeys(count: number): Record<string, number> {
  const value: Record<string, number> = {};
  for (let i = 0; i < count; i++) {
    value[`key${String(i).padStart(3, '0')}`] = i;
  }
  return value;
}

function memberDetail(result: ExtractionResult): MemberNotFoundDetail {
  if (result.detail?.category !== 'MemberNotFound') {
    throw new Error('Expected a MemberNotFound detail');
  }
  return result.detail;
}

describe('listMembers', () => {
  it('walks the prototype chain in sorted order', () => {
    const members = listMembers(new Cart());
    expect(members).toContain('items');
    expect(members).toContain('checkoutNow');
    expect(members).toContain('toString');
    expect(members).toEqual([...members].sort());
  });

  it('leaves out reserved names', () => {
    const members = listMembers({ __secret: 1, open: 2 });
    expect(members).toContain('open');
    expect(members.some((name) => name.startsWith('__'))).toBe(false);
  });

  it('boxes primitives and has nothing for null', () => {
    expect(listMembers('abc')).toContain('toUpperCase');
    expect(listMembers(null)).toEqual([]);
    expect(listMembers(undefined)).toEqual([]);
  });
});

describe('extractMemberNotFound', () => {
  it('describes the receiver of a missing method', () => {
    const my_dict = new Map([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
    const fault = frame({ bindings: { my_dict } });
    const result = extractMemberNotFound(
      raised(new TypeError('my_dict.grab_item is not a function'), fault),
      fault,
      "my_dict.grab_item('a')"
    );

    expect(result.notes).toEqual([]);
    expect(result.detail).toMatchObject({
      category: 'MemberNotFound',
      objectName: 'my_dict',
      objectRepr: "Map(3) { 'a' => 1, 'b' => 2, 'c' => 3 }",
      typeName: 'Map',
      missingMember: 'grab_item',
      similarMembers: [],
    });
    expect(memberDetail(result).members).toContain('get');
  });

  it('suggests overlapping member names', () => {
    const cart = new Cart();
    const fault = frame({ bindings: { cart } });
    const result = extractMemberNotFound(
      raised(new TypeError('cart.checkout is not a function'), fault),
      fault,
      'cart.checkout()'
    );
    expect(result.detail).toMatchObject({
      typeName: 'Cart',
      similarMembers: ['checkoutNow'],
    });
  });

  it('lists at most MAX_LISTED_MEMBERS names and keeps the full count', () => {
    const registry = manyKeys(150);
    const fault = frame({ bindings: { registry } });
    const result = extractMemberNotFound(
      raised(new TypeError('registry.lookup is not a function'), fault),
      fault,
      'registry.lookup()'
    );

    // Object.prototype adds constructor, hasOwnProperty, isPrototypeOf,
    // propertyIsEnumerable, toLocaleString, toString and valueOf
    const detail = memberDetail(result);
    expect(detail.members).toHaveLength(MAX_LISTED_MEMBERS);
    expect(detail.members.slice(0, 4)).toEqual([
      'constructor',
      'hasOwnProperty',
      'isPrototypeOf',
      'key000',
    ]);
    expect(detail.memberCount).toBe(157);
    expect(detail.typeName).toBe('Object');
  });

  it('yields no detail when the member cannot be read from the message', () => {
    const fault = frame({ bindings: { cart: new Cart() } });
    const result = extractMemberNotFound(
      raised(new TypeError('unexpected'), fault, 'MemberNotFound'),
      fault,
      'cart.checkout()'
    );
    expect(result).toEqual({ detail: undefined, notes: [] });
  });

  it('yields no detail when no binding is named on the line', () => {
    const fault = frame({ bindings: { cart: new Cart() } });
    const result = extractMemberNotFound(
      raised(new TypeError('basket.checkout is not a function'), fault),
      fault,
      'basket.checkout()'
    );
    expect(result.detail).toBeUndefined();
  });
});
