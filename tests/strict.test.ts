/**
 * faultscope Tests: Strict Containers
 */

import { describe, expect, it } from 'vitest';
import { IndexRangeError, KeyLookupError, strict } from '../src/index.js';

describe('strict', () => {
  describe('records', () => {
    it('returns present keys', () => {
      const config = strict({ host: 'localhost', port: 8080 });
      expect(config.host).toBe('localhost');
      expect(config['port']).toBe(8080);
    });

    it('throws KeyLookupError for a missing key', () => {
      const record: Record<string, number> = strict({ a: 1, b: 2 });
      let caught: unknown;
      try {
        void record['z'];
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(KeyLookupError);
      if (!(caught instanceof KeyLookupError)) return;
      expect(caught.message).toBe("'z'");
      expect(caught.key).toBe('z');
      expect(caught.category).toBe('KeyLookup');
      expect(caught.name).toBe('KeyLookupError');
    });

    it('passes inherited members through', () => {
      const record = strict({ a: 1 });
      expect(record.hasOwnProperty('a')).toBe(true);
      expect(String(record)).toBe('[object Object]');
    });

    it('lets runtimes probe then and toJSON', () => {
      const record = strict({ a: 1 });
      expect(Reflect.get(record, 'then')).toBeUndefined();
      expect(JSON.stringify(record)).toBe('{"a":1}');
    });

    it('supports the in operator without throwing', () => {
      const record = strict({ a: 1 });
      expect('z' in record).toBe(false);
    });
  });

  describe('arrays', () => {
    it('returns elements in range', () => {
      const items = strict([10, 20, 30]);
      expect(items[0]).toBe(10);
      expect(items[2]).toBe(30);
      expect(items.length).toBe(3);
    });

    it('throws IndexRangeError past the end', () => {
      const items = strict([10, 20, 30]);
      expect(() => items[5]).toThrow(IndexRangeError);
      expect(() => items[5]).toThrow('Index 5 is out of range for length 3');
    });

    it('throws IndexRangeError for negative indices', () => {
      const items = strict([1]);
      expect(() => Reflect.get(items, '-1')).toThrow(
        'Index -1 is out of range for length 1'
      );
    });

    it('carries index and length', () => {
      const items = strict<number>([]);
      try {
        void items[0];
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(IndexRangeError);
        if (!(error instanceof IndexRangeError)) return;
        expect(error.index).toBe(0);
        expect(error.length).toBe(0);
        expect(error.category).toBe('IndexRange');
      }
    });

    it('keeps array methods working', () => {
      const items = strict([1, 2, 3]);
      expect(items.map((n) => n * 2)).toEqual([2, 4, 6]);
      expect([...items]).toEqual([1, 2, 3]);
      expect(items.includes(2)).toBe(true);
    });
  });

  describe('maps', () => {
    it('returns present values, including undefined ones', () => {
      const map = strict(new Map<string, number | undefined>([['a', 1], ['u', undefined]]));
      expect(map.get('a')).toBe(1);
      expect(map.get('u')).toBeUndefined();
    });

    it('throws KeyLookupError for an absent key', () => {
      const map = strict(new Map([['a', 1]]));
      expect(() => map.get('b')).toThrow(KeyLookupError);
      expect(() => map.get('b')).toThrow("'b'");
    });

    it('keeps other members bound to the map', () => {
      const map = strict(new Map([['a', 1]]));
      map.set('b', 2);
      expect(map.size).toBe(2);
      expect(map.has('b')).toBe(true);
      expect([...map.keys()]).toEqual(['a', 'b']);
    });

    it('returns the same function on every member read', () => {
      const map = strict(new Map([['a', 1]]));
      expect(map.get).toBe(map.get);
      expect(map.set).toBe(map.set);
      expect(map.has).toBe(map.has);
    });

    it('stays strict when set calls are chained', () => {
      const map = strict(new Map([['a', 1]]));
      const chained = map.set('b', 2);
      expect(chained).toBe(map);
      expect(chained.get('b')).toBe(2);
      expect(() => map.set('c', 3).get('zz')).toThrow(KeyLookupError);
    });
  });
});
