/**
 * faultscope Tests: KeyLookup Extractor
 */

import { inspect } from 'node:util';
import { describe, expect, it } from 'vitest';
import { KeyLookupError } from '../../src/index.js';
import {
  extractKeyLookup,
  isAssociative,
} from '../../src/extractors/key-lookup.js';
import { frame, raised } from '../helpers/frames.js';

describe('isAssociative', () => {
  it('accepts maps and plain objects', () => {
    expect(isAssociative(new Map())).toBe(true);
    expect(isAssociative({ a: 1 })).toBe(true);
    expect(isAssociative(Object.create(null))).toBe(true);
  });

  it('rejects arrays, class instances and primitives', () => {
    expect(isAssociative([1])).toBe(false);
    expect(isAssociative(new (class Box {})())).toBe(false);
    expect(isAssociative('text')).toBe(false);
    expect(isAssociative(null)).toBe(false);
  });
});

describe('extractKeyLookup', () => {
  it('describes the container named on the fault line', () => {
    const fault = frame({
      bindings: { count: 3, my_dict: { a: 1, b: 2, c: 3 } },
    });
    const result = extractKeyLookup(
      raised(new KeyLookupError('z'), fault),
      fault,
      "value = my_dict['z']"
    );

    expect(result).toEqual({
      detail: {
        category: 'KeyLookup',
        containerName: 'my_dict',
        containerRepr: '{ a: 1, b: 2, c: 3 }',
        missingKey: "'z'",
        availableKeys: ['a', 'b', 'c'],
        similarKeys: [],
      },
      notes: [],
    });
  });

  it('suggests overlapping keys', () => {
    const fault = frame({
      bindings: { profile: { username: 'x', user_id: 1, age: 2 } },
    });
    const result = extractKeyLookup(
      raised(new KeyLookupError('user'), fault),
      fault,
      "profile['user']"
    );
    expect(result.detail).toMatchObject({
      similarKeys: ['username', 'user_id'],
    });
  });

  it('reads keys of a Map', () => {
    const fault = frame({ bindings: { lookup: new Map([['alpha', 1]]) } });
    const result = extractKeyLookup(
      raised(new KeyLookupError('alp'), fault),
      fault,
      "lookup.get('alp')"
    );
    expect(result.detail).toEqual({
      category: 'KeyLookup',
      containerName: 'lookup',
      containerRepr: "Map(1) { 'alpha' => 1 }",
      missingKey: "'alp'",
      availableKeys: ['alpha'],
      similarKeys: ['alpha'],
    });
  });

  it('keeps non-string keys of the error', () => {
    const fault = frame({ bindings: { byId: new Map([[10, 'ten']]) } });
    const result = extractKeyLookup(
      raised(new KeyLookupError(1), fault),
      fault,
      'byId.get(1)'
    );
    expect(result.detail).toMatchObject({
      missingKey: '1',
      similarKeys: [10],
    });
  });

  it('parses the key from the message of other errors', () => {
    const fault = frame({ bindings: { settings: { mode: 'dark' } } });
    const result = extractKeyLookup(
      raised(new Error("'theme'"), fault, 'KeyLookup'),
      fault,
      "settings['theme']"
    );
    expect(result.detail).toMatchObject({ missingKey: "'theme'" });
  });

  it('yields no detail when no container is named on the line', () => {
    const fault = frame({ bindings: { my_dict: { a: 1 } } });
    const result = extractKeyLookup(
      raised(new KeyLookupError('z'), fault),
      fault,
      "other['z']"
    );
    expect(result).toEqual({ detail: undefined, notes: [] });
  });

  it('skips reserved names', () => {
    const fault = frame({ bindings: { __cache: { a: 1 } } });
    const result = extractKeyLookup(
      raised(new KeyLookupError('z'), fault),
      fault,
      "__cache['z']"
    );
    expect(result.detail).toBeUndefined();
  });

  it('notes a failing candidate and tries the next one', () => {
    const broken = {
      [inspect.custom]: () => {
        throw new Error('denied');
      },
    };
    const fault = frame({ bindings: { broken, data: { a: 1 } } });
    const result = extractKeyLookup(
      raised(new KeyLookupError('z'), fault),
      fault,
      "broken['z'] ?? data['z']"
    );

    expect(result.notes).toEqual(['Error analyzing dictionary: denied']);
    expect(result.detail).toMatchObject({ containerName: 'data' });
  });
});
