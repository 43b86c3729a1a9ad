/**
 * Strict Containers
 * Proxies that fail on missing keys and out-of-range indices
 */

import { IndexRangeError, KeyLookupError } from './error-classes.js';

/** Canonical integer property keys, including negative ones */
const INTEGER_KEY = /^(?:0|-?[1-9]\d*)$/;

/** Keys that runtimes probe on arbitrary objects (await, JSON.stringify) */
const PROBED_KEYS: ReadonlySet<string> = new Set(['then', 'toJSON']);

/**
 * Wrap a container so that failed lookups throw instead of yielding undefined.
 *
 * - Record: reading an unknown string key throws KeyLookupError
 * - Map: `get` of an absent key throws KeyLookupError
 * - Array: reading an index outside [0, length) throws IndexRangeError
 *
 * Symbol keys always pass through.
 *
 * @example
 * const items = strict([1, 2, 3]);
 * items[5]; // IndexRangeError: Index 5 is out of range for length 3
 */
export function strict<K, V>(value: Map<K, V>): Map<K, V>;
export function strict<T>(value: T[]): T[];
export function strict<T extends object>(value: T): T;
export function strict(value: object): object {
  if (value instanceof Map) {
    return strictMap(value);
  }
  if (Array.isArray(value)) {
    return strictArray<unknown>(value);
  }
  return strictRecord(value);
}

function strictArray<T>(items: T[]): T[] {
  return new Proxy(items, {
    get(target, prop, receiver) {
      if (typeof prop === 'string' && INTEGER_KEY.test(prop)) {
        const index = Number(prop);
        if (index < 0 || index >= target.length) {
          throw new IndexRangeError(index, target.length);
        }
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

function strictRecord<T extends object>(record: T): T {
  return new Proxy(record, {
    get(target, prop, receiver) {
      if (
        typeof prop === 'string' &&
        !PROBED_KEYS.has(prop) &&
        !(prop in target)
      ) {
        throw new KeyLookupError(prop);
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

function strictMap<K, V>(map: Map<K, V>): Map<K, V> {
  const get = (key: K): V | undefined => {
    const value = map.get(key);
    if (value === undefined && !map.has(key)) {
      throw new KeyLookupError(key);
    }
    return value;
  };
  const set = (key: K, value: V): Map<K, V> => {
    map.set(key, value);
    return proxy;
  };
  const bound = new Map<PropertyKey, unknown>();

  // Map methods need the real map as receiver
  const proxy = new Proxy(map, {
    get(target, prop) {
      if (prop === 'get') {
        return get;
      }
      if (prop === 'set') {
        return set;
      }
      const member: unknown = Reflect.get(target, prop, target);
      if (typeof member !== 'function' || prop === 'constructor') {
        return member;
      }
      let method = bound.get(prop);
      if (method === undefined) {
        method = member.bind(target);
        bound.set(prop, method);
      }
      return method;
    },
  });
  return proxy;
}
