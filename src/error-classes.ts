/**
 * faultscope Error Classes
 * Lookup failures raised by strict containers
 */

import { inspect } from 'node:util';
import type { ErrorCategory } from './types.js';

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class for errors that carry their own category.
 * The classifier trusts `category` instead of parsing the message.
 */
export class FaultscopeError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = 'FaultscopeError';
    this.category = category;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Missing key in a record or map.
 * The message is the printed key, e.g. `'z'`.
 */
export class KeyLookupError extends FaultscopeError {
  readonly key: unknown;

  constructor(key: unknown) {
    super('KeyLookup', inspect(key));
    this.name = 'KeyLookupError';
    this.key = key;
  }
}

/** Index outside `[0, length)` of a sequence */
export class IndexRangeError extends FaultscopeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super('IndexRange', `Index ${index} is out of range for length ${length}`);
    this.name = 'IndexRangeError';
    this.index = index;
    this.length = length;
  }
}
