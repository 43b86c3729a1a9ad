/**
 * Error Classifier
 * Maps a thrown value to the category that selects its extractor
 */

import { inspect } from 'node:util';
import { FaultscopeError } from './error-classes.js';
import { isMissingMethodMessage } from './extractors/message.js';
import { chainFromError } from './stack/walker.js';
import type { ErrorCategory, RaisedError } from './types.js';

/**
 * Determine the category of a thrown value.
 *
 * - FaultscopeError subclasses carry their category
 * - ReferenceError: UndefinedIdentifier
 * - TypeError calling a missing method: MemberNotFound
 * - Any other TypeError: TypeMismatch
 */
export function categorize(thrown: unknown): ErrorCategory {
  if (thrown instanceof FaultscopeError) {
    return thrown.category;
  }
  if (thrown instanceof ReferenceError) {
    return 'UndefinedIdentifier';
  }
  if (thrown instanceof TypeError) {
    return isMissingMethodMessage(thrown.message)
      ? 'MemberNotFound'
      : 'TypeMismatch';
  }
  return 'Other';
}

/**
 * Describe a thrown value for reporting.
 *
 * @param thrown - Any value that reached the top of the program
 */
export function classifyError(thrown: unknown): RaisedError {
  return {
    category: categorize(thrown),
    name: runtimeTypeName(thrown),
    message: thrown instanceof Error ? thrown.message : safeString(thrown),
    stackChain: chainFromError(thrown),
    thrown,
  };
}

/**
 * Runtime type name of a value: the error name for errors, the
 * constructor name for other objects, typeof for primitives.
 */
export function runtimeTypeName(value: unknown): string {
  if (value instanceof Error) {
    return value.name;
  }
  if (value === null) {
    return 'null';
  }
  if (isObjectLike(value)) {
    const proto: unknown = Object.getPrototypeOf(value);
    const ctor: unknown = isObjectLike(proto)
      ? Reflect.get(proto, 'constructor')
      : undefined;
    if (typeof ctor === 'function' && ctor.name !== '') {
      return ctor.name;
    }
    return typeof value === 'function' ? 'Function' : 'Object';
  }
  return typeof value;
}

function isObjectLike(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) ||
    typeof value === 'function'
  );
}

function safeString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return inspect(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
