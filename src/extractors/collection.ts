/**
 * IndexRange / TypeMismatch Extractor
 * Finds the sized value behind an index or type failure
 */

import {
  describeFailure,
  isReservedName,
  representValue,
} from '../frame-state.js';
import type {
  CallFrame,
  CollectionDetail,
  ExtractionResult,
  RaisedError,
} from '../types.js';
import { parseAttemptedIndex } from './message.js';

/**
 * Whether a value answers a length query: strings, Maps, Sets and
 * objects with a `length` property. Functions are excluded.
 */
export function hasLength(value: unknown): value is object | string {
  if (typeof value === 'string') {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return value instanceof Map || value instanceof Set || 'length' in value;
}

/**
 * Length of a sized value.
 * @throws {TypeError} When `length` is not a number
 */
export function lengthOf(value: object | string): number {
  if (typeof value === 'string') {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size;
  }
  const length: unknown = Reflect.get(value, 'length');
  if (typeof length !== 'number') {
    throw new TypeError(`length is a ${typeof length}, not a number`);
  }
  return length;
}

/** Arrays and typed arrays */
export function isIndexedSequence(value: unknown): boolean {
  return (
    Array.isArray(value) ||
    (ArrayBuffer.isView(value) && !(value instanceof DataView))
  );
}

/** "0 to N-1", or "empty" when there is no valid index */
export function describeValidIndices(length: number): string {
  return length > 0 ? `0 to ${length - 1}` : 'empty';
}

/**
 * Analyze an index or type failure.
 *
 * Takes the first sized binding named on the fault line.
 */
export function extractCollection(
  error: RaisedError,
  frame: CallFrame,
  faultLine: string
): ExtractionResult {
  const notes: string[] = [];
  const category: CollectionDetail['category'] =
    error.category === 'TypeMismatch' ? 'TypeMismatch' : 'IndexRange';

  for (const [name, value] of frame.bindings) {
    if (isReservedName(name) || !hasLength(value)) continue;
    if (!faultLine.includes(name)) continue;

    try {
      const length = lengthOf(value);
      return {
        detail: {
          category,
          collectionName: name,
          collectionRepr: representValue(value),
          length,
          validIndices: isIndexedSequence(value)
            ? describeValidIndices(length)
            : undefined,
          attemptedIndex: parseAttemptedIndex(faultLine),
        },
        notes,
      };
    } catch (failure) {
      notes.push(`Error analyzing collection: ${describeFailure(failure)}`);
    }
  }

  return { detail: undefined, notes };
}
