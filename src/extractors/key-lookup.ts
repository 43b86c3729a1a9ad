/**
 * KeyLookup Extractor
 * Finds the container behind a missing-key failure
 */

import { KeyLookupError } from '../error-classes.js';
import {
  describeFailure,
  isReservedName,
  representValue,
} from '../frame-state.js';
import { findSimilar } from '../similarity.js';
import type {
  CallFrame,
  ExtractionResult,
  RaisedError,
} from '../types.js';
import { parseMissingKey } from './message.js';

/**
 * Whether a value is a Map or a plain (or null-prototype) object.
 */
export function isAssociative(
  value: unknown
): value is Map<unknown, unknown> | Record<string, unknown> {
  if (value instanceof Map) {
    return true;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function keysOf(container: Map<unknown, unknown> | Record<string, unknown>) {
  return container instanceof Map
    ? Array.from(container.keys())
    : Object.keys(container);
}

/** The key itself when the error carries it, else parsed from the message */
function missingKeyOf(error: RaisedError): unknown {
  return error.thrown instanceof KeyLookupError
    ? error.thrown.key
    : parseMissingKey(error.message);
}

/**
 * Analyze a missing-key failure.
 *
 * Takes the first associative binding named on the fault line.
 */
export function extractKeyLookup(
  error: RaisedError,
  frame: CallFrame,
  faultLine: string
): ExtractionResult {
  const notes: string[] = [];

  for (const [name, value] of frame.bindings) {
    if (isReservedName(name) || !isAssociative(value)) continue;
    if (!faultLine.includes(name)) continue;

    try {
      const missingKey = missingKeyOf(error);
      const availableKeys: unknown[] = keysOf(value);
      return {
        detail: {
          category: 'KeyLookup',
          containerName: name,
          containerRepr: representValue(value),
          missingKey: representValue(missingKey),
          availableKeys,
          similarKeys: findSimilar(String(missingKey), availableKeys),
        },
        notes,
      };
    } catch (failure) {
      notes.push(`Error analyzing dictionary: ${describeFailure(failure)}`);
    }
  }

  return { detail: undefined, notes };
}
