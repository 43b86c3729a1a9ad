/**
 * UndefinedIdentifier Extractor
 */

import { isReservedName } from '../frame-state.js';
import { findSimilar } from '../similarity.js';
import type {
  CallFrame,
  ExtractionResult,
  RaisedError,
} from '../types.js';
import { parseUndefinedName } from './message.js';

/**
 * Suggest bindings of the fault frame whose names overlap the
 * undefined identifier. Reserved `__` names are never suggested.
 */
export function extractUndefinedIdentifier(
  error: RaisedError,
  frame: CallFrame
): ExtractionResult {
  const name = parseUndefinedName(error.message);
  if (name === undefined || name === '') {
    return { detail: undefined, notes: [] };
  }

  const candidates = [...frame.bindings.keys()].filter(
    (candidate) => !isReservedName(candidate)
  );

  return {
    detail: {
      category: 'UndefinedIdentifier',
      name,
      similarNames: findSimilar(name, candidates),
    },
    notes: [],
  };
}
