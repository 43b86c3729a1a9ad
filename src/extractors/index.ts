/**
 * Category Extractors
 * Dispatches a raised error to the analyzer of its category
 */

import { describeFailure } from '../frame-state.js';
import type {
  AnalyzedCategory,
  CallFrame,
  ExtractionResult,
  RaisedError,
} from '../types.js';
import { extractCollection } from './collection.js';
import { extractKeyLookup } from './key-lookup.js';
import { extractMemberNotFound } from './member-not-found.js';
import { extractUndefinedIdentifier } from './undefined-identifier.js';

export type Extractor = (
  error: RaisedError,
  frame: CallFrame,
  faultLine: string
) => ExtractionResult;

/** One analyzer per category; 'Other' has none */
export const EXTRACTORS: Readonly<Record<AnalyzedCategory, Extractor>> = {
  KeyLookup: extractKeyLookup,
  IndexRange: extractCollection,
  TypeMismatch: extractCollection,
  MemberNotFound: extractMemberNotFound,
  UndefinedIdentifier: extractUndefinedIdentifier,
};

const NO_DETAIL: ExtractionResult = { detail: undefined, notes: [] };

/**
 * Run the extractor of the error's category against the fault frame.
 * Never throws: a failing extractor yields a note and no detail.
 *
 * @param faultLine - Trimmed source text of the fault line ('' if unknown)
 */
export function extractDetail(
  error: RaisedError,
  frame: CallFrame,
  faultLine: string
): ExtractionResult {
  if (error.category === 'Other') {
    return NO_DETAIL;
  }

  try {
    return EXTRACTORS[error.category](error, frame, faultLine);
  } catch (failure) {
    return {
      detail: undefined,
      notes: [
        `Error analyzing ${error.category}: ${describeFailure(failure)}`,
      ],
    };
  }
}

export { findSimilar } from '../similarity.js';
export { listMembers, MAX_LISTED_MEMBERS } from './member-not-found.js';
