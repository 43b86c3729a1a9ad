/**
 * MemberNotFound Extractor
 * Lists what the receiver of a failed member access does offer
 */

import { runtimeTypeName } from '../classify.js';
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
import { parseMissingMember } from './message.js';

/** Members shown before the listing is cut */
export const MAX_LISTED_MEMBERS = 100;

/**
 * Sorted names of every non-reserved property along the prototype chain.
 * Primitives are boxed; null and undefined have no members.
 */
export function listMembers(value: unknown): string[] {
  if (value === null || value === undefined) {
    return [];
  }

  const names = new Set<string>();
  let target: object | null = Object(value);
  while (target !== null) {
    for (const name of Object.getOwnPropertyNames(target)) {
      if (!isReservedName(name)) names.add(name);
    }
    target = Object.getPrototypeOf(target);
  }
  return [...names].sort();
}

/**
 * Analyze a missing-member failure.
 *
 * Takes the first binding named on the fault line. No detail is produced
 * when the member name cannot be read from the message.
 */
export function extractMemberNotFound(
  error: RaisedError,
  frame: CallFrame,
  faultLine: string
): ExtractionResult {
  const notes: string[] = [];
  const missingMember = parseMissingMember(error.message);
  if (missingMember === undefined) {
    return { detail: undefined, notes };
  }

  for (const [name, value] of frame.bindings) {
    if (isReservedName(name) || !faultLine.includes(name)) continue;

    try {
      const members = listMembers(value);
      return {
        detail: {
          category: 'MemberNotFound',
          objectName: name,
          objectRepr: representValue(value),
          typeName: runtimeTypeName(value),
          missingMember,
          members: members.slice(0, MAX_LISTED_MEMBERS),
          memberCount: members.length,
          similarMembers: findSimilar(missingMember, members),
        },
        notes,
      };
    } catch (failure) {
      notes.push(`Error analyzing object: ${describeFailure(failure)}`);
    }
  }

  return { detail: undefined, notes };
}
