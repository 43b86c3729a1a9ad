/**
 * Frame State Extractor
 * Prints a frame's bindings and sorts them into modules, callables and values
 */

import { inspect } from 'node:util';
import type {
  BindingClassification,
  CallFrame,
  FrameState,
} from './types.js';

/** Names with this prefix are runtime-reserved and never listed */
export const RESERVED_PREFIX = '__';

const MODULE_MARKERS = ['[Module'];

const CALLABLE_MARKERS = [
  '[Function',
  '[AsyncFunction',
  '[GeneratorFunction',
  '[AsyncGeneratorFunction',
  '[class',
];

/**
 * Print a value on a single line.
 * May throw when the value's custom inspection throws.
 */
export function representValue(value: unknown): string {
  return inspect(value, { breakLength: Infinity, depth: 2 });
}

/**
 * Print a value, describing printing failures instead of throwing.
 */
export function safeRepresent(value: unknown): string {
  try {
    return representValue(value);
  } catch (error) {
    return `<unprintable: ${describeFailure(error)}>`;
  }
}

/** Message of a caught failure; never throws */
export function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    // null-prototype objects have no toString
    return Object.prototype.toString.call(error);
  }
}

export function isReservedName(name: string): boolean {
  return name.startsWith(RESERVED_PREFIX);
}

/**
 * Classify a binding from its printed form.
 */
export function classifyRepresentation(repr: string): BindingClassification {
  if (MODULE_MARKERS.some((marker) => repr.startsWith(marker))) {
    return 'Module';
  }
  if (CALLABLE_MARKERS.some((marker) => repr.startsWith(marker))) {
    return 'Callable';
  }
  return 'Value';
}

/**
 * Extract the printed bindings of a frame.
 *
 * Constraints:
 * - Reserved names (leading `__`) are skipped
 * - Unprintable values land in `values` as `<unprintable: {message}>`
 */
export function extractFrameState(frame: CallFrame): FrameState {
  const modules = new Map<string, string>();
  const callables = new Map<string, string>();
  const values = new Map<string, string>();

  for (const [name, value] of frame.bindings) {
    if (isReservedName(name)) continue;

    let repr: string;
    try {
      repr = representValue(value);
    } catch (error) {
      values.set(name, `<unprintable: ${describeFailure(error)}>`);
      continue;
    }

    switch (classifyRepresentation(repr)) {
      case 'Module':
        modules.set(name, repr);
        break;
      case 'Callable':
        callables.set(name, repr);
        break;
      case 'Value':
        values.set(name, repr);
        break;
    }
  }

  return { modules, callables, values };
}
