/**
 * Call-Stack Walker
 * Builds the frame chain of an error and walks it to the fault frame
 */

import {
  getScopeSnapshot,
  SCOPE_FRAME_NAME,
  type ScopeSnapshot,
} from '../scope.js';
import { isLibraryFile } from '../source-root.js';
import {
  ANONYMOUS_NAME,
  TOP_LEVEL_NAME,
  type CallFrame,
  type StackWalk,
} from '../types.js';
import { parseStackTrace, type StackEntry } from './parse.js';

const NO_BINDINGS: ReadonlyMap<string, unknown> = new Map();

interface FrameDraft {
  functionName: string | undefined;
  readonly sourceFile: string;
  readonly sourceLine: number;
  bindings: ReadonlyMap<string, unknown>;
}

// ============================================================
// CHAIN CONSTRUCTION
// ============================================================

/**
 * Build the frame chain of a thrown value from its stack trace and
 * recorded scopes.
 *
 * @returns Outermost frame, or undefined when the value has no usable stack
 */
export function chainFromError(error: unknown): CallFrame | undefined {
  if (!(error instanceof Error) || typeof error.stack !== 'string') {
    return undefined;
  }
  return buildStackChain(error.stack, getScopeSnapshot(error));
}

/**
 * Build a frame chain from V8 stack text.
 *
 * Constraints:
 * - Node internals, node_modules and faultscope's own frames are dropped
 * - Scope wrapper frames pair with snapshots, innermost first
 * - The user frame inside a wrapper takes the scope's name and bindings,
 *   and the caller frame right outside it is folded in
 * - A folded caller that is the body of an enclosing scope is kept for it
 * - Without a user frame inside, the caller takes the scope
 *
 * @param stack - Stack text, innermost entry first
 * @param scopes - Scope snapshots, outermost first
 * @returns Outermost frame; each frame links to the one it called
 */
export function buildStackChain(
  stack: string,
  scopes: readonly ScopeSnapshot[]
): CallFrame | undefined {
  const drafts: FrameDraft[] = [];
  let scopeIndex = scopes.length - 1;
  let body: FrameDraft | undefined;
  let folded: FrameDraft | undefined;
  let pending: ScopeSnapshot | undefined;
  let foldCaller = false;

  for (const entry of parseStackTrace(stack)) {
    if (isLibraryFile(entry.file)) {
      if (isScopeWrapper(entry)) {
        const snapshot = scopeIndex >= 0 ? scopes[scopeIndex] : undefined;
        scopeIndex--;
        // A folded caller that is itself a scope body belongs to this scope
        if (!body && folded) {
          drafts.push(folded);
          body = folded;
        }
        if (snapshot && body) {
          body.functionName = snapshot.name;
          body.bindings = snapshot.bindings;
          foldCaller = true;
        } else if (snapshot) {
          pending = snapshot;
        }
      }
      body = undefined;
      folded = undefined;
      continue;
    }

    if (isInternalFile(entry.file)) {
      body = undefined;
      folded = undefined;
      continue;
    }

    const draft: FrameDraft = {
      functionName: pending?.name ?? entry.functionName,
      sourceFile: entry.file,
      sourceLine: Math.max(1, entry.line),
      bindings: pending?.bindings ?? NO_BINDINGS,
    };
    pending = undefined;

    if (foldCaller) {
      foldCaller = false;
      folded = draft;
      body = undefined;
      continue;
    }

    folded = undefined;
    drafts.push(draft);
    body = draft;
  }

  // Link from the fault frame outward so each node is built once
  let next: CallFrame | undefined = undefined;
  for (const [index, draft] of drafts.entries()) {
    const outermost = index === drafts.length - 1;
    const frame: CallFrame = {
      functionName:
        draft.functionName ?? (outermost ? TOP_LEVEL_NAME : ANONYMOUS_NAME),
      sourceFile: draft.sourceFile,
      sourceLine: draft.sourceLine,
      bindings: draft.bindings,
      next,
    };
    next = frame;
  }
  return next;
}

function isScopeWrapper(entry: StackEntry): boolean {
  const name = entry.functionName;
  return (
    name !== undefined &&
    (name === SCOPE_FRAME_NAME || name.endsWith(`.${SCOPE_FRAME_NAME}`))
  );
}

function isInternalFile(file: string): boolean {
  return (
    file.startsWith('node:') ||
    file.startsWith('internal/') ||
    /[\\/]node_modules[\\/]/.test(file)
  );
}

// ============================================================
// WALKING
// ============================================================

/**
 * Follow a frame chain to its tail.
 *
 * @param head - Outermost frame
 * @returns Fault frame and every frame with the fault frame first,
 *   or undefined for an empty chain
 */
export function walkStack(head: CallFrame | undefined): StackWalk | undefined {
  const frames: CallFrame[] = [];
  for (let frame = head; frame !== undefined; frame = frame.next) {
    frames.push(frame);
  }
  frames.reverse();

  const faultFrame = frames[0];
  if (faultFrame === undefined) {
    return undefined;
  }
  return { faultFrame, frames };
}
