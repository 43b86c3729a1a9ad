/**
 * Scope Recorder
 *
 * Records the local bindings of explicitly marked regions of code so the
 * reporter can show them after an uncaught error. The snapshot is taken when
 * the error first leaves a scope, while every enclosing scope is still active.
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

/** Returns the current locals of a scope, read lazily at error time */
export type LocalsProvider = () => Record<string, unknown>;

/** Bindings of one scope at the moment an error left it */
export interface ScopeSnapshot {
  readonly name: string;
  readonly bindings: ReadonlyMap<string, unknown>;
}

interface ActiveScope {
  readonly name: string;
  readonly locals: LocalsProvider;
}

// ============================================================
// STATE
// ============================================================

const activeScopes: ActiveScope[] = [];

/** Snapshots keyed by the thrown object, outermost scope first */
const snapshots = new WeakMap<object, readonly ScopeSnapshot[]>();

// ============================================================
// SCOPES
// ============================================================

/**
 * Run `body` as a named scope whose locals appear in error reports.
 *
 * The body runs synchronously and its result is returned unchanged.
 * Errors are rethrown as-is after their snapshot is recorded.
 *
 * @example
 * function total(items: number[]) {
 *   let sum = 0;
 *   return scope('total', () => ({ items, sum }), () => {
 *     for (const item of items) sum += item;
 *     return sum;
 *   });
 * }
 */
export function scope<T>(
  name: string,
  locals: LocalsProvider,
  body: () => T
): T {
  activeScopes.push({ name, locals });
  try {
    return body();
  } catch (error) {
    recordScopes(error);
    throw error;
  } finally {
    activeScopes.pop();
  }
}

/** Function name the wrapper carries in V8 stack traces */
export const SCOPE_FRAME_NAME = scope.name;

/**
 * Get the scope snapshots recorded for a thrown value.
 * Returns an empty array when none were recorded.
 */
export function getScopeSnapshot(error: unknown): readonly ScopeSnapshot[] {
  if (!isWeakKey(error)) {
    return [];
  }
  return snapshots.get(error) ?? [];
}

/** Number of scopes currently executing */
export function activeScopeDepth(): number {
  return activeScopes.length;
}

function recordScopes(error: unknown): void {
  // Only the innermost scope sees the full active stack
  if (!isWeakKey(error) || snapshots.has(error)) {
    return;
  }
  snapshots.set(error, activeScopes.map(snapshotScope));
}

function snapshotScope(active: ActiveScope): ScopeSnapshot {
  try {
    return {
      name: active.name,
      bindings: new Map(Object.entries(active.locals())),
    };
  } catch {
    // A failing locals provider must not replace the error in flight
    return { name: active.name, bindings: new Map() };
  }
}

function isWeakKey(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) ||
    typeof value === 'function'
  );
}
