/**
 * Stack Trace Parser
 * Turns V8 `error.stack` text into structured entries
 */

import { fileURLToPath } from 'node:url';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface StackEntry {
  /** Undefined for unnamed functions and top-level code */
  readonly functionName: string | undefined;
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

// ============================================================
// PARSING
// ============================================================

/** "at name (file:line:col)" */
const NAMED_FRAME = /^\s*at (.+?) \((.+):(\d+):(\d+)\)$/;

/** "at file:line:col" */
const BARE_FRAME = /^\s*at (.+):(\d+):(\d+)$/;

/** Names V8 gives to code that has no function name of its own */
const UNNAMED = new Set(['<anonymous>', 'Object.<anonymous>']);

/**
 * Parse a V8 stack trace, innermost entry first.
 *
 * Lines without a file position (native frames, the message header)
 * are skipped.
 *
 * @example
 * parseStackTrace('Error: boom\n    at run (/app/main.js:4:11)')
 * // [{ functionName: 'run', file: '/app/main.js', line: 4, column: 11 }]
 */
export function parseStackTrace(stack: string): StackEntry[] {
  const entries: StackEntry[] = [];

  for (const line of stack.split('\n')) {
    const named = NAMED_FRAME.exec(line);
    if (named) {
      const [, name = '', file = '', lineText = '0', columnText = '0'] = named;
      const entry = toEntry(cleanName(name), file, lineText, columnText);
      if (entry) entries.push(entry);
      continue;
    }

    const bare = BARE_FRAME.exec(line);
    if (bare) {
      const [, file = '', lineText = '0', columnText = '0'] = bare;
      const entry = toEntry(undefined, file, lineText, columnText);
      if (entry) entries.push(entry);
    }
  }

  return entries;
}

function cleanName(raw: string): string | undefined {
  const name = raw.replace(/^async /, '').replace(/^new /, '');
  return UNNAMED.has(name) ? undefined : name;
}

function toEntry(
  functionName: string | undefined,
  location: string,
  lineText: string,
  columnText: string
): StackEntry | undefined {
  // eval frames nest their origin: "eval at fn (file:1:2), <anonymous>"
  if (location.startsWith('eval at ')) {
    return undefined;
  }

  const file = toPath(location);
  if (file === undefined) {
    return undefined;
  }

  return {
    functionName,
    file,
    line: Number.parseInt(lineText, 10),
    column: Number.parseInt(columnText, 10),
  };
}

function toPath(location: string): string | undefined {
  if (!location.startsWith('file://')) {
    return location;
  }
  try {
    return fileURLToPath(location);
  } catch {
    return undefined;
  }
}
