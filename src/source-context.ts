/**
 * Source Context Provider
 * Cached line lookup and the context window around a fault line
 */

import { readFileSync } from 'node:fs';
import type { SourceWindow, WindowLine } from './types.js';

/** Lines shown on each side of the fault line */
export const CONTEXT_RADIUS = 3;

// ============================================================
// LINE CACHE
// ============================================================

/**
 * File path -> lines with their terminators, null for unreadable files.
 * Sources are assumed static for the life of the process.
 */
const sourceCache = new Map<string, readonly string[] | null>();

function loadLines(file: string): readonly string[] | null {
  const cached = sourceCache.get(file);
  if (cached !== undefined) {
    return cached;
  }

  let lines: readonly string[] | null;
  try {
    const text = readFileSync(file, 'utf-8');
    lines = text === '' ? [] : text.split(/(?<=\n)/);
  } catch {
    lines = null;
  }
  sourceCache.set(file, lines);
  return lines;
}

/**
 * Get one source line including its terminator.
 *
 * @param line - 1-based line number
 * @returns Line text, or '' past the end of the file or when unreadable
 */
export function getSourceLine(file: string, line: number): string {
  if (line < 1) return '';
  return loadLines(file)?.[line - 1] ?? '';
}

/**
 * Count lines by sequential lookup until the first missing line.
 */
export function countSourceLines(file: string): number {
  let count = 0;
  while (getSourceLine(file, count + 1) !== '') {
    count++;
  }
  return count;
}

/** Drop all cached sources */
export function clearSourceCache(): void {
  sourceCache.clear();
}

// ============================================================
// CONTEXT WINDOW
// ============================================================

/**
 * Compute the context window around a line.
 *
 * Constraints:
 * - Radius: CONTEXT_RADIUS lines before and after
 * - Bounds clipped to [1, totalLines]
 * - Missing file or a line past the end yields a window with no lines
 *
 * @param file - Source file path
 * @param line - 1-based fault line
 */
export function buildSourceWindow(file: string, line: number): SourceWindow {
  const totalLines = countSourceLines(file);

  if (line < 1 || line > totalLines) {
    return {
      file,
      centerLine: line,
      startLine: line,
      endLine: line,
      totalLines,
      lines: [],
      truncatedAbove: false,
      truncatedBelow: false,
    };
  }

  const startLine = Math.max(1, line - CONTEXT_RADIUS);
  const endLine = Math.min(totalLines, line + CONTEXT_RADIUS);

  const lines: WindowLine[] = [];
  for (let lineNumber = startLine; lineNumber <= endLine; lineNumber++) {
    lines.push({
      lineNumber,
      text: stripTerminator(getSourceLine(file, lineNumber)),
      isFaultLine: lineNumber === line,
    });
  }

  return {
    file,
    centerLine: line,
    startLine,
    endLine,
    totalLines,
    lines,
    truncatedAbove: startLine > 1,
    truncatedBelow: endLine < totalLines,
  };
}

function stripTerminator(text: string): string {
  return text.replace(/\r?\n$/, '');
}
