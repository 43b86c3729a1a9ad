/**
 * faultscope Tests: Source Context Provider
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterAll, beforeEach, describe, expect, it } from 'vitest';
import {
  buildSourceWindow,
  clearSourceCache,
  getSourceLine,
} from '../src/index.js';
import { countSourceLines } from '../src/source-context.js';
import { SourceDir } from './helpers/frames.js';

const dir = new SourceDir();
const TEN_LINES = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`);

afterAll(() => {
  dir.remove();
});

beforeEach(() => {
  clearSourceCache();
});

describe('getSourceLine', () => {
  it('returns the line with its terminator', () => {
    const file = dir.write('lines.ts', TEN_LINES);
    expect(getSourceLine(file, 1)).toBe('line 1\n');
    expect(getSourceLine(file, 10)).toBe('line 10\n');
  });

  it('returns empty text past the end and before the start', () => {
    const file = dir.write('lines.ts', TEN_LINES);
    expect(getSourceLine(file, 11)).toBe('');
    expect(getSourceLine(file, 0)).toBe('');
  });

  it('returns empty text for a missing file', () => {
    expect(getSourceLine(join(dir.path, 'missing.ts'), 1)).toBe('');
  });

  it('serves cached content until the cache is cleared', () => {
    const file = dir.write('cached.ts', ['first']);
    expect(getSourceLine(file, 1)).toBe('first\n');

    writeFileSync(file, 'second\n', 'utf-8');
    expect(getSourceLine(file, 1)).toBe('first\n');

    clearSourceCache();
    expect(getSourceLine(file, 1)).toBe('second\n');
  });
});

describe('countSourceLines', () => {
  it('counts blank lines inside the file', () => {
    const file = dir.write('blank.ts', ['a', '', 'c']);
    expect(countSourceLines(file)).toBe(3);
  });

  it('counts a last line without a terminator', () => {
    const file = join(dir.path, 'open.ts');
    writeFileSync(file, 'a\nb', 'utf-8');
    expect(countSourceLines(file)).toBe(2);
  });
});

describe('buildSourceWindow', () => {
  it('centers three lines on each side of the fault', () => {
    const file = dir.write('lines.ts', TEN_LINES);
    const window = buildSourceWindow(file, 5);

    expect(window.startLine).toBe(2);
    expect(window.endLine).toBe(8);
    expect(window.totalLines).toBe(10);
    expect(window.truncatedAbove).toBe(true);
    expect(window.truncatedBelow).toBe(true);
    expect(window.lines.map((l) => l.lineNumber)).toEqual([2, 3, 4, 5, 6, 7, 8]);
    expect(window.lines.filter((l) => l.isFaultLine)).toEqual([
      { lineNumber: 5, text: 'line 5', isFaultLine: true },
    ]);
  });

  it('clips at the start of the file', () => {
    const file = dir.write('lines.ts', TEN_LINES);
    const window = buildSourceWindow(file, 1);
    expect(window.startLine).toBe(1);
    expect(window.endLine).toBe(4);
    expect(window.truncatedAbove).toBe(false);
    expect(window.truncatedBelow).toBe(true);
  });

  it('clips at the end of the file', () => {
    const file = dir.write('lines.ts', TEN_LINES);
    const window = buildSourceWindow(file, 10);
    expect(window.startLine).toBe(7);
    expect(window.endLine).toBe(10);
    expect(window.truncatedAbove).toBe(true);
    expect(window.truncatedBelow).toBe(false);
  });

  it('strips CRLF terminators', () => {
    const file = join(dir.path, 'crlf.ts');
    writeFileSync(file, 'a\r\nb\r\n', 'utf-8');
    expect(buildSourceWindow(file, 2).lines.map((l) => l.text)).toEqual([
      'a',
      'b',
    ]);
  });

  it('returns an empty window for a line past the end', () => {
    const file = dir.write('lines.ts', TEN_LINES);
    const window = buildSourceWindow(file, 11);
    expect(window.lines).toEqual([]);
    expect(window.startLine).toBe(11);
    expect(window.endLine).toBe(11);
    expect(window.totalLines).toBe(10);
  });

  it('returns an empty window for a missing file', () => {
    const window = buildSourceWindow(join(dir.path, 'missing.ts'), 3);
    expect(window.lines).toEqual([]);
    expect(window.totalLines).toBe(0);
    expect(window.truncatedAbove).toBe(false);
    expect(window.truncatedBelow).toBe(false);
  });
});
