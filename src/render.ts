/**
 * Report Renderer
 * Formats a fault report as ANSI-styled text
 */

import { sep } from 'node:path';
import { createPalette, type Palette } from './ansi.js';
import { MAX_LISTED_MEMBERS } from './extractors/member-not-found.js';
import { safeRepresent } from './frame-state.js';
import type {
  CallFrame,
  DiagnosticDetail,
  FaultReport,
  FrameState,
  RaisedError,
  SourceWindow,
  SystemInfo,
} from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface RenderOptions {
  readonly color: boolean;
  readonly systemInfo: boolean;
}

/** Longest value representation shown in the Variables section */
export const MAX_VALUE_LENGTH = 500;

/** Prefix of extraction notes */
export const NOTE_PREFIX = '[faultscope]';

const RULE_WIDTH = 60;

// ============================================================
// REPORT
// ============================================================

/**
 * Render a fault report.
 *
 * Output order:
 * 1. Header
 * 2. Frame state (modules, functions, system info, search paths, variables)
 * 3. Location
 * 4. Stack trace, fault frame first
 * 5. Code context
 * 6. Extraction notes
 * 7. Category details, when a detail was extracted
 */
export function renderReport(
  report: FaultReport,
  options: RenderOptions
): string {
  const c = createPalette(options.color);
  const lines: string[] = [];

  renderHeader(lines, report.error, c);
  renderFrameState(lines, report.state, c);
  if (options.systemInfo) {
    renderSystemInfo(lines, report.system, c);
  }
  renderVariables(lines, report.state, c);
  renderLocation(lines, report.walk.faultFrame, c);
  renderStackTrace(lines, report.walk.frames, c);
  renderCodeContext(lines, report.window, c);

  for (const note of report.extraction.notes) {
    lines.push(`${NOTE_PREFIX} ${note}`);
  }

  if (report.extraction.detail) {
    renderDetail(lines, report.extraction.detail, c);
  }

  return lines.join('\n');
}

// ============================================================
// PANELS
// ============================================================

function label(c: Palette, title: string): string {
  return c.bold(`------ ${title} ------`);
}

function renderHeader(lines: string[], error: RaisedError, c: Palette): void {
  const rule = c.bold.red('='.repeat(RULE_WIDTH));
  lines.push('');
  lines.push(rule);
  lines.push(
    c.bold.red(`ERROR: ${error.name} (${error.category}): ${error.message}`)
  );
  lines.push(rule);
}

function renderNames(
  lines: string[],
  title: string,
  names: Iterable<string>,
  c: Palette
): void {
  lines.push('');
  lines.push(label(c, title));
  const list = [...names];
  if (list.length === 0) {
    lines.push('  None');
    return;
  }
  lines.push(...list);
}

function renderFrameState(lines: string[], state: FrameState, c: Palette): void {
  renderNames(lines, 'Modules', state.modules.keys(), c);
  renderNames(lines, 'Functions', state.callables.keys(), c);
}

function renderSystemInfo(lines: string[], system: SystemInfo, c: Palette): void {
  lines.push('');
  lines.push(label(c, 'System Info'));
  lines.push(`Node.js version: ${system.runtimeVersion}`);
  lines.push(`Platform: ${system.platform}`);
  lines.push(`Current working directory: ${system.cwd}`);

  lines.push('');
  lines.push(label(c, 'Module Search Paths'));
  system.searchPaths.forEach((path, index) => {
    lines.push(`  ${index + 1}. ${path}`);
  });
}

/** Cut a representation to MAX_VALUE_LENGTH characters */
export function truncateValue(repr: string): string {
  return repr.length > MAX_VALUE_LENGTH
    ? repr.slice(0, MAX_VALUE_LENGTH)
    : repr;
}

function renderVariables(lines: string[], state: FrameState, c: Palette): void {
  lines.push('');
  lines.push(label(c, 'Variables'));
  if (state.values.size === 0) {
    lines.push('  None');
    return;
  }

  const sorted = [...state.values].sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );
  for (const [name, repr] of sorted) {
    lines.push(`${name} = ${truncateValue(repr)}`);
  }
}

/**
 * Shorten a path to its last two segments.
 *
 * @example
 * shortenPath('/home/dev/app/tests/lookup.ts') // '.../tests/lookup.ts'
 */
export function shortenPath(file: string): string {
  const parts = file.split(/[\\/]/).filter((part) => part !== '');
  if (parts.length > 2) {
    return ['...', ...parts.slice(-2)].join(sep);
  }
  return file;
}

function renderLocation(lines: string[], frame: CallFrame, c: Palette): void {
  lines.push('');
  lines.push(
    `${c.yellow('Location:')} ${c.cyan(shortenPath(frame.sourceFile))}, line ${c.bold(String(frame.sourceLine))}`
  );
}

function renderStackTrace(
  lines: string[],
  frames: readonly CallFrame[],
  c: Palette
): void {
  lines.push('');
  lines.push(label(c, 'Stack Trace'));
  frames.forEach((frame, index) => {
    lines.push(
      `${index + 1}. ${c.cyan(frame.functionName)} in ${shortenPath(frame.sourceFile)}:${frame.sourceLine}`
    );
  });
}

function renderCodeContext(
  lines: string[],
  window: SourceWindow,
  c: Palette
): void {
  lines.push('');
  lines.push(label(c, 'Code Context'));

  if (window.lines.length === 0) {
    lines.push('  (source unavailable)');
    return;
  }

  if (!window.truncatedAbove) {
    lines.push('   -- start of file --');
  }

  for (const line of window.lines) {
    if (line.isFaultLine) {
      lines.push(`→ ${line.lineNumber}: ${c.red(line.text)}`);
    } else {
      lines.push(`  ${line.lineNumber}: ${line.text}`);
    }
  }

  if (window.truncatedBelow) {
    lines.push(
      `   ... (${window.totalLines - window.endLine} more lines below)`
    );
  } else {
    lines.push('  --- End of file ---');
  }
}

// ============================================================
// DETAILS
// ============================================================

function field(c: Palette, name: string, value: string): string {
  return `${c.yellow(`${name}:`)} ${value}`;
}

function renderDetail(
  lines: string[],
  detail: DiagnosticDetail,
  c: Palette
): void {
  lines.push('');
  lines.push(
    c.bold.red(`------ ${detail.category} Details ------`)
  );

  switch (detail.category) {
    case 'KeyLookup':
      lines.push(
        field(c, 'Dictionary', `${detail.containerName} = ${detail.containerRepr}`)
      );
      lines.push(field(c, 'Missing key', detail.missingKey));
      lines.push(
        field(c, 'Available keys', safeRepresent(detail.availableKeys))
      );
      if (detail.similarKeys.length > 0) {
        lines.push(
          field(c, 'Possible similar keys', safeRepresent(detail.similarKeys))
        );
      }
      break;

    case 'IndexRange':
    case 'TypeMismatch':
      lines.push(
        field(
          c,
          'Collection',
          `${detail.collectionName} = ${detail.collectionRepr}`
        )
      );
      lines.push(field(c, 'Length', String(detail.length)));
      if (detail.validIndices !== undefined) {
        lines.push(field(c, 'Valid indices', detail.validIndices));
      }
      lines.push(field(c, 'Invalid index', detail.attemptedIndex ?? 'Unparseable'));
      break;

    case 'MemberNotFound':
      lines.push(
        field(c, 'Object', `${detail.objectName} = ${detail.objectRepr}`)
      );
      lines.push(field(c, 'Type', detail.typeName));
      if (detail.members.length > 0) {
        lines.push(field(c, 'Available attributes', detail.members.join(', ')));
        if (detail.memberCount > MAX_LISTED_MEMBERS) {
          lines.push(
            `  ... and ${detail.memberCount - MAX_LISTED_MEMBERS} more`
          );
        }
      }
      if (detail.similarMembers.length > 0) {
        lines.push(
          field(
            c,
            'Possible similar attributes',
            safeRepresent(detail.similarMembers)
          )
        );
      }
      lines.push(field(c, 'Missing attribute', detail.missingMember));
      break;

    case 'UndefinedIdentifier':
      lines.push(field(c, 'Undefined variable', `'${detail.name}'`));
      if (detail.similarNames.length > 0) {
        lines.push(
          field(c, 'Similar variable names', safeRepresent(detail.similarNames))
        );
      }
      break;
  }
}
