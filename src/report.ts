/**
 * Report Pipeline
 * Classifies a thrown value, gathers frame state and source context,
 * and writes the rendered report
 */

import { classifyError } from './classify.js';
import { createDefaultConfig } from './config.js';
import { extractDetail } from './extractors/index.js';
import { describeFailure, extractFrameState, safeRepresent } from './frame-state.js';
import { NOTE_PREFIX, renderReport, type RenderOptions } from './render.js';
import { buildSourceWindow, getSourceLine } from './source-context.js';
import { walkStack } from './stack/walker.js';
import { collectSystemInfo } from './system-info.js';
import type { FaultReport, RaisedError, SystemInfo } from './types.js';

// ============================================================
// CALLBACKS
// ============================================================

export interface ReporterCallbacks {
  /** Receives report text and the install confirmation */
  readonly onOutput: (text: string) => void;
  /** Shows a thrown value the default way when no detail applies */
  readonly onFallback: (thrown: unknown) => void;
  /** Ends the process after an uncaught error */
  readonly onExit: (code: number) => void;
}

/**
 * What Node prints for an uncaught value: the stack of errors,
 * `Uncaught <value>` for anything else.
 */
export function formatDefaultPresentation(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.stack ?? `${thrown.name}: ${thrown.message}`;
  }
  return `Uncaught ${safeRepresent(thrown)}`;
}

export const defaultCallbacks: ReporterCallbacks = {
  onOutput: (text) => {
    process.stdout.write(text);
  },
  onFallback: (thrown) => {
    process.stderr.write(`${formatDefaultPresentation(thrown)}\n`);
  },
  onExit: (code) => {
    process.exit(code);
  },
};

// ============================================================
// REPORT ASSEMBLY
// ============================================================

/**
 * Assemble the report of a classified error.
 *
 * @returns Report, or undefined when the error has no frame
 */
export function assembleReport(
  error: RaisedError,
  system: SystemInfo = collectSystemInfo()
): FaultReport | undefined {
  const walk = walkStack(error.stackChain);
  if (!walk) {
    return undefined;
  }

  const { faultFrame } = walk;
  const faultLine = getSourceLine(
    faultFrame.sourceFile,
    faultFrame.sourceLine
  ).trim();

  return {
    error,
    walk,
    state: extractFrameState(faultFrame),
    window: buildSourceWindow(faultFrame.sourceFile, faultFrame.sourceLine),
    extraction: extractDetail(error, faultFrame, faultLine),
    system,
  };
}

/**
 * Build the report of a thrown value.
 *
 * @returns Report, or undefined when the value carries no usable stack
 */
export function buildReport(
  thrown: unknown,
  system?: SystemInfo
): FaultReport | undefined {
  return assembleReport(classifyError(thrown), system);
}

// ============================================================
// REPORTING
// ============================================================

export interface ReportErrorOptions {
  readonly render?: RenderOptions | undefined;
  readonly callbacks?: Partial<ReporterCallbacks> | undefined;
  readonly cwd?: string | undefined;
}

/** 'detailed' when a category detail was shown, else 'deferred' */
export type ReportOutcome = 'detailed' | 'deferred';

/**
 * Write the report of a thrown value.
 *
 * Constraints:
 * - A failure while building or writing the report becomes a note
 * - Without frames or without a category detail, the default
 *   presentation follows (onFallback)
 */
export function reportError(
  thrown: unknown,
  options: ReportErrorOptions = {}
): ReportOutcome {
  const callbacks: ReporterCallbacks = {
    ...defaultCallbacks,
    ...options.callbacks,
  };
  const render = options.render ?? createDefaultConfig();

  let report: FaultReport | undefined;
  try {
    report = buildReport(thrown, collectSystemInfo(options.cwd));
    if (report) {
      callbacks.onOutput(`${renderReport(report, render)}\n`);
    }
  } catch (failure) {
    report = undefined;
    callbacks.onOutput(
      `${NOTE_PREFIX} Report failed: ${describeFailure(failure)}\n`
    );
  }

  if (report?.extraction.detail === undefined) {
    callbacks.onFallback(thrown);
    return 'deferred';
  }
  return 'detailed';
}
