/**
 * Handler Installer
 * Registers the reporter as the process-wide uncaught-error sink
 */

import { resolveConfig, type ReporterConfig } from './config.js';
import { describeFailure } from './frame-state.js';
import { NOTE_PREFIX } from './render.js';
import {
  defaultCallbacks,
  reportError,
  type ReporterCallbacks,
} from './report.js';

/** Exit status Node uses for uncaught exceptions */
export const UNCAUGHT_EXIT_CODE = 1;

export const BANNER = `${NOTE_PREFIX} Uncaught error reporter enabled`;

export interface InstallOptions {
  /** Directory holding .faultscope.yaml (default: process.cwd()) */
  readonly cwd?: string | undefined;
  /** Options that override the configuration file */
  readonly config?: Partial<ReporterConfig> | undefined;
  readonly callbacks?: Partial<ReporterCallbacks> | undefined;
}

/** The single handler installed by this module */
let installed: NodeJS.UncaughtExceptionListener | undefined;

/**
 * Install the reporter for uncaught errors.
 *
 * Installing again replaces the previous handler, so exactly one is
 * active. The process still exits with status 1 after each report.
 *
 * @throws Error with "Invalid configuration: {reason}" for a bad
 *   .faultscope.yaml
 */
export function installReporter(options: InstallOptions = {}): void {
  const cwd = options.cwd ?? process.cwd();
  const config = resolveConfig(cwd, options.config);
  const callbacks: ReporterCallbacks = {
    ...defaultCallbacks,
    ...options.callbacks,
  };

  const handler: NodeJS.UncaughtExceptionListener = (thrown: unknown) => {
    try {
      reportError(thrown, { render: config, callbacks, cwd });
    } catch (failure) {
      process.stderr.write(
        `${NOTE_PREFIX} Reporter failed: ${describeFailure(failure)}\n`
      );
    } finally {
      callbacks.onExit(UNCAUGHT_EXIT_CODE);
    }
  };

  if (installed) {
    process.removeListener('uncaughtException', installed);
  }
  process.on('uncaughtException', handler);
  installed = handler;

  if (config.banner) {
    callbacks.onOutput(`${BANNER}\n`);
  }
}

/**
 * Remove the installed handler.
 *
 * @returns false when no handler was installed
 */
export function uninstallReporter(): boolean {
  if (!installed) {
    return false;
  }
  process.removeListener('uncaughtException', installed);
  installed = undefined;
  return true;
}

export function isReporterInstalled(): boolean {
  return installed !== undefined;
}
