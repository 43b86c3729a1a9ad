/**
 * Terminal Styles
 * Chalk instance for the report, fixed at basic colors or none
 */

import { Chalk, supportsColor, type ChalkInstance } from 'chalk';

export type Palette = ChalkInstance;

/** Whether the terminal on stdout accepts color */
export const terminalSupportsColor = supportsColor !== false;

/**
 * Create the report palette.
 * Level 1 keeps the escape sequences to the 16 basic colors; level 0 leaves
 * text unstyled.
 */
export function createPalette(color: boolean): Palette {
  return new Chalk({ level: color ? 1 : 0 });
}
