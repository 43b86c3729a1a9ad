/**
 * Location of faultscope's own modules.
 * Frames from these files are hidden from reports.
 */

import { dirname, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

export const SOURCE_ROOT = dirname(fileURLToPath(import.meta.url));

export function isLibraryFile(file: string): boolean {
  return file.startsWith(SOURCE_ROOT + sep);
}
