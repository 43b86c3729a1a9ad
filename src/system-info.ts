/**
 * System Info
 * Runtime and module resolution details shown in the frame-state panel
 */

import { basename, delimiter, dirname, join } from 'node:path';
import { release } from 'node:os';
import type { SystemInfo } from './types.js';

/**
 * Directories Node searches for bare module specifiers, in order:
 * NODE_PATH entries, then node_modules of cwd and each ancestor.
 */
export function moduleSearchPaths(
  cwd: string,
  nodePath: string | undefined = process.env['NODE_PATH']
): string[] {
  const paths: string[] = [];

  for (const entry of (nodePath ?? '').split(delimiter)) {
    if (entry !== '') paths.push(entry);
  }

  let dir = cwd;
  for (;;) {
    if (basename(dir) !== 'node_modules') {
      paths.push(join(dir, 'node_modules'));
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return paths;
}

/** Collect runtime details for the current process */
export function collectSystemInfo(cwd: string = process.cwd()): SystemInfo {
  return {
    runtimeVersion: process.version,
    platform: `${process.platform}-${release()}-${process.arch}`,
    cwd,
    searchPaths: moduleSearchPaths(cwd),
  };
}
