/**
 * Upward file search
 *
 * Looks for a file in a directory and then in each of its ancestors,
 * stopping at the first directory that contains it.
 */

import { statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/**
 * Options for the upward search
 */
export interface FindUpOptions {
  /** Last directory to check (inclusive); defaults to the filesystem root */
  stopAt?: string;
}

function isMatch(path: string, allowDirectories: boolean): boolean {
  try {
    const stats = statSync(path);
    return stats.isFile() || (allowDirectories && stats.isDirectory());
  } catch {
    return false;
  }
}

/**
 * List `startDir` and all of its ancestors, nearest first
 */
export function ancestorsOf(startDir: string, stopAt?: string): string[] {
  const dirs: string[] = [];
  const stop = stopAt ? resolve(stopAt) : undefined;
  let current = resolve(startDir);

  for (;;) {
    dirs.push(current);
    if (current === stop) break;
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return dirs;
}

/**
 * Find the nearest regular file `fileName` at or above `startDir`
 *
 * @returns Absolute path of the match, or null when there is none
 */
export function findUp(fileName: string, startDir: string, options: FindUpOptions = {}): string | null {
  for (const dir of ancestorsOf(startDir, options.stopAt)) {
    const candidate = join(dir, fileName);
    if (isMatch(candidate, false)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Find the nearest directory at or above `startDir` containing any of `names`
 *
 * Names may be files or directories, such as `.git`.
 */
export function findUpDirectory(
  names: readonly string[],
  startDir: string,
  options: FindUpOptions = {}
): string | null {
  for (const dir of ancestorsOf(startDir, options.stopAt)) {
    for (const name of names) {
      if (isMatch(join(dir, name), true)) {
        return dir;
      }
    }
  }
  return null;
}
