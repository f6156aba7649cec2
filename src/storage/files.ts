/**
 * File discovery for LaTeX projects.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { delimiter, dirname, extname, join } from 'path';
import { NotFoundError } from '../core/errors.js';

/**
 * Configuration file name looked up from the working directory upwards.
 */
export const CONFIG_FILE = 'latex-index.yaml';

export interface DiscoveryOptions {
  /** Extensions, without the dot, of files to parse. */
  extensions: readonly string[];
  /** Whether to descend into sub-directories. */
  recurse: boolean;
}

/**
 * Find the nearest configuration file by walking up from `startDir`.
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

/**
 * Split a `path.delimiter` separated list (`:` on POSIX) into paths.
 */
export function splitPathList(value: string): string[] {
  return value
    .split(delimiter)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function isCandidateFile(filePath: string, extensions: readonly string[]): boolean {
  return extensions.includes(extname(filePath).slice(1));
}

/**
 * Return the files under `path` to parse. A file is returned when its
 * extension is a candidate; directories are listed in name order.
 */
export function findCandidateFiles(path: string, options: DiscoveryOptions): string[] {
  if (!existsSync(path)) {
    throw new NotFoundError(path);
  }

  const files: string[] = [];

  function walk(current: string, depth: number) {
    const stat = statSync(current, { throwIfNoEntry: false });
    if (!stat) return;
    if (stat.isFile()) {
      if (isCandidateFile(current, options.extensions)) {
        files.push(current);
      }
      return;
    }
    if (!stat.isDirectory()) return;
    if (depth > 0 && !options.recurse) return;

    for (const entry of readdirSync(current).sort()) {
      walk(join(current, entry), depth + 1);
    }
  }

  walk(path, 0);
  return files;
}
