// src/runner/project/locate.ts
import { existsSync } from 'node:fs';
import path from 'node:path';

/** File name of the project manifest. */
export const MANIFEST_FILE = 'project.ptx';

/**
 * Walk from `start` up to the filesystem root and return the first
 * directory that holds a project manifest.
 *
 * @returns Absolute project root, or `null` when no manifest exists.
 */
export const findProjectRootSync = (start: string): string | null => {
  let cur = path.resolve(start);
  for (;;) {
    if (existsSync(path.join(cur, MANIFEST_FILE))) return cur;
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};
