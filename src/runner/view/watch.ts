/* src/runner/view/watch.ts
 * Polling watcher: fingerprints matching files by path, size and mtime and
 * calls onChange when the fingerprint moves. Runs never overlap.
 */
import { stat } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { messageOf } from '../errors';
import { log } from '../util/log';

export const WATCH_PATTERNS = ['**/*.ptx', '**/*.xml', '**/*.xsl'];

export type WatchTarget = {
  /** Directories scanned with WATCH_PATTERNS. */
  dirs: readonly string[];
  /** Individual files (e.g. the publication file). */
  files?: readonly string[];
  /** Absolute directories never scanned (e.g. the output tree). */
  ignore?: readonly string[];
};

const toGlobIgnore = (dir: string, ignore: readonly string[]): string[] =>
  ignore
    .map((abs) => path.relative(dir, abs))
    .filter((rel) => rel.length > 0 && !rel.startsWith('..'))
    .map((rel) => `${rel.split(path.sep).join('/')}/**`);

/** Fingerprint of the watched files; changes when any is added, removed or touched. */
export const fingerprint = async (target: WatchTarget): Promise<string> => {
  const files = new Set<string>(target.files ?? []);
  for (const dir of target.dirs) {
    const found = await fg(WATCH_PATTERNS, {
      cwd: dir,
      absolute: true,
      onlyFiles: true,
      ignore: ['**/node_modules/**', ...toGlobIgnore(dir, target.ignore ?? [])],
    });
    for (const f of found) files.add(path.resolve(f));
  }
  const parts: string[] = [];
  for (const f of [...files].sort()) {
    try {
      const s = await stat(f);
      parts.push(`${f}:${String(s.size)}:${String(s.mtimeMs)}`);
    } catch {
      parts.push(`${f}:missing`);
    }
  }
  return parts.join('\n');
};

export type Watcher = { close: () => void };

export const watchForChanges = async (
  target: WatchTarget,
  onChange: () => Promise<void>,
  intervalMs = 1000,
): Promise<Watcher> => {
  let last = await fingerprint(target);
  let busy = false;
  const tick = async (): Promise<void> => {
    if (busy) return;
    busy = true;
    try {
      const next = await fingerprint(target);
      if (next !== last) {
        last = next;
        log.info('Change detected; rebuilding.');
        await onChange();
        // Files written by the rebuild itself must not retrigger it.
        last = await fingerprint(target);
      }
    } catch (e) {
      log.error(`rebuild failed: ${messageOf(e)}`);
    } finally {
      busy = false;
    }
  };
  const timer = setInterval(() => {
    void tick();
  }, intervalMs);
  return { close: () => clearInterval(timer) };
};
