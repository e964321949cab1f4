/* src/runner/view/service.ts
 * "ptx view": serve a target's output (or any directory), optionally
 * rebuilding HTML targets when their source changes.
 */
import { existsSync } from 'node:fs';
import path from 'node:path';

import type { AccessMode } from '../../cli/config/schema';
import { performBuild } from '../build';
import { findProject, pickTarget } from '../project/manifest';
import type { ManifestTarget } from '../project/types';
import { bold, ok } from '../util/color';
import { log } from '../util/log';

import { previewUrls } from './network';
import { type PreviewServer, startPreviewServer } from './server';
import { type Watcher, watchForChanges } from './watch';

export type ViewOptions = {
  cwd?: string;
  target?: string;
  access: AccessMode;
  port: number;
  /** Serve this directory instead of a target's output. */
  directory?: string;
  watch?: boolean;
  /** Rebuild used by watch mode; defaults to building the target. */
  rebuild?: (root: string, target: ManifestTarget) => Promise<unknown>;
  /** Polling interval for watch mode. */
  watchIntervalMs?: number;
};

export type ViewSession = {
  server: PreviewServer;
  directory: string;
  urls: string[];
  close: () => Promise<void>;
};

const defaultRebuild = (root: string, target: ManifestTarget) =>
  performBuild(root, { target: target.name });

const serve = async (
  directory: string,
  opts: ViewOptions,
  watcher?: Watcher,
): Promise<ViewSession> => {
  let server: PreviewServer;
  try {
    server = await startPreviewServer({
      directory,
      access: opts.access,
      port: opts.port,
    });
  } catch (e) {
    watcher?.close();
    throw e;
  }
  const urls = previewUrls(opts.access, server.port);
  log.info(`Serving ${directory}`);
  log.info(ok(`Server will now be running at ${bold(urls.join(', '))}`));
  log.info('Use Ctrl+C to stop the server.');
  return {
    server,
    directory,
    urls,
    close: async () => {
      watcher?.close();
      await server.close();
    },
  };
};

/**
 * Start serving. Returns null when there is nothing to serve (the reason
 * has been logged).
 */
export const startView = async (
  opts: ViewOptions,
): Promise<ViewSession | null> => {
  const cwd = opts.cwd ?? process.cwd();
  if (opts.directory !== undefined) {
    return serve(path.resolve(cwd, opts.directory), opts);
  }

  const project = await findProject(cwd);
  if (!project) {
    log.error(
      'No project manifest was found. Run "ptx init", or serve a directory with -d.',
    );
    return null;
  }
  const target = pickTarget(project, opts.target);
  if (!target) {
    log.error(`Target \`${opts.target ?? '(first)'}\` could not be found.`);
    return null;
  }
  if (target.outputDir === undefined) {
    log.error(`Target \`${target.name}\` has no <output-dir>.`);
    return null;
  }
  const output = path.resolve(project.root, target.outputDir);

  let watcher: Watcher | undefined;
  if (opts.watch) {
    const format = (target.format ?? target.name).toLowerCase();
    if (format === 'html') {
      const rebuild = opts.rebuild ?? defaultRebuild;
      log.info(`Building target "${target.name}" before watching.`);
      await rebuild(project.root, target);
      const source = path.resolve(project.root, target.source ?? 'source');
      watcher = await watchForChanges(
        {
          dirs: [path.dirname(source)],
          files:
            target.publication !== undefined
              ? [path.resolve(project.root, target.publication)]
              : [],
          ignore: [output],
        },
        async () => {
          await rebuild(project.root, target);
        },
        opts.watchIntervalMs,
      );
      log.info(`Watching ${path.dirname(source)} for changes.`);
    } else {
      log.warning(
        `Watch mode only supports HTML-format targets; "${target.name}" is ${format}. Serving without watching.`,
      );
    }
  }

  if (!existsSync(output)) {
    watcher?.close();
    log.error(
      `Output directory ${output} does not exist. Run "ptx build ${target.name}" first.`,
    );
    return null;
  }
  return serve(output, opts, watcher);
};

/** Resolve on the first SIGINT or SIGTERM. */
export const waitForShutdown = (): Promise<void> =>
  new Promise<void>((resolveP) => {
    const done = (): void => {
      process.off('SIGINT', done);
      process.off('SIGTERM', done);
      resolveP();
    };
    process.once('SIGINT', done);
    process.once('SIGTERM', done);
  });

/** Serve until `until` settles (SIGINT/SIGTERM by default). */
export const performView = async (
  opts: ViewOptions,
  until: () => Promise<void> = waitForShutdown,
): Promise<void> => {
  const session = await startView(opts);
  if (!session) return;
  try {
    await until();
  } finally {
    log.info('Stopping server.');
    await session.close();
  }
};
