/* src/runner/publish/service.ts
 * "ptx publish": copy a built HTML target into <root>/docs, commit, and push
 * to origin so GitHub Pages can serve it.
 */
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { copy, remove } from 'fs-extra/esm';

import type { CommandRunner } from '../engine/exec';
import { PUBLISH_DIR } from '../paths';
import { findProject, pickTarget } from '../project/manifest';
import { ok } from '../util/color';
import { log } from '../util/log';

import { createGit, pagesUrlFor } from './git';

export type PublishOptions = {
  cwd?: string;
  target?: string;
  runner?: CommandRunner;
};

export type PublishResult = {
  /** Absolute docs/ directory that was written. */
  docs: string;
  committed: boolean;
  branch: string;
  pagesUrl: string | null;
};

/**
 * Publish a target. Returns null when a precondition fails (the reason has
 * been logged); git failures after copying are fatal.
 */
export const performPublish = async ({
  cwd = process.cwd(),
  target: name,
  runner,
}: PublishOptions = {}): Promise<PublishResult | null> => {
  const project = await findProject(cwd);
  if (!project) {
    log.error('No project manifest was found. Run "ptx init" to generate one.');
    return null;
  }
  const target = pickTarget(project, name);
  if (!target) {
    log.error(`Target \`${name ?? '(first)'}\` could not be found.`);
    return null;
  }
  const format = (target.format ?? target.name).toLowerCase();
  if (format !== 'html') {
    log.error(
      `Only HTML format targets can be published; "${target.name}" is ${format}.`,
    );
    return null;
  }
  const output =
    target.outputDir !== undefined
      ? path.resolve(project.root, target.outputDir)
      : undefined;
  if (output === undefined || !existsSync(output)) {
    log.error(
      `No built output for "${target.name}". Run "ptx build ${target.name}" first.`,
    );
    return null;
  }

  const git = createGit(project.root, runner);
  const inside = await git.run('rev-parse', '--is-inside-work-tree');
  if (inside.code !== 0 || inside.stdout.trim() !== 'true') {
    log.error(
      `${project.root} is not under Git version control. Run "git init", then add a GitHub repository as the "origin" remote.`,
    );
    return null;
  }
  const remote = await git.run('remote', 'get-url', 'origin');
  if (remote.code !== 0 || !remote.stdout.trim()) {
    log.error(
      'The repository has no "origin" remote. Add one configured for GitHub Pages with "git remote add origin <url>".',
    );
    return null;
  }

  const docs = path.join(project.root, PUBLISH_DIR);
  log.info(`Copying ${output} to ${docs}.`);
  await remove(docs);
  await copy(output, docs);
  // Serve files verbatim (no Jekyll processing of _-prefixed folders).
  await writeFile(path.join(docs, '.nojekyll'), '', 'utf8');

  await git.must('add', '--all', '--', PUBLISH_DIR);
  // Pathspecs keep whatever else the user has staged out of this commit.
  const staged = await git.run(
    'diff',
    '--cached',
    '--quiet',
    '--',
    PUBLISH_DIR,
  );
  let committed = false;
  if (staged.code === 0) {
    log.info('Published files are unchanged; nothing to commit.');
  } else {
    await git.must(
      'commit',
      '-m',
      `Publish ${target.name} to GitHub Pages`,
      '--',
      PUBLISH_DIR,
    );
    committed = true;
  }
  const branch = await git.must('rev-parse', '--abbrev-ref', 'HEAD');
  log.info(`Pushing ${branch} to origin.`);
  await git.must('push', 'origin', branch);

  const pagesUrl = pagesUrlFor(remote.stdout);
  log.info(
    ok(
      `Published. Make sure GitHub Pages serves the /${PUBLISH_DIR} folder of the ${branch} branch.`,
    ),
  );
  if (pagesUrl) log.info(`Your document will be available at ${pagesUrl}`);
  return { docs, committed, branch, pagesUrl };
};
