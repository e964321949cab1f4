// src/runner/scaffold/init.ts
import path from 'node:path';

import { copy } from 'fs-extra/esm';

import { templateFiles } from '../paths';
import { findProjectRootSync, MANIFEST_FILE } from '../project/locate';
import { ok } from '../util/color';
import { log } from '../util/log';

/**
 * Write a manifest template into `cwd` unless a project already covers it.
 *
 * @returns Path of the written manifest, or null when nothing was written.
 */
export const performInit = async (
  cwd: string = process.cwd(),
): Promise<string | null> => {
  const dir = path.resolve(cwd);
  const existing = findProjectRootSync(dir);
  if (existing !== null) {
    log.warning(`A project already exists in \`${existing}\`.`);
    log.warning('No project manifest will be generated.');
    return null;
  }
  log.info(`Generating new project manifest in \`${dir}\`.`);
  const manifest = path.join(dir, MANIFEST_FILE);
  await copy(templateFiles().manifest, manifest, { overwrite: false });
  log.info(ok(`Success! Open \`${manifest}\` to edit your manifest.`));
  log.info(
    'Edit your <target/>s to point to your source and publication files.',
  );
  return manifest;
};
