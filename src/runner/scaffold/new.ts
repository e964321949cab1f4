/* src/runner/scaffold/new.ts
 * "ptx new": materialize a project from a built-in template or a zip URL.
 */
import path from 'node:path';

import { copy } from 'fs-extra/esm';

import { FatalError, messageOf } from '../errors';
import { templateFiles } from '../paths';
import { findProjectRootSync } from '../project/locate';
import { ok } from '../util/color';
import { log } from '../util/log';

import { extractTemplateArchive } from './archive';

export const PROJECT_TEMPLATES = ['book', 'article'] as const;
export type ProjectTemplate = (typeof PROJECT_TEMPLATES)[number];

export const DEFAULT_PROJECT_DIRECTORY = 'new-pretext-project';

export type NewProjectOptions = {
  cwd?: string;
  template?: ProjectTemplate;
  directory?: string;
  /** Download a zipped template instead of using a built-in one. */
  urlTemplate?: string;
  fetchImpl?: typeof fetch;
};

const download = async (url: string, fetchImpl: typeof fetch) => {
  let res: Response;
  try {
    res = await fetchImpl(url);
  } catch (e) {
    throw new FatalError(`unable to download ${url}: ${messageOf(e)}`);
  }
  if (!res.ok) {
    throw new FatalError(
      `unable to download ${url}: HTTP ${String(res.status)}`,
    );
  }
  return new Uint8Array(await res.arrayBuffer());
};

/**
 * Generate a new project.
 *
 * @returns Absolute project directory, or null when a project already
 * exists there (nothing is written in that case).
 */
export const performNew = async ({
  cwd = process.cwd(),
  template = 'book',
  directory = DEFAULT_PROJECT_DIRECTORY,
  urlTemplate,
  fetchImpl = fetch,
}: NewProjectOptions = {}): Promise<string | null> => {
  const dest = path.resolve(cwd, directory);
  const existing = findProjectRootSync(dest);
  if (existing !== null) {
    log.warning(`A project already exists in \`${existing}\`.`);
    log.warning('No new project will be generated.');
    return null;
  }
  if (urlTemplate !== undefined) {
    log.info(
      `Generating new project in \`${dest}\` using template from ${urlTemplate}.`,
    );
    await extractTemplateArchive(await download(urlTemplate, fetchImpl), dest);
  } else {
    log.info(
      `Generating new project in \`${dest}\` using \`${template}\` template.`,
    );
    await copy(templateFiles().project(template), dest, { overwrite: true });
  }
  log.info(
    ok(
      `Success! Open \`${path.join(dest, 'source', 'main.ptx')}\` to edit your document`,
    ),
  );
  log.info(`Then try to \`ptx build\` and \`ptx view\` from within \`${dest}\`.`);
  return dest;
};
