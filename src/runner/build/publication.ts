// src/runner/build/publication.ts
import { existsSync } from 'node:fs';

import { templateFiles } from '../paths';
import { debugFallback } from '../util/debug';
import {
  DBG_SCOPE_BUILD_PUBLICATION_DEFAULT,
  DBG_SCOPE_BUILD_PUBLICATION_DIRECTORIES,
} from '../util/debug-scopes';
import { log } from '../util/log';
import { attrOf, firstChild, readXmlFile } from '../xml';

/**
 * Return the publication file to build with: the requested one when it
 * exists, else the built-in template.
 */
export const resolvePublication = (
  requested: string | undefined,
  fallback = templateFiles().publication,
): string => {
  if (requested === undefined) {
    debugFallback(
      DBG_SCOPE_BUILD_PUBLICATION_DEFAULT,
      `no publication file named; using ${fallback}`,
    );
    return fallback;
  }
  if (existsSync(requested)) return requested;
  log.error(
    `You or the manifest supplied ${requested} as a publication file, but it doesn't exist at that location. Will try to build anyway.`,
  );
  return fallback;
};

export type PublicationDirectories = {
  /** Author-provided assets, relative to the source directory. */
  external?: string;
  /** Engine-generated assets, relative to the source directory. */
  generated?: string;
};

/** Read /publication/source/directories/@external and @generated. */
export const readPublicationDirectories = async (
  file: string,
): Promise<PublicationDirectories> => {
  const doc = await readXmlFile(file);
  const source =
    doc.rootName === 'publication' ? firstChild(doc.root, 'source') : undefined;
  const dirs = source ? firstChild(source, 'directories') : undefined;
  if (!dirs) {
    debugFallback(
      DBG_SCOPE_BUILD_PUBLICATION_DIRECTORIES,
      `${file} has no source/directories element`,
    );
    return {};
  }
  return {
    external: attrOf(dirs, 'external'),
    generated: attrOf(dirs, 'generated'),
  };
};
