/* src/runner/scaffold/archive.ts
 * Extract a zipped project template. The template root is the directory of
 * the first entry named project.ptx; only entries beneath it are written.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import JSZip from 'jszip';

import { ExitCode, FatalError, messageOf } from '../errors';
import { MANIFEST_FILE } from '../project/locate';

/** Archive prefix (with trailing slash) of the template root; '' at top level. */
export const findTemplateRoot = (names: readonly string[]): string | null => {
  const manifest = names.find(
    (n) => !n.endsWith('/') && path.posix.basename(n) === MANIFEST_FILE,
  );
  if (manifest === undefined) return null;
  const dir = path.posix.dirname(manifest);
  return dir === '.' ? '' : `${dir}/`;
};

/** Absolute destination of an entry; throws when it lands outside `root`. */
export const entryDestination = (
  root: string,
  rel: string,
  entryName = rel,
): string => {
  const abs = path.resolve(root, rel);
  if (abs !== root && !abs.startsWith(root + path.sep)) {
    throw new FatalError(
      `template entry "${entryName}" escapes the project directory`,
      ExitCode.InvalidInput,
    );
  }
  return abs;
};

/**
 * Write the template contained in `data` into `dest`.
 *
 * @returns Relative paths written, in archive order.
 */
export const extractTemplateArchive = async (
  data: Uint8Array,
  dest: string,
): Promise<string[]> => {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (e) {
    throw new FatalError(
      `template is not a zip archive: ${messageOf(e)}`,
      ExitCode.InvalidInput,
    );
  }
  const entries = Object.values(zip.files);
  const prefix = findTemplateRoot(entries.map((e) => e.name));
  if (prefix === null) {
    throw new FatalError(
      `template archive contains no ${MANIFEST_FILE}`,
      ExitCode.InvalidInput,
    );
  }
  const root = path.resolve(dest);
  const written: string[] = [];
  for (const entry of entries) {
    if (entry.dir || !entry.name.startsWith(prefix)) continue;
    const rel = entry.name.slice(prefix.length);
    const abs = entryDestination(root, rel, entry.name);
    await mkdir(path.dirname(abs), { recursive: true });
    await writeFile(abs, await entry.async('nodebuffer'));
    written.push(rel);
  }
  return written;
};
