// src/runner/paths.ts
import path from 'node:path';
import { fileURLToPath } from 'node:url';

/** Templates shipped with the package (<pkg>/templates). */
export const templatesDir = (): string =>
  fileURLToPath(new URL('../../templates', import.meta.url));

export type TemplateFiles = {
  /** Manifest copied by `ptx init`. */
  manifest: string;
  /** Publication file used when none is supplied or found. */
  publication: string;
  /** Directory of a built-in project template. */
  project: (name: string) => string;
};

export const templateFiles = (base = templatesDir()): TemplateFiles => ({
  manifest: path.join(base, 'project.ptx'),
  publication: path.join(base, 'publication.ptx'),
  project: (name: string) => path.join(base, name),
});

/** Folder that `ptx publish` fills for GitHub Pages. */
export const PUBLISH_DIR = 'docs';
