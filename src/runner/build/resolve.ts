/* src/runner/build/resolve.ts
 * Merge command-line flags over manifest values over built-in defaults.
 * Pure apart from logging: no filesystem access.
 */
import path from 'node:path';

import { FatalError } from '../errors';
import { MANIFEST_FILE } from '../project/locate';
import { pickTarget } from '../project/manifest';
import {
  BUILD_FORMATS,
  type BuildFormat,
  isBuildFormat,
  type Project,
  type StringParams,
} from '../project/types';
import { log } from '../util/log';

import { parseStringParams } from './params';

export type BuildFlags = {
  target?: string;
  source?: string;
  output?: string;
  publication?: string;
  /** Raw `key:value` entries from --param. */
  params?: readonly string[];
};

export type ResolvedTarget = {
  /** Target name (manifest alias, or the format when there is no manifest). */
  name: string;
  format: BuildFormat;
  /** Directory relative paths were resolved against. */
  root: string;
  /** True when a project manifest supplied the target. */
  fromManifest: boolean;
  source: string;
  output: string;
  /** Absolute publication path when one was named; otherwise the built-in is used. */
  publication?: string;
  params: StringParams;
};

/** Defaults applied when no manifest exists. */
export const NO_MANIFEST_DEFAULTS = {
  target: 'html',
  source: 'source/main.ptx',
  outputDir: (target: string): string => `output/${target}`,
} as const;

const NO_MANIFEST_FORMATS: readonly BuildFormat[] = ['html', 'latex'];

const requireFormat = (format: string, target: string): BuildFormat => {
  const f = format.toLowerCase();
  if (isBuildFormat(f)) return f;
  throw new FatalError(
    `target "${target}" has unsupported format "${format}"; expected one of ${BUILD_FORMATS.join(', ')}`,
  );
};

const withPublisher = (
  params: StringParams,
  publication: string | undefined,
): string | undefined => params.publisher ?? publication;

const resolveWithoutManifest = (
  cwd: string,
  flags: BuildFlags,
  cliParams: StringParams,
): ResolvedTarget => {
  const name = flags.target ?? NO_MANIFEST_DEFAULTS.target;
  const format = name.toLowerCase();
  if (!isBuildFormat(format) || !NO_MANIFEST_FORMATS.includes(format)) {
    throw new FatalError(
      'Without a project manifest, you can only build "html" or "latex".',
    );
  }
  const publication = withPublisher(cliParams, flags.publication);
  return {
    name,
    format,
    root: cwd,
    fromManifest: false,
    source: path.resolve(cwd, flags.source ?? NO_MANIFEST_DEFAULTS.source),
    output: path.resolve(
      cwd,
      flags.output ?? NO_MANIFEST_DEFAULTS.outputDir(name),
    ),
    publication: publication ? path.resolve(cwd, publication) : undefined,
    params: cliParams,
  };
};

const resolveFromManifest = (
  project: Project,
  flags: BuildFlags,
  cliParams: StringParams,
): ResolvedTarget => {
  let name = flags.target;
  if (name === undefined) {
    const first = project.targets[0];
    if (!first) {
      throw new FatalError(
        `project manifest ${project.manifestPath} declares no targets`,
      );
    }
    name = first.name;
    log.info(
      `Since no build target was supplied, we will build "${name}", the first target of the project manifest ${MANIFEST_FILE} in ${project.root}`,
    );
  }
  const target = pickTarget(project, name);
  if (!target) {
    throw new FatalError(
      `Build target "${name}" does not exist in project manifest ${MANIFEST_FILE}`,
    );
  }

  log.debug(
    `source = ${flags.source ?? '-'}, output = ${flags.output ?? '-'}, publication = ${flags.publication ?? '-'}`,
  );
  const source = flags.source ?? target.source;
  if (flags.source === undefined && source !== undefined)
    log.debug(`No source provided, using ${source}, taken from manifest`);
  const output = flags.output ?? target.outputDir;
  if (flags.output === undefined && output !== undefined)
    log.debug(`No output provided, using ${output}, taken from manifest`);
  if (source === undefined) {
    throw new FatalError(
      `target "${name}" has no <source> in ${MANIFEST_FILE}; pass --input`,
    );
  }
  if (output === undefined) {
    throw new FatalError(
      `target "${name}" has no <output-dir> in ${MANIFEST_FILE}; pass --output`,
    );
  }

  let publication = flags.publication;
  if (publication === undefined) {
    publication = target.publication;
    if (publication !== undefined)
      log.debug(
        `No publication file provided, using ${publication}, taken from manifest`,
      );
    else
      log.warning(
        `No publication file was found in ${MANIFEST_FILE}, will try to build anyway.`,
      );
  }

  let format: BuildFormat;
  if (target.format !== undefined) {
    format = requireFormat(target.format, name);
    log.debug(
      `Setting the target format to ${format}, taken from manifest for target ${name}`,
    );
  } else {
    log.warning(
      `No format listed in the manifest for the target ${name}. Will try to build using "${name}" as the format.`,
    );
    format = requireFormat(name, name);
  }

  const params = { ...target.stringParams, ...cliParams };
  publication = withPublisher(params, publication);
  return {
    name,
    format,
    root: project.root,
    fromManifest: true,
    source: path.resolve(project.root, source),
    output: path.resolve(project.root, output),
    publication: publication ? path.resolve(project.root, publication) : undefined,
    params,
  };
};

/**
 * Resolve the build target for `flags`.
 *
 * Relative paths, from flags or the manifest, are taken relative to the
 * project root when a project exists and to `cwd` otherwise.
 */
export const resolveTarget = (
  project: Project | null,
  cwd: string,
  flags: BuildFlags,
): ResolvedTarget => {
  const cliParams = parseStringParams(flags.params ?? []);
  return project
    ? resolveFromManifest(project, flags, cliParams)
    : resolveWithoutManifest(cwd, flags, cliParams);
};
