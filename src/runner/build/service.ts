/* src/runner/build/service.ts
 * Build one resolved target: validate, prepare asset directories, clean the
 * output, regenerate requested assets, dispatch to the engine by format.
 */
import path from 'node:path';

import { ensureDir, remove } from 'fs-extra/esm';

import type { DiagramFormat } from '../../cli/config/schema';
import type { CommandRunner } from '../engine/exec';
import {
  DEFAULT_WEBWORK_SERVER,
  type EngineSettings,
} from '../engine/settings';
import {
  DIAGRAM_KINDS,
  type EngineRequest,
  type TransformEngine,
} from '../engine/types';
import type { BuildFormat } from '../project/types';
import { ok } from '../util/color';
import { log } from '../util/log';

import {
  readPublicationDirectories,
  resolvePublication,
} from './publication';
import type { ResolvedTarget } from './resolve';
import { validateSchema } from './schema';
import { countGeneratedElements, loadSourceTree } from './source';

export type BuildModes = {
  /** Regenerate latex-image/asymptote/sageplot images. */
  diagrams: boolean;
  diagramsFormat: DiagramFormat;
  /** Refresh webwork-representations.ptx. */
  webwork: boolean;
  /** Produce requested assets only, skipping the main build. */
  onlyAssets: boolean;
  /** Compile LaTeX output to PDF. */
  pdf: boolean;
};

export const DEFAULT_BUILD_MODES: BuildModes = {
  diagrams: false,
  diagramsFormat: 'svg',
  webwork: false,
  onlyAssets: false,
  pdf: false,
};

export type BuildDeps = {
  engine: TransformEngine;
  settings: Pick<EngineSettings, 'schema' | 'xmllint'>;
  /** Server from config; the `server` string parameter wins. */
  webworkServer?: string;
  /** Runner for the schema check (tests inject fakes). */
  runner?: CommandRunner;
};

export type BuildReport = {
  target: string;
  format: BuildFormat;
  output: string;
  publication: string;
  /** Files and directories the engine produced, in order. */
  artifacts: string[];
};

/** Directory for generated images when the publication file names none. */
export const DEFAULT_GENERATED_DIR = 'generated-assets';

const warnUnbuiltAssets = (
  format: BuildFormat,
  counts: ReturnType<typeof countGeneratedElements>,
): void => {
  if (
    format === 'html' &&
    counts['latex-image'] + counts.asymptote + counts.sageplot > 0
  ) {
    log.warning(
      'There are generated images (<latex-image/>, <asymptote/>, or <sageplot/>) in source, but these will not be (re)built. Run "ptx build" with the "-d" flag if updates are needed.',
    );
  }
  if (
    format === 'latex' &&
    counts.asymptote +
      counts.sageplot +
      counts.youtube +
      counts.interactiveWithoutPreview >
      0
  ) {
    log.warning(
      'The source has interactive elements or videos that need a preview to be generated, but these will not be (re)built. Run "ptx build" with the "-d" flag if updates are needed.',
    );
  }
};

export const runBuild = async (
  target: ResolvedTarget,
  modes: BuildModes,
  deps: BuildDeps,
): Promise<BuildReport> => {
  const { engine } = deps;
  const docs = await loadSourceTree(target.source);
  await validateSchema(target.source, deps.settings, target.root, deps.runner);

  const publication = resolvePublication(target.publication);
  const sourceDir = path.dirname(target.source);
  const dirs = await readPublicationDirectories(publication);
  if (dirs.external) await ensureDir(path.resolve(sourceDir, dirs.external));
  if (dirs.generated) await ensureDir(path.resolve(sourceDir, dirs.generated));

  // The engine refuses to write into a stale output tree.
  await remove(target.output);

  const req: EngineRequest = {
    source: target.source,
    publication,
    output: target.output,
    params: target.params,
  };
  const report: BuildReport = {
    target: target.name,
    format: target.format,
    output: target.output,
    publication,
    artifacts: [],
  };

  if (modes.webwork) {
    let server = target.params.server ?? deps.webworkServer;
    if (server === undefined) {
      log.warning(
        `No WeBWorK server named (use --param server:<url>). Using default ${DEFAULT_WEBWORK_SERVER}`,
      );
      server = DEFAULT_WEBWORK_SERVER;
    }
    report.artifacts.push(
      await engine.webwork({ ...req, output: sourceDir, server }),
    );
  }

  const counts = countGeneratedElements(docs);
  if (modes.diagrams) {
    const generated = dirs.generated
      ? path.resolve(sourceDir, dirs.generated)
      : path.resolve(target.root, DEFAULT_GENERATED_DIR);
    const kinds = DIAGRAM_KINDS.filter((k) => counts[k] > 0);
    if (!kinds.length) log.info('No generated images found in source.');
    for (const kind of kinds) {
      const output = path.join(generated, kind);
      await engine.diagrams({
        ...req,
        output,
        kind,
        format: modes.diagramsFormat,
      });
      report.artifacts.push(output);
    }
  } else {
    warnUnbuiltAssets(target.format, counts);
  }

  if (modes.onlyAssets) return report;

  switch (target.format) {
    case 'html':
      await engine.html(req);
      report.artifacts.push(target.output);
      break;
    case 'latex': {
      const tex = await engine.latex(req);
      report.artifacts.push(tex);
      if (modes.pdf) report.artifacts.push(await engine.compileLatex(tex));
      break;
    }
    case 'pdf':
      report.artifacts.push(await engine.pdf(req));
      break;
  }
  log.info(
    ok(
      `Built target "${target.name}" (${target.format}) into ${target.output}`,
    ),
  );
  return report;
};
