/* src/runner/engine/engine.ts
 * TransformEngine over the external distribution:
 *  - xsltproc with the distribution's stylesheets (html, latex),
 *  - the LaTeX compiler (pdf),
 *  - the distribution's conversion script (diagrams, webwork).
 */
import path from 'node:path';

import { ensureDir } from 'fs-extra/esm';

import { FatalError, messageOf } from '../errors';
import type { StringParams } from '../project/types';
import { log } from '../util/log';

import {
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  runCommand,
  tailOf,
} from './exec';
import type { EngineSettings } from './settings';
import type {
  DiagramRequest,
  EngineRequest,
  TransformEngine,
  WebworkRequest,
} from './types';

/** Compiler passes so cross-references settle. */
export const LATEX_PASSES = 2;

export const WEBWORK_FILE = 'webwork-representations.ptx';

/** `--stringparam k v` pairs for xsltproc; publisher first. */
export const xsltParamArgs = (
  publication: string,
  params: StringParams,
): string[] => {
  const out = ['--stringparam', 'publisher', publication];
  for (const [k, v] of Object.entries(params)) {
    if (k === 'publisher') continue;
    out.push('--stringparam', k, v);
  }
  return out;
};

/** `-x k1 v1 k2 v2` for the conversion script; empty when there are none. */
export const scriptParamArgs = (params: StringParams): string[] => {
  const pairs = Object.entries(params).filter(([k]) => k !== 'publisher');
  return pairs.length ? ['-x', ...pairs.flat()] : [];
};

const stem = (file: string): string =>
  path.basename(file, path.extname(file));

export class XslEngine implements TransformEngine {
  constructor(
    private readonly settings: EngineSettings,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  private stylesheet(name: string): string {
    if (!this.settings.xsl) {
      throw new FatalError(
        'transformation engine not configured: set engine.root (or engine.xsl) in ptx.config.yml, or PTX_ENGINE_DIR',
      );
    }
    return path.join(this.settings.xsl, name);
  }

  private script(): string {
    if (!this.settings.script) {
      throw new FatalError(
        'engine conversion script not configured: set engine.root (or engine.script) in ptx.config.yml, or PTX_ENGINE_DIR',
      );
    }
    return this.settings.script;
  }

  private async exec(
    what: string,
    cmd: string,
    args: readonly string[],
    opts: CommandOptions = {},
  ): Promise<void> {
    log.debug(`${what}: ${cmd} ${args.join(' ')}`);
    let result: CommandResult;
    try {
      result = await this.runner(cmd, args, {
        timeout: this.settings.timeout,
        ...opts,
      });
    } catch (e) {
      throw new FatalError(`${what}: unable to run ${cmd}: ${messageOf(e)}`);
    }
    if (result.code !== 0) {
      throw new FatalError(
        `${what} failed (exit ${String(result.code)})\n${tailOf(result)}`,
      );
    }
  }

  async html(req: EngineRequest): Promise<void> {
    await ensureDir(req.output);
    log.info(`Now building HTML into ${req.output}`);
    // The HTML stylesheet writes its chunks into the working directory.
    await this.exec(
      'html build',
      this.settings.xsltproc,
      [
        '--xinclude',
        ...xsltParamArgs(req.publication, req.params),
        this.stylesheet('pretext-html.xsl'),
        req.source,
      ],
      { cwd: req.output },
    );
  }

  async latex(req: EngineRequest): Promise<string> {
    await ensureDir(req.output);
    const tex = path.join(req.output, `${stem(req.source)}.tex`);
    log.info(`Now building LaTeX into ${req.output}`);
    await this.exec('latex build', this.settings.xsltproc, [
      '--xinclude',
      ...xsltParamArgs(req.publication, req.params),
      '--output',
      tex,
      this.stylesheet('pretext-latex.xsl'),
      req.source,
    ]);
    return tex;
  }

  async compileLatex(texFile: string): Promise<string> {
    const dir = path.dirname(texFile);
    const name = path.basename(texFile);
    for (let pass = 1; pass <= LATEX_PASSES; pass += 1) {
      log.debug(`${this.settings.latex} pass ${String(pass)} of ${name}`);
      await this.exec(
        'pdf compile',
        this.settings.latex,
        ['-interaction=nonstopmode', '-halt-on-error', name],
        { cwd: dir },
      );
    }
    return path.join(dir, `${stem(texFile)}.pdf`);
  }

  async pdf(req: EngineRequest): Promise<string> {
    const tex = await this.latex(req);
    log.info(`Now compiling ${path.basename(tex)} to PDF`);
    return this.compileLatex(tex);
  }

  async diagrams(req: DiagramRequest): Promise<void> {
    await ensureDir(req.output);
    log.info(
      `Now generating ${req.kind} images (${req.format}) into ${req.output}`,
    );
    await this.exec(`${req.kind} generation`, this.settings.python, [
      this.script(),
      '-c',
      req.kind,
      '-f',
      req.format,
      '-p',
      req.publication,
      ...scriptParamArgs(req.params),
      '-d',
      req.output,
      req.source,
    ]);
  }

  async webwork(req: WebworkRequest): Promise<string> {
    await ensureDir(req.output);
    log.info(`Now processing WeBWorK exercises with ${req.server}`);
    await this.exec('webwork processing', this.settings.python, [
      this.script(),
      '-c',
      'webwork',
      '-s',
      req.server,
      '-p',
      req.publication,
      ...scriptParamArgs(req.params),
      '-d',
      req.output,
      req.source,
    ]);
    return path.join(req.output, WEBWORK_FILE);
  }
}

export const createEngine = (
  settings: EngineSettings,
  runner: CommandRunner = runCommand,
): TransformEngine => new XslEngine(settings, runner);
