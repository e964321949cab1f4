// src/runner/engine/settings.ts
import path from 'node:path';

import type { LoadedCliConfig } from '../../cli/config/load';

export type EngineSettings = {
  /** Directory holding pretext-html.xsl and pretext-latex.xsl. */
  xsl?: string;
  /** Engine conversion script (diagrams, WeBWorK). */
  script?: string;
  /** RELAX NG schema for source validation. */
  schema?: string;
  xsltproc: string;
  xmllint: string;
  latex: string;
  python: string;
  /** Inactivity timeout in seconds for engine processes (0 = never). */
  timeout: number;
};

export const DEFAULT_WEBWORK_SERVER = 'https://webwork-ptx.aimath.org';

/**
 * Derive engine locations from config and environment.
 * `PTX_ENGINE_DIR` wins over `engine.root`; explicit `engine.xsl|script|schema`
 * win over locations under the root. Relative paths are taken from the
 * config file's directory (or `cwd` for the environment variable).
 */
export const resolveEngineSettings = (
  config: LoadedCliConfig,
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): EngineSettings => {
  const base = config.path ? path.dirname(config.path) : cwd;
  const fromConfig = (p: string | undefined): string | undefined =>
    p === undefined ? undefined : path.resolve(base, p);
  const engine = config.engine ?? {};
  const envRoot = env.PTX_ENGINE_DIR?.trim();
  const root = envRoot ? path.resolve(cwd, envRoot) : fromConfig(engine.root);
  const under = (...parts: string[]): string | undefined =>
    root ? path.join(root, ...parts) : undefined;
  return {
    xsl: fromConfig(engine.xsl) ?? under('xsl'),
    script: fromConfig(engine.script) ?? under('pretext', 'pretext'),
    schema: fromConfig(engine.schema) ?? under('schema', 'pretext.rng'),
    xsltproc: engine.xsltproc ?? 'xsltproc',
    xmllint: engine.xmllint ?? 'xmllint',
    latex: engine.latex ?? 'pdflatex',
    python: engine.python ?? 'python3',
    timeout: engine.timeout ?? 0,
  };
};
