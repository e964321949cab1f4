import { existsSync } from 'node:fs';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type {
  DiagramRequest,
  EngineRequest,
  TransformEngine,
  WebworkRequest,
} from '../engine/types';
import { templateFiles } from '../paths';
import { XmlSyntaxError } from '../xml';
import { captureLogs, makeTempDir, rmDirWithRetries, writeFiles } from '../../test';

import type { ResolvedTarget } from './resolve';
import { type BuildModes, DEFAULT_BUILD_MODES, runBuild } from './service';

/** Records engine calls instead of running external tools. */
class FakeEngine implements TransformEngine {
  calls: string[] = [];
  requests: EngineRequest[] = [];
  diagramRequests: DiagramRequest[] = [];
  webworkRequests: WebworkRequest[] = [];

  async html(req: EngineRequest): Promise<void> {
    this.calls.push('html');
    this.requests.push(req);
  }
  async latex(req: EngineRequest): Promise<string> {
    this.calls.push('latex');
    this.requests.push(req);
    return path.join(req.output, 'main.tex');
  }
  async compileLatex(texFile: string): Promise<string> {
    this.calls.push('compileLatex');
    return texFile.replace(/\.tex$/, '.pdf');
  }
  async pdf(req: EngineRequest): Promise<string> {
    this.calls.push('pdf');
    this.requests.push(req);
    return path.join(req.output, 'main.pdf');
  }
  async diagrams(req: DiagramRequest): Promise<void> {
    this.calls.push(`diagrams:${req.kind}`);
    this.diagramRequests.push(req);
  }
  async webwork(req: WebworkRequest): Promise<string> {
    this.calls.push('webwork');
    this.webworkRequests.push(req);
    return path.join(req.output, 'webwork-representations.ptx');
  }
}

const MAIN = `<pretext>
  <article>
    <p>Text.</p>
    <image><latex-image>\\draw (0,0) circle (1);</latex-image></image>
    <image><asymptote>draw(unitcircle);</asymptote></image>
  </article>
</pretext>
`;

const PUBLICATION = `<publication>
  <source>
    <directories external="../assets" generated="../generated-assets"/>
  </source>
</publication>
`;

describe('runBuild', () => {
  let root: string;
  let engine: FakeEngine;

  const resolved = (extra: Partial<ResolvedTarget> = {}): ResolvedTarget => ({
    name: 'web',
    format: 'html',
    root,
    fromManifest: true,
    source: path.join(root, 'source', 'main.ptx'),
    output: path.join(root, 'output', 'web'),
    publication: path.join(root, 'publication', 'publication.ptx'),
    params: { 'debug.datedfiles': 'no' },
    ...extra,
  });

  const build = (
    target: ResolvedTarget,
    modes: Partial<BuildModes> = {},
    webworkServer?: string,
  ) =>
    runBuild(
      target,
      { ...DEFAULT_BUILD_MODES, ...modes },
      { engine, settings: { xmllint: 'xmllint' }, webworkServer },
    );

  beforeEach(async () => {
    root = await makeTempDir('ptx-build-');
    engine = new FakeEngine();
    await writeFiles(root, {
      'source/main.ptx': MAIN,
      'publication/publication.ptx': PUBLICATION,
      'output/web/stale.html': 'old',
    });
  });

  afterEach(async () => {
    await rmDirWithRetries(root);
  });

  it('builds HTML after cleaning the output and preparing asset directories', async () => {
    const logs = captureLogs();
    const report = await build(resolved());
    expect(engine.calls).toEqual(['html']);
    expect(engine.requests[0]).toEqual({
      source: path.join(root, 'source', 'main.ptx'),
      publication: path.join(root, 'publication', 'publication.ptx'),
      output: path.join(root, 'output', 'web'),
      params: { 'debug.datedfiles': 'no' },
    });
    expect(existsSync(path.join(root, 'output', 'web', 'stale.html'))).toBe(
      false,
    );
    expect(existsSync(path.join(root, 'assets'))).toBe(true);
    expect(existsSync(path.join(root, 'generated-assets'))).toBe(true);
    expect(report).toEqual({
      target: 'web',
      format: 'html',
      output: path.join(root, 'output', 'web'),
      publication: path.join(root, 'publication', 'publication.ptx'),
      artifacts: [path.join(root, 'output', 'web')],
    });
    expect(logs.err).toEqual([
      'ptx: warning: There are generated images (<latex-image/>, <asymptote/>, or <sageplot/>) in source, but these will not be (re)built. Run "ptx build" with the "-d" flag if updates are needed.',
    ]);
  });

  it('regenerates only the diagram kinds present in source', async () => {
    const report = await build(resolved(), {
      diagrams: true,
      diagramsFormat: 'pdf',
    });
    expect(engine.calls).toEqual([
      'diagrams:latex-image',
      'diagrams:asymptote',
      'html',
    ]);
    expect(engine.diagramRequests.map((r) => [r.output, r.format])).toEqual([
      [path.join(root, 'generated-assets', 'latex-image'), 'pdf'],
      [path.join(root, 'generated-assets', 'asymptote'), 'pdf'],
    ]);
    expect(report.artifacts).toHaveLength(3);
  });

  it('stops after assets with onlyAssets', async () => {
    const report = await build(resolved(), { diagrams: true, onlyAssets: true });
    expect(engine.calls).toEqual(['diagrams:latex-image', 'diagrams:asymptote']);
    expect(report.artifacts).toEqual([
      path.join(root, 'generated-assets', 'latex-image'),
      path.join(root, 'generated-assets', 'asymptote'),
    ]);
  });

  it('writes WeBWorK representations beside the source, defaulting the server', async () => {
    const logs = captureLogs();
    await build(resolved(), { webwork: true, onlyAssets: true });
    expect(engine.webworkRequests[0]?.output).toBe(path.join(root, 'source'));
    expect(engine.webworkRequests[0]?.server).toBe(
      'https://webwork-ptx.aimath.org',
    );
    expect(logs.err[0]).toBe(
      'ptx: warning: No WeBWorK server named (use --param server:<url>). Using default https://webwork-ptx.aimath.org',
    );
  });

  it('prefers the server parameter over the configured server', async () => {
    await build(
      resolved({ params: { server: 'https://ww.example.org' } }),
      { webwork: true, onlyAssets: true },
      'https://configured.example.org',
    );
    expect(engine.webworkRequests[0]?.server).toBe('https://ww.example.org');
  });

  it('uses the configured server when no parameter names one', async () => {
    await build(
      resolved(),
      { webwork: true, onlyAssets: true },
      'https://configured.example.org',
    );
    expect(engine.webworkRequests[0]?.server).toBe(
      'https://configured.example.org',
    );
  });

  it('compiles LaTeX to PDF when asked', async () => {
    const out = path.join(root, 'output', 'print');
    const report = await build(resolved({ format: 'latex', output: out }), {
      pdf: true,
    });
    expect(engine.calls).toEqual(['latex', 'compileLatex']);
    expect(report.artifacts).toEqual([
      path.join(out, 'main.tex'),
      path.join(out, 'main.pdf'),
    ]);
  });

  it('warns about assets a LaTeX build cannot preview', async () => {
    const logs = captureLogs();
    await build(resolved({ format: 'latex' }));
    expect(logs.err).toEqual([
      'ptx: warning: The source has interactive elements or videos that need a preview to be generated, but these will not be (re)built. Run "ptx build" with the "-d" flag if updates are needed.',
    ]);
  });

  it('dispatches pdf targets to the engine', async () => {
    await build(resolved({ format: 'pdf' }));
    expect(engine.calls).toEqual(['pdf']);
  });

  it('falls back to the built-in publication file', async () => {
    const report = await build(resolved({ publication: undefined }));
    expect(report.publication).toBe(templateFiles().publication);
    expect(engine.requests[0]?.publication).toBe(templateFiles().publication);
  });

  it('puts diagrams under generated-assets when the publication names no directory', async () => {
    await writeFiles(root, { 'publication/publication.ptx': '<publication/>' });
    await build(resolved(), { diagrams: true, onlyAssets: true });
    expect(engine.diagramRequests[0]?.output).toBe(
      path.join(root, 'generated-assets', 'latex-image'),
    );
  });

  it('stops before the engine when the source is malformed', async () => {
    await writeFiles(root, { 'source/main.ptx': '<pretext><p></pretext>' });
    await expect(build(resolved())).rejects.toBeInstanceOf(XmlSyntaxError);
    expect(engine.calls).toEqual([]);
    expect(existsSync(path.join(root, 'output', 'web', 'stale.html'))).toBe(
      true,
    );
  });
});
