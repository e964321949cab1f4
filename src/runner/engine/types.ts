// src/runner/engine/types.ts
import type { DiagramFormat } from '../../cli/config/schema';
import type { StringParams } from '../project/types';

/** Elements whose images the engine regenerates with --diagrams. */
export const DIAGRAM_KINDS = ['latex-image', 'asymptote', 'sageplot'] as const;
export type DiagramKind = (typeof DIAGRAM_KINDS)[number];

export type EngineRequest = {
  /** Absolute path of the main source file. */
  source: string;
  /** Absolute path of the publication file. */
  publication: string;
  /** Absolute destination directory. */
  output: string;
  params: StringParams;
};

export type DiagramRequest = EngineRequest & {
  kind: DiagramKind;
  format: DiagramFormat;
};

export type WebworkRequest = EngineRequest & {
  server: string;
};

/** The external transformation engine, as seen from the CLI. */
export interface TransformEngine {
  /** Write the HTML rendering into `output`. */
  html(req: EngineRequest): Promise<void>;
  /** Write the LaTeX rendering into `output`; returns the .tex path. */
  latex(req: EngineRequest): Promise<string>;
  /** Compile a .tex file in place; returns the .pdf path. */
  compileLatex(texFile: string): Promise<string>;
  /** LaTeX rendering followed by compilation; returns the .pdf path. */
  pdf(req: EngineRequest): Promise<string>;
  /** Regenerate images of one kind into `output`. */
  diagrams(req: DiagramRequest): Promise<void>;
  /** Fetch WeBWorK representations into `output`; returns the written file. */
  webwork(req: WebworkRequest): Promise<string>;
}
