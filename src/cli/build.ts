/** src/cli/build.ts
 * "ptx build" subcommand (CLI adapter over runner/build).
 */
import { type Command, Option } from 'commander';

import type { DiagramFormat } from './config/schema';
import { performBuild } from '../runner/build';

import {
  applyCliSafety,
  buildDefaults,
  collect,
  parseDiagramFormat,
} from './cli-utils';

type BuildCliOptions = {
  input?: string;
  output?: string;
  publication?: string;
  param: string[];
  diagrams?: boolean;
  diagramsFormat: DiagramFormat;
  webwork?: boolean;
  onlyAssets?: boolean;
  pdf?: boolean;
};

/**
 * Register the `build` subcommand on the provided root CLI.
 *
 * @param cli - Commander root command.
 * @returns The same root command for chaining.
 */
export function registerBuild(cli: Command): Command {
  const defaults = buildDefaults();
  const sub = cli
    .command('build')
    .summary('Build specified target')
    .description(
      [
        'Process source files into the format of TARGET (a <target/> of project.ptx).',
        '',
        'For html, images coded in source (latex-image, etc.) are only processed with --diagrams.',
        'If the project includes WeBWorK exercises, these must be processed with --webwork.',
      ].join('\n'),
    )
    .argument('[target]', 'name of the target to build');
  applyCliSafety(sub);

  sub
    .option('-i, --input <file>', 'path to main source file')
    .option('-o, --output <dir>', 'path to main output directory')
    .option(
      '-p, --publication <file>',
      'publication file, with path relative to the project root',
    )
    .option(
      '--param <key:value>',
      'define a string parameter to use during processing (repeatable), e.g. --param foo:bar --param baz:woo',
      collect,
      [],
    )
    .option(
      '-d, --diagrams',
      'regenerate images coded in source (latex-image, asymptote, sageplot)',
    )
    .addOption(
      new Option(
        '-f, --diagrams-format <format>',
        'output format for generated images (svg, pdf, eps, tex)',
      )
        .argParser(parseDiagramFormat)
        .default(defaults.diagramsFormat),
    )
    .option(
      '-w, --webwork',
      'reprocess WeBWorK exercises, creating a fresh webwork-representations.ptx file',
    )
    .option(
      '-a, --only-assets',
      'produce requested diagrams (-d) or webwork (-w) but not the main build target',
    )
    .option('--pdf', 'compile LaTeX output to PDF with the configured compiler');

  sub.action(async (target: string | undefined, opts: BuildCliOptions) => {
    await performBuild(
      process.cwd(),
      {
        target,
        source: opts.input,
        output: opts.output,
        publication: opts.publication,
        params: opts.param,
      },
      {
        diagrams: Boolean(opts.diagrams),
        diagramsFormat: opts.diagramsFormat,
        webwork: Boolean(opts.webwork),
        onlyAssets: Boolean(opts.onlyAssets),
        pdf: Boolean(opts.pdf),
      },
    );
  });

  return cli;
}
