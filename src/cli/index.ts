/* src/cli/index.ts
 * Root CLI factory for the "ptx" tool.
 * - Registers subcommands: new, init, build, view, publish.
 * - Resolves verbosity and color before any subcommand action.
 * - Never calls process.exit (exitOverride); the binary maps errors to exit codes.
 */
import { Command, Option } from 'commander';

import { findProjectRootSync } from '../runner/project/locate';
import { log, parseLogLevel, setLogLevel } from '../runner/util/log';
import { getVersion } from '../runner/version';

import { registerBuild } from './build';
import {
  applyCliSafety,
  parseVerbosity,
  rootDefaults,
  tagDefault,
} from './cli-utils';
import { registerInit } from './init';
import { registerNew } from './new';
import { registerPublish } from './publish';
import { registerView } from './view';

/**
 * Build the root CLI (`ptx`) without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const { boring: boringDefault } = rootDefaults();
  const cli = new Command();

  cli
    .name('ptx')
    .description(
      'Command line tools for quickly creating, authoring, building, previewing and publishing PreTeXt documents.',
    )
    .version(getVersion(), '-V, --version');

  cli.addOption(
    new Option(
      '-v, --verbosity <level>',
      'severity of messages shown: DEBUG for all; CRITICAL for almost none. ERROR, WARNING, or INFO (default) are also options.',
    ).argParser(parseVerbosity),
  );

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  applyCliSafety(cli);

  // Flags > environment > config > built-ins, applied before any action.
  cli.hook('preAction', (thisCommand) => {
    const cwd = process.cwd();
    const opts = thisCommand.opts<{
      verbosity?: ReturnType<typeof parseVerbosity>;
      boring?: boolean;
    }>();
    const defaults = rootDefaults(cwd);

    if (opts.verbosity !== undefined) setLogLevel(opts.verbosity);
    else if (parseLogLevel(process.env.PTX_VERBOSITY) !== undefined)
      setLogLevel(undefined);
    else setLogLevel(defaults.verbosity);

    const boring =
      thisCommand.getOptionValueSource('boring') === 'cli'
        ? Boolean(opts.boring)
        : defaults.boring;
    if (boring) process.env.PTX_BORING = '1';
    else delete process.env.PTX_BORING;

    const root = findProjectRootSync(cwd);
    if (root !== null) log.info(`Project found in \`${root}\`.`);
  });

  registerNew(cli);
  registerInit(cli);
  registerBuild(cli);
  registerView(cli);
  registerPublish(cli);

  // Root action: print help without invoking .help() (which exits).
  cli.action(() => {
    console.log(cli.helpInformation());
  });

  return cli;
};
