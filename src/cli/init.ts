/** src/cli/init.ts
 * "ptx init" subcommand (CLI adapter).
 */
import type { Command } from 'commander';

import { performInit } from '../runner/scaffold/init';

import { applyCliSafety } from './cli-utils';

/**
 * Register the `init` subcommand on the provided root CLI.
 *
 * @param cli - Commander root command.
 * @returns The same root command for chaining.
 */
export function registerInit(cli: Command): Command {
  const sub = cli
    .command('init')
    .summary('Generate the project manifest in the current directory.')
    .description(
      'Generate the project manifest (project.ptx) in the current directory. Mainly intended for updating existing projects to use this CLI.',
    );
  applyCliSafety(sub);

  sub.action(async () => {
    await performInit(process.cwd());
  });

  return cli;
}
