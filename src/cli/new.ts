/** src/cli/new.ts
 * "ptx new" subcommand (CLI adapter).
 */
import type { Command } from 'commander';

import {
  DEFAULT_PROJECT_DIRECTORY,
  performNew,
  PROJECT_TEMPLATES,
  type ProjectTemplate,
} from '../runner/scaffold/new';

import { applyCliSafety, oneOf } from './cli-utils';

const parseTemplate = oneOf<ProjectTemplate>('Template', PROJECT_TEMPLATES);

export function registerNew(cli: Command): Command {
  const sub = cli
    .command('new')
    .summary('Generate the necessary files for a new project.')
    .description(
      'Generate the necessary files for a new project. Supports "ptx new book" (default) and "ptx new article", or a zipped template with "ptx new --url-template <url>".',
    )
    .argument('[template]', 'book or article', parseTemplate, 'book');
  applyCliSafety(sub);

  sub
    .option(
      '-d, --directory <dir>',
      'directory to create/use for the project',
      DEFAULT_PROJECT_DIRECTORY,
    )
    .option('-u, --url-template <url>', 'download a zipped template from its URL');

  sub.action(
    async (
      template: ProjectTemplate,
      opts: { directory: string; urlTemplate?: string },
    ) => {
      await performNew({
        cwd: process.cwd(),
        template,
        directory: opts.directory,
        urlTemplate: opts.urlTemplate,
      });
    },
  );

  return cli;
}
