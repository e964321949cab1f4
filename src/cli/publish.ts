/** src/cli/publish.ts
 * "ptx publish" subcommand (CLI adapter).
 */
import type { Command } from 'commander';

import { performPublish } from '../runner/publish/service';

import { applyCliSafety } from './cli-utils';

export function registerPublish(cli: Command): Command {
  const sub = cli
    .command('publish')
    .summary('Publish an HTML target on GitHub Pages.')
    .description(
      [
        'Automate HTML publication of TARGET on GitHub Pages, making the built document available to the public.',
        'Requires the project to be under Git version control with an "origin" remote configured for GitHub Pages.',
        'Published files live in the docs/ folder of the project.',
      ].join('\n'),
    )
    .argument('[target]', 'name of the target to publish');
  applyCliSafety(sub);

  sub.action(async (target: string | undefined) => {
    await performPublish({ cwd: process.cwd(), target });
  });

  return cli;
}
