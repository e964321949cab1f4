/** src/cli/view.ts
 * "ptx view" subcommand (CLI adapter).
 */
import { type Command, Option } from 'commander';

import type { AccessMode } from './config/schema';
import { performView } from '../runner/view/service';

import {
  applyCliSafety,
  parseAccess,
  parsePort,
  viewDefaults,
} from './cli-utils';

export function registerView(cli: Command): Command {
  const defaults = viewDefaults();
  const sub = cli
    .command('view')
    .summary('Preview built documents in your browser.')
    .description(
      'Start a local server to preview built documents in your browser. TARGET is the name of a <target/> in project.ptx.',
    )
    .argument('[target]', 'name of the target to serve');
  applyCliSafety(sub);

  sub
    .addOption(
      new Option(
        '-a, --access <access>',
        'public lets other computers on your network reach the server by IP address; private binds localhost only',
      )
        .argParser(parseAccess)
        .default(defaults.access),
    )
    .addOption(
      new Option('-p, --port <port>', 'port for the local server')
        .argParser(parsePort)
        .default(defaults.port),
    )
    .option('-d, --directory <dir>', 'serve files from the given directory')
    .option(
      '-w, --watch',
      'rebuild the target when project files change (HTML targets only)',
    );

  sub.action(
    async (
      target: string | undefined,
      opts: {
        access: AccessMode;
        port: number;
        directory?: string;
        watch?: boolean;
      },
    ) => {
      await performView({
        cwd: process.cwd(),
        target,
        access: opts.access,
        port: opts.port,
        directory: opts.directory,
        watch: Boolean(opts.watch),
      });
    },
  );

  return cli;
}
