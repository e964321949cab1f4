#!/usr/bin/env -S node --import tsx
// src/cli/bin/ptx.ts
// CLI bootstrap (executes the parser and maps failures to exit codes).
import { CommanderError } from 'commander';

import { ExitCode, isFatalError, messageOf } from '../../runner/errors';
import { log } from '../../runner/util/log';
import { makeCli } from '../index';

const main = async (): Promise<void> => {
  // makeCli reads ptx.config.* for option defaults, so it can throw too.
  await makeCli().parseAsync();
};

main().catch((e: unknown) => {
  if (isFatalError(e)) {
    log.critical(e.message);
    process.exitCode = e.exitCode;
  } else if (e instanceof CommanderError) {
    // Commander has already printed the usage error.
    process.exitCode = e.exitCode;
  } else {
    log.critical(`internal error: ${messageOf(e)}`);
    if (e instanceof Error && e.stack) log.debug(e.stack);
    process.exitCode = ExitCode.InternalError;
  }
});
