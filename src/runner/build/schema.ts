/* src/runner/build/schema.ts
 * RELAX NG validation through xmllint. Invalid source is a warning: the
 * engine often copes, and authors iterate on partially valid documents.
 */
import { existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  type CommandResult,
  type CommandRunner,
  runCommand,
} from '../engine/exec';
import type { EngineSettings } from '../engine/settings';
import { messageOf } from '../errors';
import { debugFallback } from '../util/debug';
import { DBG_SCOPE_BUILD_SCHEMA_SKIPPED } from '../util/debug-scopes';
import { log } from '../util/log';

/** Validation log written beside the project when the source is invalid. */
export const SCHEMA_LOG_FILE = '.error_schema.log';

export type SchemaOutcome = 'valid' | 'invalid' | 'skipped';

export const validateSchema = async (
  source: string,
  settings: Pick<EngineSettings, 'schema' | 'xmllint'>,
  logDir: string,
  runner: CommandRunner = runCommand,
): Promise<SchemaOutcome> => {
  const schema = settings.schema;
  if (!schema || !existsSync(schema)) {
    debugFallback(
      DBG_SCOPE_BUILD_SCHEMA_SKIPPED,
      schema ? `schema not found at ${schema}` : 'no schema configured',
    );
    return 'skipped';
  }
  let result: CommandResult;
  try {
    result = await runner(settings.xmllint, [
      '--noout',
      '--xinclude',
      '--relaxng',
      schema,
      source,
    ]);
  } catch (e) {
    debugFallback(
      DBG_SCOPE_BUILD_SCHEMA_SKIPPED,
      `unable to run ${settings.xmllint}: ${messageOf(e)}`,
    );
    return 'skipped';
  }
  const logFile = path.join(logDir, SCHEMA_LOG_FILE);
  if (result.code === 0) {
    log.info('Source passed schema validation.');
    await rm(logFile, { force: true });
    return 'valid';
  }
  await writeFile(logFile, `${result.stderr}${result.stdout}`, 'utf8');
  log.warning(
    `Source did not pass schema validation; unexpected output may result. See ${logFile} for hints. Continuing with build.`,
  );
  return 'invalid';
};
