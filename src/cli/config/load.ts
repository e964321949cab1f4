/* src/cli/config/load.ts
 * Locate and validate ptx.config.* (nearest first, walking up from cwd).
 */
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import YAML from 'yaml';
import { ZodError } from 'zod';

import { ExitCode, FatalError, messageOf } from '../../runner/errors';
import { debugFallback } from '../../runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_MISSING } from '../../runner/util/debug-scopes';
import { type CliConfig, cliConfigSchema } from './schema';

export const CONFIG_FILE_NAMES = [
  'ptx.config.yml',
  'ptx.config.yaml',
  'ptx.config.json',
] as const;

/** Absolute path of the nearest ptx.config.*, or null when none exists. */
export const findConfigPathSync = (cwd: string): string | null => {
  let cur = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(cur, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

/** JSON for *.json, YAML otherwise. An empty YAML document reads as \{\}. */
const parseConfigText = (file: string, text: string): unknown => {
  const data: unknown = file.endsWith('.json')
    ? JSON.parse(text)
    : YAML.parse(text);
  return data ?? {};
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : messageOf(e);

export type LoadedCliConfig = CliConfig & {
  /** Absolute path of the file the values came from (absent for built-ins). */
  path?: string;
};

/** Load and validate the CLI config synchronously; built-ins when absent. */
export const loadCliConfigSync = (cwd: string): LoadedCliConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) {
    debugFallback(DBG_SCOPE_CLI_CONFIG_MISSING, `no config above ${cwd}`);
    return {};
  }
  const rel = cfgPath.replace(/\\/g, '/');
  let raw: unknown;
  try {
    raw = parseConfigText(cfgPath, readFileSync(cfgPath, 'utf8'));
  } catch (e) {
    throw new FatalError(
      `unable to parse ${rel}: ${messageOf(e)}`,
      ExitCode.InvalidInput,
    );
  }
  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FatalError(
      `invalid config in ${rel}\n${formatZodError(parsed.error)}`,
      ExitCode.InvalidInput,
    );
  }
  return { ...parsed.data, path: cfgPath };
};
