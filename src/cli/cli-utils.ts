/** Shared Commander helpers for the ptx CLI.
 * DRY the repeated exitOverride + parse normalization across subcommands.
 */
import { type Command, InvalidArgumentError, type Option } from 'commander';

import { loadCliConfigSync } from './config/load';
import {
  ACCESS_MODES,
  type AccessMode,
  DIAGRAM_FORMATS,
  type DiagramFormat,
} from './config/schema';
import { type LogLevel, parseLogLevel } from '../runner/util/log';

const cwdSafe = (): string => {
  try {
    return process.cwd();
  } catch {
    return '.';
  }
};

/** Commander error codes that are not failures. */
const BENIGN_EXITS = new Set<string>([
  'commander.helpDisplayed',
  'commander.help',
  'commander.version',
]);

/** Throw Commander exits instead of calling process.exit; benign ones are swallowed. */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    if (BENIGN_EXITS.has(err.code)) return;
    throw err;
  });
};

/** Apply the exit override to a command. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
}

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Commander collector for repeatable options. */
export const collect = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

export const oneOf =
  <T extends string>(label: string, values: readonly T[]) =>
  (raw: string): T => {
    const v = raw.trim().toLowerCase();
    const hit = values.find((x) => x === v);
    if (hit === undefined) {
      throw new InvalidArgumentError(
        `${label} must be one of ${values.join(', ')}.`,
      );
    }
    return hit;
  };

export const parseDiagramFormat = oneOf<DiagramFormat>(
  'Diagram format',
  DIAGRAM_FORMATS,
);
export const parseAccess = oneOf<AccessMode>('Access', ACCESS_MODES);

export const parseVerbosity = (raw: string): LogLevel => {
  const level = parseLogLevel(raw);
  if (level === undefined) {
    throw new InvalidArgumentError(
      'Verbosity must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL.',
    );
  }
  return level;
};

export const parsePort = (raw: string): number => {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1 || n > 65535) {
    throw new InvalidArgumentError('Port must be an integer from 1 to 65535.');
  }
  return n;
};

/** Root-level defaults from config or built-ins. */
export const rootDefaults = (
  dir = cwdSafe(),
): { verbosity?: LogLevel; boring: boolean } => {
  const d = loadCliConfigSync(dir).cliDefaults;
  return { verbosity: d?.verbosity, boring: d?.boring ?? false };
};

/** Build-phase defaults merged from config over built-ins. */
export const buildDefaults = (
  dir = cwdSafe(),
): { diagramsFormat: DiagramFormat } => ({
  diagramsFormat:
    loadCliConfigSync(dir).cliDefaults?.build?.diagramsFormat ?? 'svg',
});

/** View-phase defaults merged from config over built-ins. */
export const viewDefaults = (
  dir = cwdSafe(),
): { access: AccessMode; port: number } => {
  const v = loadCliConfigSync(dir).cliDefaults?.view;
  return { access: v?.access ?? 'private', port: v?.port ?? 8000 };
};
