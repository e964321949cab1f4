/* src/runner/util/log.ts
 * Leveled console logger. Every line is prefixed "ptx:"; warnings and above
 * go to stderr so build output on stdout stays clean.
 */
import { dim, error, strong, warn } from './color';

export const LOG_LEVELS = [
  'debug',
  'info',
  'warning',
  'error',
  'critical',
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

/** Parse a level name case-insensitively ("WARN" is accepted for warning). */
export const parseLogLevel = (raw: unknown): LogLevel | undefined => {
  if (typeof raw !== 'string') return undefined;
  const s = raw.trim().toLowerCase();
  if (s === 'warn') return 'warning';
  return LOG_LEVELS.find((l) => l === s);
};

let explicit: LogLevel | undefined;

/** Set the threshold; undefined falls back to PTX_VERBOSITY, then info. */
export const setLogLevel = (level: LogLevel | undefined): void => {
  explicit = level;
};

export const getLogLevel = (): LogLevel =>
  explicit ?? parseLogLevel(process.env.PTX_VERBOSITY) ?? 'info';

export const isLevelEnabled = (level: LogLevel): boolean =>
  RANK[level] >= RANK[getLogLevel()];

const TAGS: Record<LogLevel, (s: string) => string> = {
  debug: (s) => dim(s),
  info: (s) => s,
  warning: (s) => warn(s),
  error: (s) => error(s),
  critical: (s) => strong(error(s)),
};

const emit = (level: LogLevel, message: string): void => {
  if (!isLevelEnabled(level)) return;
  const tag = level === 'info' ? '' : TAGS[level](`${level}: `);
  const line = `ptx: ${tag}${message}`;
  if (RANK[level] >= RANK.warning) console.error(line);
  else console.log(line);
};

export const log = {
  debug: (message: string): void => emit('debug', message),
  info: (message: string): void => emit('info', message),
  warning: (message: string): void => emit('warning', message),
  error: (message: string): void => emit('error', message),
  critical: (message: string): void => emit('critical', message),
};
