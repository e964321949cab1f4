/* src/runner/errors.ts
 * Fatal conditions that stop a command. The binary prints the message and
 * exits with the carried code; everything recoverable is a log warning.
 */

export const ExitCode = {
  Success: 0,
  Fatal: 1,
  InvalidInput: 2,
  InternalError: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class FatalError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCode.Fatal) {
    super(message);
    this.name = 'FatalError';
    this.exitCode = exitCode;
  }
}

export const isFatalError = (e: unknown): e is FatalError =>
  e instanceof FatalError;

/** Message text of any thrown value. */
export const messageOf = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
