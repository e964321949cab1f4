// src/runner/publish/git.ts
import {
  type CommandResult,
  type CommandRunner,
  runCommand,
  tailOf,
} from '../engine/exec';
import { FatalError, messageOf } from '../errors';
import { log } from '../util/log';

export type Git = {
  /** Run git; resolves with the result whatever the exit code. */
  run: (...args: string[]) => Promise<CommandResult>;
  /** Run git; a non-zero exit is fatal. */
  must: (...args: string[]) => Promise<string>;
};

export const createGit = (
  cwd: string,
  runner: CommandRunner = runCommand,
): Git => {
  const run = async (...args: string[]): Promise<CommandResult> => {
    log.debug(`git ${args.join(' ')}`);
    try {
      return await runner('git', args, { cwd });
    } catch (e) {
      throw new FatalError(`unable to run git: ${messageOf(e)}`);
    }
  };
  const must = async (...args: string[]): Promise<string> => {
    const res = await run(...args);
    if (res.code !== 0) {
      throw new FatalError(
        `git ${args.join(' ')} failed (exit ${String(res.code)})\n${tailOf(res)}`,
      );
    }
    return res.stdout.trim();
  };
  return { run, must };
};

/**
 * GitHub Pages URL for an origin remote, when the remote is on GitHub.
 * Accepts https and ssh forms.
 */
export const pagesUrlFor = (remote: string): string | null => {
  const m =
    /github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/i.exec(remote.trim());
  if (!m) return null;
  const [, owner, repo] = m;
  if (owner === undefined || repo === undefined) return null;
  const user = owner.toLowerCase();
  return repo.toLowerCase() === `${user}.github.io`
    ? `https://${user}.github.io/`
    : `https://${user}.github.io/${repo}/`;
};
