/* src/runner/engine/exec.ts
 * Subprocess execution for engine tools and git: output capture, optional
 * echo at debug verbosity, inactivity timeout with kill escalation.
 */
import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import treeKill from 'tree-kill';

import { isLevelEnabled } from '../util/log';

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  /** Seconds without output before SIGTERM (0/undefined = never). */
  timeout?: number;
  /** Seconds between SIGTERM and SIGKILL of the process tree. */
  killGrace?: number;
};

/** Shape shared by the real runner and test fakes. */
export type CommandRunner = (
  cmd: string,
  args: readonly string[],
  opts?: CommandOptions,
) => Promise<CommandResult>;

/** Last `n` non-empty lines of combined output, for error messages. */
export const tailOf = (result: CommandResult, n = 10): string =>
  `${result.stdout}\n${result.stderr}`
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0)
    .slice(-n)
    .join('\n');

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals),
);

/** Shell-style exit status: the code, or 128 + signal number when killed. */
export const exitStatusOf = (
  code: number | null,
  signal: NodeJS.Signals | null,
): number => {
  if (code !== null) return code;
  const n = signal === null ? undefined : SIGNAL_NUMBERS.get(signal);
  return n === undefined ? 1 : 128 + n;
};

/** Run `cmd` with `args` (no shell). Rejects only when the process cannot start. */
export const runCommand: CommandRunner = async (cmd, args, opts = {}) => {
  const child = spawn(cmd, [...args], {
    cwd: opts.cwd,
    windowsHide: true,
    env: process.env,
  });

  const echo = isLevelEnabled('debug');
  let stdout = '';
  let stderr = '';
  let lastActivity = Date.now();
  let terminated = false;
  let interval: NodeJS.Timeout | undefined;
  let killTimer: NodeJS.Timeout | undefined;

  child.stdout.on('data', (d: Buffer) => {
    stdout += d.toString('utf8');
    if (echo) process.stdout.write(d);
    lastActivity = Date.now();
  });
  child.stderr.on('data', (d: Buffer) => {
    stderr += d.toString('utf8');
    if (echo) process.stderr.write(d);
    lastActivity = Date.now();
  });

  const timeoutSec =
    typeof opts.timeout === 'number' && opts.timeout > 0 ? opts.timeout : 0;
  const graceSec =
    typeof opts.killGrace === 'number' && opts.killGrace > 0
      ? opts.killGrace
      : 10;
  if (timeoutSec > 0) {
    interval = setInterval(() => {
      if (terminated || Date.now() - lastActivity < timeoutSec * 1000) return;
      terminated = true;
      if (typeof child.pid === 'number') child.kill('SIGTERM');
      stderr += `\nptx: ${cmd} produced no output for ${String(timeoutSec)}s; terminated\n`;
      killTimer = setTimeout(() => {
        const pid = child.pid;
        if (typeof pid !== 'number') return;
        treeKill(pid, 'SIGKILL', (err) => {
          // No process table to walk; kill the direct child at least.
          if (err) child.kill('SIGKILL');
        });
      }, graceSec * 1000);
    }, 1000);
  }

  try {
    const code = await new Promise<number>((resolveP, rejectP) => {
      child.on('error', (e) => rejectP(e));
      child.on('close', (c, sig) => resolveP(exitStatusOf(c, sig)));
    });
    return { code, stdout, stderr };
  } finally {
    if (interval) clearInterval(interval);
    if (killTimer) clearTimeout(killTimer);
  }
};
