import { describe, expect, it } from 'vitest';

import { exitStatusOf, runCommand } from './exec';

describe('exitStatusOf', () => {
  it('keeps a numeric exit code', () => {
    expect(exitStatusOf(0, null)).toBe(0);
    expect(exitStatusOf(3, null)).toBe(3);
  });

  it('maps a terminating signal to 128 + its number', () => {
    expect(exitStatusOf(null, 'SIGKILL')).toBe(137);
    expect(exitStatusOf(null, 'SIGTERM')).toBe(143);
  });

  it('never reports success without a code or signal', () => {
    expect(exitStatusOf(null, null)).toBe(1);
  });
});

describe('runCommand', () => {
  it('captures output and the exit code', async () => {
    const result = await runCommand('sh', [
      '-c',
      'echo out; echo err >&2; exit 3',
    ]);
    expect(result).toEqual({ code: 3, stdout: 'out\n', stderr: 'err\n' });
  });

  it('reports a process killed by a signal as a failure', async () => {
    const result = await runCommand('sh', ['-c', 'kill -9 $$']);
    expect(result.code).toBe(137);
  });

  it('rejects when the command cannot start', async () => {
    await expect(
      runCommand('ptx-test-no-such-command', []),
    ).rejects.toThrow(/ENOENT/);
  });

  it('terminates a silent process after the inactivity timeout', async () => {
    const result = await runCommand('sh', ['-c', 'exec sleep 30'], {
      timeout: 1,
    });
    expect(result.code).toBe(143);
    expect(result.stderr).toBe(
      '\nptx: sh produced no output for 1s; terminated\n',
    );
  }, 15_000);

  it('kills a process that ignores SIGTERM once the grace period ends', async () => {
    const result = await runCommand(
      'sh',
      ['-c', 'trap "" TERM; while :; do sleep 0.2; done'],
      { timeout: 1, killGrace: 1 },
    );
    expect(result.code).toBe(137);
    expect(result.stderr).toBe(
      '\nptx: sh produced no output for 1s; terminated\n',
    );
  }, 15_000);
});
