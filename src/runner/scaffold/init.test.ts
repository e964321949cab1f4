import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { templateFiles } from '../paths';
import { captureLogs, makeTempDir, rmDirWithRetries, writeFiles } from '../../test';

import { performInit } from './init';

describe('performInit', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('ptx-init-');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('writes the manifest template into the directory', async () => {
    const manifest = await performInit(dir);
    expect(manifest).toBe(path.join(dir, 'project.ptx'));
    expect(await readFile(path.join(dir, 'project.ptx'), 'utf8')).toBe(
      await readFile(templateFiles().manifest, 'utf8'),
    );
  });

  it('leaves an existing project alone', async () => {
    const logs = captureLogs();
    await writeFiles(dir, { 'project.ptx': '<project/>', 'source/.keep': '' });
    expect(await performInit(path.join(dir, 'source'))).toBeNull();
    expect(logs.err).toEqual([
      `ptx: warning: A project already exists in \`${dir}\`.`,
      'ptx: warning: No project manifest will be generated.',
    ]);
    expect(await readFile(path.join(dir, 'project.ptx'), 'utf8')).toBe(
      '<project/>',
    );
  });
});
