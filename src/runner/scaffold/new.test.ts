import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import JSZip from 'jszip';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { captureLogs, makeTempDir, rmDirWithRetries, writeFiles } from '../../test';

import { templateFiles } from '../paths';

import {
  entryDestination,
  extractTemplateArchive,
  findTemplateRoot,
} from './archive';
import { performNew } from './new';

const zipOf = async (files: Record<string, string>): Promise<Uint8Array> => {
  const zip = new JSZip();
  for (const [name, text] of Object.entries(files)) zip.file(name, text);
  return zip.generateAsync({ type: 'uint8array' });
};

describe('findTemplateRoot', () => {
  it('uses the directory of the first project.ptx', () => {
    expect(
      findTemplateRoot([
        'tpl-main/',
        'tpl-main/README.md',
        'tpl-main/project.ptx',
        'tpl-main/extra/project.ptx',
      ]),
    ).toBe('tpl-main/');
    expect(findTemplateRoot(['project.ptx', 'source/main.ptx'])).toBe('');
    expect(findTemplateRoot(['README.md'])).toBeNull();
  });
});

describe('entryDestination', () => {
  const root = path.resolve('/tmp/ptx-project');

  it('resolves entries below the root', () => {
    expect(entryDestination(root, 'source/main.ptx')).toBe(
      path.join(root, 'source', 'main.ptx'),
    );
  });

  it('rejects entries that escape the root', () => {
    expect(() => entryDestination(root, '../evil.txt')).toThrow(
      'template entry "../evil.txt" escapes the project directory',
    );
    expect(() =>
      entryDestination(root, 'a/../../ptx-project-sibling/x', 'tpl/a/../../x'),
    ).toThrow('template entry "tpl/a/../../x" escapes the project directory');
  });
});

describe('performNew', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('ptx-new-');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('copies the built-in book template into the default directory', async () => {
    const logs = captureLogs();
    const dest = await performNew({ cwd: dir });
    expect(dest).toBe(path.join(dir, 'new-pretext-project'));
    expect(existsSync(path.join(dir, 'new-pretext-project', 'project.ptx'))).toBe(
      true,
    );
    expect(
      existsSync(path.join(dir, 'new-pretext-project', 'source', 'main.ptx')),
    ).toBe(true);
    expect(logs.out[0]).toBe(
      `ptx: Generating new project in \`${path.join(dir, 'new-pretext-project')}\` using \`book\` template.`,
    );
  });

  it('copies the article template into a named directory', async () => {
    const dest = await performNew({
      cwd: dir,
      template: 'article',
      directory: 'paper',
    });
    expect(dest).toBe(path.join(dir, 'paper'));
    const main = await readFile(path.join(dir, 'paper', 'source', 'main.ptx'), 'utf8');
    expect(main).toContain('<article xml:id="my-article">');
  });

  it('overwrites template files and keeps the rest of the directory', async () => {
    const dest = path.join(dir, 'new-pretext-project');
    await writeFiles(dest, {
      'source/main.ptx': 'old draft',
      'notes.txt': 'mine',
    });
    await performNew({ cwd: dir });
    expect(await readFile(path.join(dest, 'source', 'main.ptx'), 'utf8')).toBe(
      await readFile(
        path.join(templateFiles().project('book'), 'source', 'main.ptx'),
        'utf8',
      ),
    );
    expect(await readFile(path.join(dest, 'notes.txt'), 'utf8')).toBe('mine');
  });

  it('writes nothing inside an existing project', async () => {
    const logs = captureLogs();
    await writeFiles(dir, { 'project.ptx': '<project/>' });
    expect(await performNew({ cwd: dir, directory: 'inner' })).toBeNull();
    expect(existsSync(path.join(dir, 'inner'))).toBe(false);
    expect(logs.err).toEqual([
      `ptx: warning: A project already exists in \`${dir}\`.`,
      'ptx: warning: No new project will be generated.',
    ]);
  });

  it('extracts a downloaded template below its project.ptx', async () => {
    const data = await zipOf({
      'tpl-main/project.ptx': '<project/>',
      'tpl-main/source/main.ptx': '<pretext/>',
      'other/notes.txt': 'outside the template',
    });
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(data));
    const dest = await performNew({
      cwd: dir,
      directory: 'from-url',
      urlTemplate: 'https://example.org/template.zip',
      fetchImpl,
    });
    expect(fetchImpl).toHaveBeenCalledWith('https://example.org/template.zip');
    expect(dest).toBe(path.join(dir, 'from-url'));
    expect(
      await readFile(path.join(dir, 'from-url', 'source', 'main.ptx'), 'utf8'),
    ).toBe('<pretext/>');
    expect(existsSync(path.join(dir, 'from-url', 'other'))).toBe(false);
  });

  it('fails on an unsuccessful download', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response('missing', { status: 404 }),
    );
    await expect(
      performNew({
        cwd: dir,
        urlTemplate: 'https://example.org/none.zip',
        fetchImpl,
      }),
    ).rejects.toThrow('unable to download https://example.org/none.zip: HTTP 404');
  });
});

describe('extractTemplateArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('ptx-zip-');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('returns the relative paths it wrote', async () => {
    const data = await zipOf({
      'project.ptx': '<project/>',
      'publication/publication.ptx': '<publication/>',
    });
    expect(await extractTemplateArchive(data, dir)).toEqual([
      'project.ptx',
      'publication/publication.ptx',
    ]);
  });

  it('rejects archives without a manifest', async () => {
    const data = await zipOf({ 'README.md': 'hello' });
    await expect(extractTemplateArchive(data, dir)).rejects.toThrow(
      'template archive contains no project.ptx',
    );
  });

  it('rejects data that is not a zip archive', async () => {
    await expect(
      extractTemplateArchive(new TextEncoder().encode('plain text'), dir),
    ).rejects.toThrow(/^template is not a zip archive/);
  });
});
