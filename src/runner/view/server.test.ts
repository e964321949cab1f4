import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { isFatalError } from '../errors';
import { makeTempDir, rmDirWithRetries, writeFiles } from '../../test';

import { previewUrls } from './network';
import {
  contentTypeOf,
  hostFor,
  type PreviewServer,
  resolveRequestPath,
  startPreviewServer,
} from './server';

describe('request paths', () => {
  const root = path.resolve('/srv/site');

  it('maps URL paths below the root', () => {
    expect(resolveRequestPath(root, '/ch-one.html?x=1')).toBe(
      path.join(root, 'ch-one.html'),
    );
    expect(resolveRequestPath(root, '/images/a%20b.png')).toBe(
      path.join(root, 'images', 'a b.png'),
    );
    expect(resolveRequestPath(root, '/')).toBe(root);
  });

  it('keeps dot segments inside the root', () => {
    expect(resolveRequestPath(root, '/../../etc/passwd')).toBe(
      path.join(root, 'etc', 'passwd'),
    );
  });

  it('rejects undecodable paths', () => {
    expect(resolveRequestPath(root, '/%E0%A4%A')).toBeNull();
    expect(resolveRequestPath(root, '/a%00b')).toBeNull();
  });
});

describe('content types and hosts', () => {
  it('maps extensions case-insensitively', () => {
    expect(contentTypeOf('fig.SVG')).toBe('image/svg+xml');
    expect(contentTypeOf('index.html')).toBe('text/html; charset=utf-8');
    expect(contentTypeOf('data.bin')).toBe('application/octet-stream');
  });

  it('binds public servers on all interfaces', () => {
    expect(hostFor('public')).toBe('0.0.0.0');
    expect(hostFor('private')).toBe('localhost');
  });

  it('lists network addresses only in public mode', () => {
    expect(previewUrls('private', 8000, ['192.168.1.20'])).toEqual([
      'http://localhost:8000',
    ]);
    expect(previewUrls('public', 8128, ['192.168.1.20'])).toEqual([
      'http://localhost:8128',
      'http://192.168.1.20:8128',
    ]);
  });
});

describe('startPreviewServer', () => {
  let dir: string;
  let server: PreviewServer | undefined;

  beforeEach(async () => {
    dir = await makeTempDir('ptx-serve-');
    await writeFiles(dir, {
      'index.html': '<h1>Home</h1>',
      'sec/index.html': '<h1>Section</h1>',
      'style.css': 'body{}',
    });
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    await rmDirWithRetries(dir);
  });

  const get = async (p: string) => {
    if (!server) throw new Error('server not started');
    return fetch(`http://localhost:${String(server.port)}${p}`);
  };

  it('serves files and directory index pages', async () => {
    server = await startPreviewServer({
      directory: dir,
      access: 'private',
      port: 0,
    });
    const home = await get('/');
    expect(home.status).toBe(200);
    expect(await home.text()).toBe('<h1>Home</h1>');
    const section = await get('/sec/');
    expect(await section.text()).toBe('<h1>Section</h1>');
    const css = await get('/style.css');
    expect(css.headers.get('content-type')).toBe('text/css; charset=utf-8');
  });

  it('answers 404 for missing files and 403 for bad paths', async () => {
    server = await startPreviewServer({
      directory: dir,
      access: 'private',
      port: 0,
    });
    expect((await get('/missing.html')).status).toBe(404);
    expect((await get('/%E0%A4%A')).status).toBe(403);
  });

  it('fails with a hint when the port is taken', async () => {
    server = await startPreviewServer({
      directory: dir,
      access: 'private',
      port: 0,
    });
    const err = await startPreviewServer({
      directory: dir,
      access: 'private',
      port: server.port,
    }).catch((e: unknown) => e);
    expect(isFatalError(err)).toBe(true);
    expect(isFatalError(err) && err.message).toBe(
      `port ${String(server.port)} is already in use; choose another with -p`,
    );
  });
});
