/* src/runner/view/server.ts
 * Minimal static file server for previewing built output.
 */
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from 'node:http';
import type { AddressInfo } from 'node:net';
import path from 'node:path';

import type { AccessMode } from '../../cli/config/schema';
import { FatalError, messageOf } from '../errors';
import { log } from '../util/log';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.xml': 'application/xml; charset=utf-8',
  '.ptx': 'application/xml; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.ico': 'image/x-icon',
  '.pdf': 'application/pdf',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
};

export const contentTypeOf = (file: string): string =>
  CONTENT_TYPES[path.extname(file).toLowerCase()] ?? 'application/octet-stream';

/** Bind address for an access mode. */
export const hostFor = (access: AccessMode): string =>
  access === 'public' ? '0.0.0.0' : 'localhost';

/**
 * Map a request path onto a file below `root`.
 * Returns null when the path escapes `root` or cannot be decoded.
 */
export const resolveRequestPath = (
  root: string,
  urlPath: string,
): string | null => {
  let decoded: string;
  try {
    decoded = decodeURIComponent(urlPath.split('?')[0] ?? '/');
  } catch {
    return null;
  }
  if (decoded.includes('\0')) return null;
  const base = path.resolve(root);
  const abs = path.resolve(base, `.${path.posix.normalize(`/${decoded}`)}`);
  if (abs !== base && !abs.startsWith(base + path.sep)) return null;
  return abs;
};

const send = (res: ServerResponse, status: number, body: string): void => {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(body);
};

const handler =
  (root: string) =>
  async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const target = resolveRequestPath(root, req.url ?? '/');
    if (target === null) {
      send(res, 403, 'forbidden');
      return;
    }
    let file = target;
    try {
      let s = await stat(file);
      if (s.isDirectory()) {
        file = path.join(file, 'index.html');
        s = await stat(file);
      }
      if (!s.isFile()) {
        send(res, 404, 'not found');
        return;
      }
      res.writeHead(200, {
        'Content-Type': contentTypeOf(file),
        'Content-Length': s.size,
        'Cache-Control': 'no-store',
      });
      if (req.method === 'HEAD') {
        res.end();
        return;
      }
      const stream = createReadStream(file);
      stream.on('error', (e) => {
        log.error(`preview server: ${messageOf(e)}`);
        res.destroy();
      });
      stream.pipe(res);
    } catch {
      send(res, 404, 'not found');
    }
    log.debug(`${req.method ?? 'GET'} ${req.url ?? '/'}`);
  };

export type PreviewServer = {
  /** Port actually bound (useful when 0 was requested). */
  port: number;
  host: string;
  close: () => Promise<void>;
};

/** Serve `directory`; resolves once listening. */
export const startPreviewServer = (opts: {
  directory: string;
  access: AccessMode;
  port: number;
}): Promise<PreviewServer> => {
  const host = hostFor(opts.access);
  const onRequest = handler(opts.directory);
  const server = createServer((req, res) => {
    onRequest(req, res).catch((e: unknown) => {
      log.error(`preview server: ${messageOf(e)}`);
      if (!res.headersSent) send(res, 500, 'internal error');
      else res.destroy();
    });
  });
  return new Promise<PreviewServer>((resolveP, rejectP) => {
    server.once('error', (e) => {
      rejectP(
        'code' in e && e.code === 'EADDRINUSE'
          ? new FatalError(
              `port ${String(opts.port)} is already in use; choose another with -p`,
            )
          : e,
      );
    });
    server.listen(opts.port, host, () => {
      const addr = server.address();
      const port = isAddressInfo(addr) ? addr.port : opts.port;
      resolveP({
        port,
        host,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
};

const isAddressInfo = (v: unknown): v is AddressInfo =>
  typeof v === 'object' && v !== null && 'port' in v;
