import { createServer, type Server, type ServerResponse } from 'node:http';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';

import { FetchError } from '../errors.js';
import { DirectFetchStrategy } from './directFetch.js';

let server: Server;
let baseUrl: string;
const hanging: ServerResponse[] = [];

beforeAll(async () => {
  server = createServer((req, res) => {
    switch (req.url) {
      case '/file.zip':
        res.writeHead(200, {
          'Content-Type': 'application/zip',
          'Content-Disposition': 'attachment; filename="evidence.zip"',
        });
        res.end('PK-test-bytes');
        return;
      case '/raw/photo.jpg':
        res.writeHead(200, { 'Content-Type': 'image/jpeg' });
        res.end('jpeg-bytes');
        return;
      case '/redirect':
        res.writeHead(302, { Location: '/file.zip' });
        res.end();
        return;
      case '/loop':
        res.writeHead(302, { Location: '/loop' });
        res.end();
        return;
      case '/page':
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end('<html><body>Sign in</body></html>');
        return;
      case '/empty':
        res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Content-Length': '0' });
        res.end();
        return;
      case '/slow':
        hanging.push(res);
        return;
      default:
        res.writeHead(404, { 'Content-Type': 'text/plain' });
        res.end('missing');
    }
  });
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('test server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  for (const res of hanging) res.destroy();
  server.closeAllConnections();
  await new Promise<void>(resolve => server.close(() => resolve()));
});

describe('DirectFetchStrategy', () => {
  let dir: string;
  const strategy = new DirectFetchStrategy({ timeoutMs: 5_000 });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'direct-fetch-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const attempt = (path: string, s: DirectFetchStrategy = strategy) =>
    s.attempt({ url: `${baseUrl}${path}`, slot: 'Download Link', destinationDir: dir, filePrefix: 'link-01' });

  const failure = async (promise: Promise<unknown>): Promise<FetchError> => {
    try {
      await promise;
    } catch (error) {
      if (error instanceof FetchError) return error;
      throw error;
    }
    throw new Error('expected the fetch to fail');
  };

  it('should save the file under the Content-Disposition name', async () => {
    const file = await attempt('/file.zip');

    expect(file).toEqual({ localPath: join(dir, 'link-01-evidence.zip'), bytes: 13 });
    expect(await readFile(file.localPath, 'utf8')).toBe('PK-test-bytes');
  });

  it('should name the file after the URL path when no header is given', async () => {
    const file = await attempt('/raw/photo.jpg');

    expect(file.localPath).toBe(join(dir, 'link-01-photo.jpg'));
  });

  it('should follow redirects', async () => {
    const file = await attempt('/redirect');

    expect(file.localPath).toBe(join(dir, 'link-01-evidence.zip'));
  });

  it('should fail on an error status', async () => {
    const error = await failure(attempt('/missing'));

    expect(error.reason).toBe('http_status');
    expect(error.message).toBe('HTTP 404 Not Found');
  });

  it('should treat an HTML page as a failure and leave nothing behind', async () => {
    const error = await failure(attempt('/page'));

    expect(error.reason).toBe('html_page');
    expect(await readdir(dir)).toEqual([]);
  });

  it('should reject an empty body', async () => {
    const error = await failure(attempt('/empty'));

    expect(error.reason).toBe('empty_body');
    expect(await readdir(dir)).toEqual([]);
  });

  it('should report a redirect loop as a network failure', async () => {
    const error = await failure(attempt('/loop'));

    expect(error.reason).toBe('network');
    expect(error.message).toMatch(/^Redirect loop: /);
  });

  it('should time out on a server that never answers', async () => {
    const error = await failure(attempt('/slow', new DirectFetchStrategy({ timeoutMs: 200 })));

    expect(error.reason).toBe('timeout');
    expect(error.message).toBe('Timed out after 200ms');
  });
});
