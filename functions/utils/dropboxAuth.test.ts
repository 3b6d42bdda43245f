import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { DropboxAuth } from './dropboxAuth.js';
import { ConfigError } from './errors.js';

const ENCRYPTION_KEY = 'test-secret-test-secret-test-sec';

function tokenResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('DropboxAuth', () => {
  let dir: string;
  let tokenFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dropbox-auth-'));
    tokenFile = join(dir, '.dropbox_token');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should refuse to start without any token', async () => {
    await expect(
      DropboxAuth.load({ initial: { accessToken: null, refreshToken: null, expiresAt: null }, tokenFile }),
    ).rejects.toThrow(ConfigError);
  });

  it('should use a long-lived access token as-is', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const auth = await DropboxAuth.load({
      initial: { accessToken: 'test-token', refreshToken: null, expiresAt: null },
      fetchImpl,
    });

    expect(await auth.getAccessToken()).toBe('test-token');
    expect(auth.canRefresh()).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should refresh within a minute of expiry and persist the new token', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => tokenResponse({ access_token: 'new-token', expires_in: 14_400 }));
    const auth = await DropboxAuth.load({
      initial: { accessToken: 'old-token', refreshToken: 'test-refresh', expiresAt: 1_030_000 },
      appKey: 'test-key',
      appSecret: 'test-secret',
      tokenFile,
      fetchImpl,
      now: () => 1_000_000,
    });

    expect(await auth.getAccessToken()).toBe('new-token');

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api.dropboxapi.com/oauth2/token');
    expect(new Headers(init?.headers).get('Authorization')).toBe(
      `Basic ${Buffer.from('test-key:test-secret').toString('base64')}`,
    );
    expect(String(init?.body)).toBe('grant_type=refresh_token&refresh_token=test-refresh');

    expect(JSON.parse(await readFile(tokenFile, 'utf8'))).toEqual({
      access_token: 'new-token',
      refresh_token: 'test-refresh',
      expires_at: 15_400_000,
      encrypted: false,
    });
  });

  it('should keep using a token that is not close to expiry', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const auth = await DropboxAuth.load({
      initial: { accessToken: 'old-token', refreshToken: 'test-refresh', expiresAt: 1_061_000 },
      appKey: 'test-key',
      appSecret: 'test-secret',
      fetchImpl,
      now: () => 1_000_000,
    });

    expect(await auth.getAccessToken()).toBe('old-token');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should share one request between concurrent refreshes', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => tokenResponse({ access_token: 'new-token' }));
    const auth = await DropboxAuth.load({
      initial: { accessToken: 'old-token', refreshToken: 'test-refresh', expiresAt: null },
      appKey: 'test-key',
      appSecret: 'test-secret',
      fetchImpl,
    });

    const tokens = await Promise.all([auth.refresh(), auth.refresh()]);

    expect(tokens).toEqual(['new-token', 'new-token']);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should surface the provider error when a refresh is rejected', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      tokenResponse({ error: 'invalid_grant', error_description: 'refresh token is invalid' }, 400),
    );
    const auth = await DropboxAuth.load({
      initial: { accessToken: null, refreshToken: 'test-refresh', expiresAt: null },
      appKey: 'test-key',
      appSecret: 'test-secret',
      fetchImpl,
    });

    await expect(auth.getAccessToken()).rejects.toThrow('Dropbox token refresh failed: refresh token is invalid');
  });

  it('should prefer the persisted token over the environment', async () => {
    await writeFile(tokenFile, JSON.stringify({ access_token: 'file-token', refresh_token: null, expires_at: null }));

    const auth = await DropboxAuth.load({
      initial: { accessToken: 'env-token', refreshToken: null, expiresAt: null },
      tokenFile,
    });

    expect(await auth.getAccessToken()).toBe('file-token');
  });

  it('should read a legacy file holding only the access token', async () => {
    await writeFile(tokenFile, 'legacy-token\n');

    const auth = await DropboxAuth.load({ initial: { accessToken: null, refreshToken: null, expiresAt: null }, tokenFile });

    expect(await auth.getAccessToken()).toBe('legacy-token');
  });

  it('should encrypt the persisted tokens when a key is configured', async () => {
    const options = {
      appKey: 'test-key',
      appSecret: 'test-secret',
      tokenFile,
      encryptionKey: ENCRYPTION_KEY,
      fetchImpl: vi.fn<typeof fetch>(async () => tokenResponse({ access_token: 'new-token' })),
    };
    const auth = await DropboxAuth.load({
      ...options,
      initial: { accessToken: null, refreshToken: 'test-refresh', expiresAt: null },
    });
    await auth.refresh();

    const stored = await readFile(tokenFile, 'utf8');
    expect(stored).not.toContain('new-token');
    expect(stored).not.toContain('test-refresh');

    const reloaded = await DropboxAuth.load({
      ...options,
      initial: { accessToken: null, refreshToken: null, expiresAt: null },
    });
    expect(await reloaded.getAccessToken()).toBe('new-token');
  });
});
