// ========================================
// DROPBOX TOKEN MANAGEMENT
// ========================================

import { readFile, writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { decrypt, encrypt } from './crypto.js';
import { ConfigError } from './errors.js';

const TOKEN_URL = 'https://api.dropboxapi.com/oauth2/token';
// Refresh slightly before the provider's expiry
const EXPIRY_BUFFER_MS = 60_000;

export interface TokenState {
  accessToken: string | null;
  refreshToken: string | null;
  /** Epoch millis; null when unknown (long-lived token) */
  expiresAt: number | null;
}

export interface DropboxAuthOptions {
  initial: TokenState;
  appKey?: string;
  appSecret?: string;
  tokenFile?: string;
  encryptionKey?: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

const TokenFileSchema = z.object({
  access_token: z.string().nullable().optional(),
  refresh_token: z.string().nullable().optional(),
  expires_at: z.number().nullable().optional(),
  encrypted: z.boolean().optional(),
});

const RefreshResponseSchema = z.union([
  z.object({ access_token: z.string(), expires_in: z.number().optional() }),
  z.object({ error: z.string(), error_description: z.string().optional() }),
]);

async function readTokenFile(path: string, encryptionKey?: string): Promise<Partial<TokenState>> {
  let raw: string;
  try {
    raw = (await readFile(path, 'utf8')).trim();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {};
    throw error;
  }
  if (!raw) return {};

  // Older files hold just the access token
  if (!raw.startsWith('{')) return { accessToken: raw };

  const parsed = TokenFileSchema.parse(JSON.parse(raw));
  const reveal = async (value: string | null | undefined) => {
    if (!value) return null;
    if (!parsed.encrypted) return value;
    if (!encryptionKey) throw new ConfigError('Token file is encrypted but ENCRYPTION_SECRET_KEY is not set');
    return decrypt(value, encryptionKey);
  };

  return {
    accessToken: await reveal(parsed.access_token),
    refreshToken: await reveal(parsed.refresh_token),
    expiresAt: parsed.expires_at ?? null,
  };
}

/**
 * Holds the Dropbox access token and refreshes it when needed.
 *
 * Contract: a cached access token is used until 60s before `expiresAt`.
 * After that, or after the API answers 401 (`refresh()`), a new token is
 * requested with the refresh token and persisted to the token file.
 * Without a refresh token the access token is used as-is.
 */
export class DropboxAuth {
  private state: TokenState;
  private readonly options: DropboxAuthOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private inflight: Promise<string> | null = null;

  private constructor(state: TokenState, options: DropboxAuthOptions) {
    this.state = state;
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  /**
   * Reads persisted token state; persisted values win over the environment
   * because they are newer.
   */
  static async load(options: DropboxAuthOptions): Promise<DropboxAuth> {
    const persisted = options.tokenFile ? await readTokenFile(options.tokenFile, options.encryptionKey) : {};
    const state: TokenState = {
      accessToken: persisted.accessToken ?? options.initial.accessToken,
      refreshToken: persisted.refreshToken ?? options.initial.refreshToken,
      expiresAt: persisted.expiresAt ?? options.initial.expiresAt,
    };
    if (!state.accessToken && !state.refreshToken) {
      throw new ConfigError('No Dropbox token available - set DROPBOX_ACCESS_TOKEN or DROPBOX_REFRESH_TOKEN');
    }
    return new DropboxAuth(state, options);
  }

  canRefresh(): boolean {
    return Boolean(this.state.refreshToken && this.options.appKey && this.options.appSecret);
  }

  async getAccessToken(): Promise<string> {
    const { accessToken, expiresAt } = this.state;
    const fresh = expiresAt === null || this.now() < expiresAt - EXPIRY_BUFFER_MS;
    if (accessToken && (fresh || !this.canRefresh())) return accessToken;
    return this.refresh();
  }

  /**
   * Forces a refresh; concurrent callers share one request.
   */
  refresh(): Promise<string> {
    if (!this.inflight) {
      this.inflight = this.requestToken().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async requestToken(): Promise<string> {
    const { appKey, appSecret } = this.options;
    const refreshToken = this.state.refreshToken;
    if (!refreshToken || !appKey || !appSecret) {
      throw new ConfigError('Dropbox token expired and no refresh credentials are configured');
    }

    const creds = Buffer.from(`${appKey}:${appSecret}`).toString('base64');
    const response = await this.fetchImpl(TOKEN_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Authorization': `Basic ${creds}`,
      },
      body: new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
      }).toString(),
    });

    const result = RefreshResponseSchema.parse(await response.json());
    if ('error' in result) {
      throw new Error(`Dropbox token refresh failed: ${result.error_description || result.error}`);
    }

    this.state = {
      accessToken: result.access_token,
      refreshToken,
      expiresAt: result.expires_in ? this.now() + result.expires_in * 1000 : null,
    };
    await this.persist();
    console.log('[DropboxAuth] 🔄 Access token refreshed');
    return result.access_token;
  }

  private async persist(): Promise<void> {
    const { tokenFile, encryptionKey } = this.options;
    if (!tokenFile) return;

    const conceal = async (value: string | null) => {
      if (!value || !encryptionKey) return value;
      return encrypt(value, encryptionKey);
    };
    const payload = {
      access_token: await conceal(this.state.accessToken),
      refresh_token: await conceal(this.state.refreshToken),
      expires_at: this.state.expiresAt,
      encrypted: Boolean(encryptionKey),
    };
    await writeFile(tokenFile, JSON.stringify(payload), { mode: 0o600 });
  }
}
