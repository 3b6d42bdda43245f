/**
 * Process configuration, read once from the environment by the entry points
 * and passed into every collaborator's constructor.
 */

import { ConfigError } from './errors.js';
import { DEFAULT_PROPERTY_NAMES, type NotionPropertyNames } from './notionCases.js';

export interface AppConfig {
  notion: {
    apiKey: string;
    databaseId: string;
    properties: NotionPropertyNames;
  };
  dropbox: {
    accessToken: string | null;
    refreshToken: string | null;
    appKey?: string;
    appSecret?: string;
    tokenFile: string;
    rootPath: string;
    namespaceId?: string;
    teamMemberId?: string;
    encryptionKey?: string;
  };
  downloads: {
    basePath: string;
    directTimeoutMs: number;
    browserTimeoutMs: number;
    browserExecutablePath?: string;
    browserHeadless: boolean;
    fetchConcurrently: boolean;
  };
  runner: {
    pollIntervalSeconds: number;
    runOnce: boolean;
    /** Test-mode cap on cases per pass; undefined means unbounded */
    caseLimit?: number;
  };
  timeZone: string;
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (!value) throw new ConfigError(`${name} is missing`);
  return value;
}

function integer(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

export interface NotionConfig {
  notion: AppConfig['notion'];
  caseLimit?: number;
}

/**
 * The Notion half of the configuration, for tools that never touch Dropbox.
 */
export function loadNotionConfig(env: Env = process.env): NotionConfig {
  const caseLimit = integer(env, 'TEST_MODE_LIMIT', 0);
  return {
    notion: {
      apiKey: required(env, 'NOTION_API_KEY'),
      databaseId: required(env, 'NOTION_DATABASE_ID'),
      properties: DEFAULT_PROPERTY_NAMES,
    },
    caseLimit: caseLimit > 0 ? caseLimit : undefined,
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const accessToken = optional(env, 'DROPBOX_ACCESS_TOKEN') ?? null;
  const refreshToken = optional(env, 'DROPBOX_REFRESH_TOKEN') ?? null;
  const appKey = optional(env, 'DROPBOX_APP_KEY');
  const appSecret = optional(env, 'DROPBOX_APP_SECRET');

  if (!accessToken && !(refreshToken && appKey && appSecret)) {
    throw new ConfigError(
      'Dropbox credentials not configured - set DROPBOX_ACCESS_TOKEN, or DROPBOX_REFRESH_TOKEN with DROPBOX_APP_KEY and DROPBOX_APP_SECRET',
    );
  }

  const encryptionKey = optional(env, 'ENCRYPTION_SECRET_KEY');
  if (encryptionKey && encryptionKey.length < 32) {
    throw new ConfigError('ENCRYPTION_SECRET_KEY must be at least 32 characters');
  }

  const { notion, caseLimit } = loadNotionConfig(env);
  const supabaseUrl = optional(env, 'SUPABASE_URL');
  const supabaseKey = optional(env, 'SUPABASE_SERVICE_ROLE_KEY');

  return {
    notion,
    dropbox: {
      accessToken,
      refreshToken,
      appKey,
      appSecret,
      tokenFile: optional(env, 'DROPBOX_TOKEN_FILE') ?? '.dropbox_token',
      rootPath: optional(env, 'DROPBOX_ROOT_PATH') ?? '/Evidence',
      namespaceId: optional(env, 'DROPBOX_NAMESPACE_ID'),
      teamMemberId: optional(env, 'DROPBOX_TEAM_MEMBER_ID'),
      encryptionKey,
    },
    downloads: {
      basePath: optional(env, 'DOWNLOAD_BASE_PATH') ?? './downloads',
      directTimeoutMs: integer(env, 'DIRECT_TIMEOUT_MS', 120_000),
      browserTimeoutMs: integer(env, 'BROWSER_TIMEOUT_MS', 300_000),
      browserExecutablePath: optional(env, 'BROWSER_EXECUTABLE_PATH'),
      browserHeadless: flag(env, 'BROWSER_HEADLESS', true),
      fetchConcurrently: flag(env, 'FETCH_CONCURRENTLY', false),
    },
    runner: {
      pollIntervalSeconds: integer(env, 'POLL_INTERVAL', 60),
      runOnce: flag(env, 'RUN_ONCE', false),
      caseLimit,
    },
    timeZone: optional(env, 'TIME_ZONE') ?? 'UTC',
    supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceRoleKey: supabaseKey } : undefined,
  };
}
