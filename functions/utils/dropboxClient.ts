// ========================================
// DROPBOX OPERATIONS
// ========================================

import { open, readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';

import { z } from 'zod';

import type { DropboxAuth } from './dropboxAuth.js';
import { SharedLinkError, UploadError, errorMessage, type UploadFailureReason } from './errors.js';
import type { FolderHandle } from './types.js';

const API_HOST = 'https://api.dropboxapi.com/2';
const CONTENT_HOST = 'https://content.dropboxapi.com/2';

// Dropbox rejects single-request uploads above 150 MiB
export const SESSION_UPLOAD_THRESHOLD = 150 * 1024 * 1024;
export const CHUNK_SIZE = 4 * 1024 * 1024;

export interface RemoteStore {
  ensureFolder(path: string): Promise<FolderHandle>;
  upload(localPath: string, folder: FolderHandle): Promise<string>;
  createSharedLink(folderPath: string): Promise<string>;
}

export interface DropboxClientOptions {
  auth: Pick<DropboxAuth, 'getAccessToken' | 'refresh' | 'canRefresh'>;
  /** Team folder namespace all paths are relative to */
  namespaceId?: string;
  /** Team member to act as when the token belongs to a team app */
  teamMemberId?: string;
  fetchImpl?: typeof fetch;
  sessionThreshold?: number;
  chunkSize?: number;
}

interface DropboxResponse {
  status: number;
  data: unknown;
}

const ErrorBodySchema = z.object({
  error_summary: z.string().optional(),
  error: z.unknown().optional(),
});

const FolderResultSchema = z.object({
  metadata: z.object({ path_display: z.string() }),
});

const FileMetadataSchema = z.object({
  path_display: z.string(),
  id: z.string().optional(),
  size: z.number().optional(),
});

const SessionStartSchema = z.object({ session_id: z.string() });

const SharedLinkSchema = z.object({ url: z.string() });

const SharedLinkErrorSchema = z.object({
  error: z.object({
    '.tag': z.string(),
    shared_link_already_exists: z
      .object({ metadata: SharedLinkSchema.optional() })
      .optional(),
  }),
});

const ListSharedLinksSchema = z.object({ links: z.array(SharedLinkSchema) });

/**
 * Non-ASCII characters must be escaped in Dropbox-API-Arg headers
 */
export function headerSafeJson(value: unknown): string {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, c => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

function errorSummary(data: unknown): string {
  const parsed = ErrorBodySchema.safeParse(data);
  if (parsed.success && parsed.data.error_summary) return parsed.data.error_summary;
  return typeof data === 'string' && data ? data : 'unknown error';
}

function classifyFailure(response: DropboxResponse): UploadFailureReason {
  const summary = errorSummary(response.data);
  if (response.status === 401 || response.status === 403) return 'auth';
  if (/insufficient_space|insufficient_quota/.test(summary)) return 'quota';
  if (response.status === 429 || response.status >= 500) return 'network';
  return 'api';
}

export class DropboxClient implements RemoteStore {
  private readonly options: DropboxClientOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly sessionThreshold: number;
  private readonly chunkSize: number;

  constructor(options: DropboxClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sessionThreshold = options.sessionThreshold ?? SESSION_UPLOAD_THRESHOLD;
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
  }

  private async accessToken(): Promise<string> {
    try {
      return await this.options.auth.getAccessToken();
    } catch (error) {
      throw new UploadError('auth', `Dropbox token unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async headers(extra: Record<string, string>): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      'Authorization': `Bearer ${await this.accessToken()}`,
      ...extra,
    };
    if (this.options.namespaceId) {
      headers['Dropbox-API-Path-Root'] = JSON.stringify({ '.tag': 'namespace_id', namespace_id: this.options.namespaceId });
    }
    if (this.options.teamMemberId) {
      headers['Dropbox-API-Select-User'] = this.options.teamMemberId;
    }
    return headers;
  }

  /**
   * One API call; a 401 triggers a single token refresh and retry.
   */
  private async call(url: string, init: { json?: unknown; arg?: unknown; body?: Uint8Array }): Promise<DropboxResponse> {
    const send = async () => {
      const extra: Record<string, string> = init.body !== undefined || init.arg !== undefined
        ? { 'Content-Type': 'application/octet-stream', 'Dropbox-API-Arg': headerSafeJson(init.arg ?? {}) }
        : { 'Content-Type': 'application/json' };
      const headers = await this.headers(extra);
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'POST',
          headers,
          body: init.body ?? (init.json === undefined ? undefined : JSON.stringify(init.json)),
        });
      } catch (error) {
        throw new UploadError('network', `Dropbox request failed: ${errorMessage(error)}`, { cause: error });
      }

      const text = await response.text();
      let data: unknown = text;
      if (text && (response.headers.get('content-type') ?? '').includes('json')) {
        data = JSON.parse(text);
      }
      return { status: response.status, data };
    };

    const first = await send();
    if (first.status === 401 && this.options.auth.canRefresh()) {
      console.warn('[Dropbox] 401 from API, refreshing token');
      try {
        await this.options.auth.refresh();
      } catch (error) {
        throw new UploadError('auth', `Dropbox token refresh failed: ${errorMessage(error)}`, { cause: error });
      }
      return send();
    }
    return first;
  }

  private fail(action: string, response: DropboxResponse): UploadError {
    return new UploadError(classifyFailure(response), `${action} failed: ${errorSummary(response.data)}`, {
      status: response.status,
    });
  }

  async ensureFolder(path: string): Promise<FolderHandle> {
    const response = await this.call(`${API_HOST}/files/create_folder_v2`, {
      json: { path, autorename: false },
    });

    if (response.status === 200) {
      const { metadata } = FolderResultSchema.parse(response.data);
      console.log(`[Dropbox] Created folder ${metadata.path_display}`);
      return { path: metadata.path_display, created: true };
    }
    if (response.status === 409 && errorSummary(response.data).startsWith('path/conflict/folder')) {
      console.log(`[Dropbox] Folder already exists: ${path}`);
      return { path, created: false };
    }
    throw this.fail(`Create folder ${path}`, response);
  }

  async upload(localPath: string, folder: FolderHandle): Promise<string> {
    const remotePath = `${folder.path}/${basename(localPath)}`;
    const { size } = await stat(localPath);

    const metadata = size > this.sessionThreshold
      ? await this.uploadInSession(localPath, remotePath, size)
      : await this.uploadSingle(localPath, remotePath);

    console.log(`[Dropbox] ✅ Uploaded ${localPath} -> ${metadata.path_display}`);
    return metadata.path_display;
  }

  private async uploadSingle(localPath: string, remotePath: string) {
    const content = await readFile(localPath);
    const response = await this.call(`${CONTENT_HOST}/files/upload`, {
      arg: { path: remotePath, mode: 'overwrite', autorename: false, mute: true },
      body: content,
    });
    if (response.status !== 200) throw this.fail(`Upload ${remotePath}`, response);
    return FileMetadataSchema.parse(response.data);
  }

  private async uploadInSession(localPath: string, remotePath: string, size: number) {
    console.log(`[Dropbox] Uploading large file (${(size / 1024 / 1024).toFixed(1)} MB) in chunks: ${localPath}`);
    const file = await open(localPath, 'r');
    try {
      const readChunk = async (offset: number) => {
        const length = Math.min(this.chunkSize, size - offset);
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await file.read(buffer, 0, length, offset);
        return buffer.subarray(0, bytesRead);
      };

      const first = await readChunk(0);
      const start = await this.call(`${CONTENT_HOST}/files/upload_session/start`, {
        arg: { close: false },
        body: first,
      });
      if (start.status !== 200) throw this.fail(`Upload session start for ${remotePath}`, start);
      const { session_id } = SessionStartSchema.parse(start.data);

      let offset = first.length;
      while (size - offset > this.chunkSize) {
        const chunk = await readChunk(offset);
        const append = await this.call(`${CONTENT_HOST}/files/upload_session/append_v2`, {
          arg: { cursor: { session_id, offset }, close: false },
          body: chunk,
        });
        if (append.status !== 200) throw this.fail(`Upload session append for ${remotePath}`, append);
        offset += chunk.length;
      }

      const last = await readChunk(offset);
      const finish = await this.call(`${CONTENT_HOST}/files/upload_session/finish`, {
        arg: {
          cursor: { session_id, offset },
          commit: { path: remotePath, mode: 'overwrite', autorename: false, mute: true },
        },
        body: last,
      });
      if (finish.status !== 200) throw this.fail(`Upload session finish for ${remotePath}`, finish);
      return FileMetadataSchema.parse(finish.data);
    } finally {
      await file.close();
    }
  }

  /**
   * Returns the existing shared link when the folder already has one.
   */
  async createSharedLink(folderPath: string): Promise<string> {
    const response = await this.call(`${API_HOST}/sharing/create_shared_link_with_settings`, {
      json: { path: folderPath, settings: { audience: 'public', access: 'viewer' } },
    });

    if (response.status === 200) {
      return SharedLinkSchema.parse(response.data).url;
    }

    const conflict = SharedLinkErrorSchema.safeParse(response.data);
    if (response.status === 409 && conflict.success && conflict.data.error['.tag'] === 'shared_link_already_exists') {
      const existing = conflict.data.error.shared_link_already_exists?.metadata?.url;
      if (existing) return existing;
      return this.findExistingLink(folderPath);
    }

    throw new SharedLinkError(`Shared link for ${folderPath} failed: ${errorSummary(response.data)}`);
  }

  private async findExistingLink(folderPath: string): Promise<string> {
    const response = await this.call(`${API_HOST}/sharing/list_shared_links`, {
      json: { path: folderPath, direct_only: true },
    });
    if (response.status !== 200) {
      throw new SharedLinkError(`Listing shared links for ${folderPath} failed: ${errorSummary(response.data)}`);
    }
    const { links } = ListSharedLinksSchema.parse(response.data);
    if (links.length === 0) {
      throw new SharedLinkError(`Dropbox reported an existing link for ${folderPath} but none was listed`);
    }
    return links[0].url;
  }
}
