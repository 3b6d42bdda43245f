import { createWriteStream } from 'node:fs';
import { mkdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { FetchError, errorMessage } from '../errors.js';
import type { FetchRequest, FetchStrategy, FetchedFile } from '../fileFetcher.js';
import { buildLocalFileName, resolveDownloadName } from '../folderPathBuilders.js';

const INTERACTIVE_CONTENT_TYPES = /^(text\/html|application\/xhtml\+xml)/i;

export interface DirectFetchOptions {
  timeoutMs: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function causeMessage(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) return error.cause.message;
  return errorMessage(error);
}

function toTransportError(error: unknown, timeoutMs: number): FetchError {
  if (isTimeout(error)) {
    return new FetchError('timeout', `Timed out after ${timeoutMs}ms`, { cause: error });
  }
  const detail = causeMessage(error);
  if (/redirect/i.test(detail)) {
    return new FetchError('network', `Redirect loop: ${detail}`, { cause: error });
  }
  return new FetchError('network', detail, { cause: error });
}

/**
 * Stateless HTTP retrieval. Anything that looks like an interactive page
 * rather than a file is treated as a failure so the browser strategy can try.
 */
export class DirectFetchStrategy implements FetchStrategy {
  readonly name = 'direct' as const;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DirectFetchOptions) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent ?? 'case-archiver/1.0';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async attempt(request: FetchRequest): Promise<FetchedFile> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        redirect: 'follow',
        signal,
        headers: { 'User-Agent': this.userAgent },
      });
    } catch (error) {
      throw toTransportError(error, this.timeoutMs);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError('http_status', `HTTP ${response.status} ${response.statusText}`.trim());
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (INTERACTIVE_CONTENT_TYPES.test(contentType)) {
      await response.body?.cancel();
      throw new FetchError('html_page', `Got an HTML page (${contentType}) instead of a file`);
    }

    if (!response.body) {
      throw new FetchError('empty_body', 'Response has no body');
    }

    const originalName = resolveDownloadName(response.url || request.url, response.headers.get('content-disposition'));
    const localPath = join(request.destinationDir, buildLocalFileName(request.filePrefix, originalName));

    await mkdir(request.destinationDir, { recursive: true });
    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(localPath));
    } catch (error) {
      await rm(localPath, { force: true });
      throw toTransportError(error, this.timeoutMs);
    }

    const { size } = await stat(localPath);
    if (size === 0) {
      await rm(localPath, { force: true });
      throw new FetchError('empty_body', 'Downloaded file is empty');
    }

    return { localPath, bytes: size };
  }
}
