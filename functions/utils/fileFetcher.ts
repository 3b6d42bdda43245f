/**
 * File Fetcher
 *
 * Tries an ordered list of fetch strategies for one link and stops at the
 * first success. Never throws: every failure ends up in the returned
 * FetchResult so one bad link cannot abort its siblings.
 */

import { FetchError, errorMessage } from './errors.js';
import type { Credentials, FetchResult, FetchStrategyName, LinkEntry, StrategyAttemptError } from './types.js';

export interface FetchRequest {
  url: string;
  slot: string;
  credentials?: Credentials;
  destinationDir: string;
  /** Unique per link within a case, e.g. "link-01" */
  filePrefix: string;
}

export interface FetchedFile {
  localPath: string;
  bytes: number;
}

export interface FetchStrategy {
  readonly name: FetchStrategyName;
  /** Resolves with the saved file or rejects, preferably with a FetchError */
  attempt(request: FetchRequest): Promise<FetchedFile>;
  close?(): Promise<void>;
}

export interface LinkFetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

function toAttemptError(strategy: FetchStrategyName, error: unknown): StrategyAttemptError {
  if (error instanceof FetchError) {
    return { strategy, reason: error.reason, message: error.message };
  }
  return {
    strategy,
    reason: strategy === 'browser' ? 'browser' : 'network',
    message: errorMessage(error),
  };
}

export function describeAttempts(attempts: readonly StrategyAttemptError[]): string {
  return attempts.map(a => `${a.strategy}: ${a.message}`).join('; ');
}

export class FileFetcher implements LinkFetcher {
  private readonly strategies: readonly FetchStrategy[];

  constructor(strategies: readonly FetchStrategy[]) {
    if (strategies.length === 0) throw new Error('FileFetcher needs at least one strategy');
    this.strategies = strategies;
  }

  async fetch(request: FetchRequest): Promise<FetchResult> {
    const attempts: StrategyAttemptError[] = [];

    for (const strategy of this.strategies) {
      try {
        const file = await strategy.attempt(request);
        console.log(`[FileFetcher] ✅ ${strategy.name}: ${request.url} -> ${file.localPath} (${file.bytes} bytes)`);
        return {
          ok: true,
          url: request.url,
          slot: request.slot,
          localPath: file.localPath,
          bytes: file.bytes,
          strategy: strategy.name,
          attempts,
        };
      } catch (error) {
        const attempt = toAttemptError(strategy.name, error);
        attempts.push(attempt);
        console.warn(`[FileFetcher] ${strategy.name} failed for ${request.url}: ${attempt.message}`);
      }
    }

    console.error(`[FileFetcher] ❌ All strategies failed for ${request.url}`);
    const last = attempts[attempts.length - 1];
    return {
      ok: false,
      url: request.url,
      slot: request.slot,
      strategy: last.strategy,
      reason: last.reason,
      error: describeAttempts(attempts),
      attempts,
    };
  }

  async close(): Promise<void> {
    for (const strategy of this.strategies) {
      await strategy.close?.();
    }
  }
}

/**
 * Immediate failure for a token that never parsed as a URL; nothing is fetched.
 */
export function malformedLinkResult(entry: Extract<LinkEntry, { kind: 'malformed' }>): FetchResult {
  const message = `Malformed URL "${entry.token}": ${entry.reason}`;
  return {
    ok: false,
    url: entry.token,
    slot: entry.slot,
    strategy: null,
    reason: 'malformed_url',
    error: message,
    attempts: [],
  };
}
