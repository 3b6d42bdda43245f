import { setTimeout as sleep } from 'node:timers/promises';
import { pathToFileURL } from 'node:url';

import { Client } from '@notionhq/client';

import { SupabaseCaseRunLog } from './utils/automationLogger.js';
import { runBatch } from './utils/batchRunner.js';
import { CasePipeline } from './utils/casePipeline.js';
import { loadConfig, type AppConfig } from './utils/config.js';
import { DropboxAuth } from './utils/dropboxAuth.js';
import { DropboxClient } from './utils/dropboxClient.js';
import { BrowserFetchStrategy } from './utils/fetchStrategies/browserFetch.js';
import { DirectFetchStrategy } from './utils/fetchStrategies/directFetch.js';
import { FileFetcher } from './utils/fileFetcher.js';
import { NotionCaseSource } from './utils/notionCases.js';

export async function buildRuntime(config: AppConfig) {
  const records = new NotionCaseSource(
    new Client({ auth: config.notion.apiKey }),
    config.notion.databaseId,
    config.notion.properties,
  );

  const auth = await DropboxAuth.load({
    initial: {
      accessToken: config.dropbox.accessToken,
      refreshToken: config.dropbox.refreshToken,
      expiresAt: null,
    },
    appKey: config.dropbox.appKey,
    appSecret: config.dropbox.appSecret,
    tokenFile: config.dropbox.tokenFile,
    encryptionKey: config.dropbox.encryptionKey,
  });
  const store = new DropboxClient({
    auth,
    namespaceId: config.dropbox.namespaceId,
    teamMemberId: config.dropbox.teamMemberId,
  });

  const fetcher = new FileFetcher([
    new DirectFetchStrategy({ timeoutMs: config.downloads.directTimeoutMs }),
    new BrowserFetchStrategy({
      timeoutMs: config.downloads.browserTimeoutMs,
      headless: config.downloads.browserHeadless,
      executablePath: config.downloads.browserExecutablePath,
    }),
  ]);

  const pipeline = new CasePipeline({
    records,
    fetcher,
    store,
    downloadRoot: config.downloads.basePath,
    remoteRoot: config.dropbox.rootPath,
    timeZone: config.timeZone,
    fetchConcurrently: config.downloads.fetchConcurrently,
    runLog: config.supabase
      ? SupabaseCaseRunLog.fromCredentials(config.supabase.url, config.supabase.serviceRoleKey)
      : undefined,
  });

  return { records, fetcher, pipeline };
}

async function main() {
  const config = loadConfig();
  const { records, fetcher, pipeline } = await buildRuntime(config);
  const { pollIntervalSeconds, runOnce, caseLimit } = config.runner;

  console.log('[ProcessReadyCases] Starting case archiver');
  console.log(`[ProcessReadyCases] Mode: ${runOnce ? 'single pass' : `every ${pollIntervalSeconds}s`}${caseLimit ? `, test mode limit ${caseLimit}` : ''}`);

  const stop = new AbortController();
  const shutdown = () => {
    console.log('[ProcessReadyCases] Stopping after the current pass');
    stop.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    while (!stop.signal.aborted) {
      try {
        await runBatch(records, pipeline, { limit: caseLimit });
      } catch (error) {
        console.error('[ProcessReadyCases] ❌ Error in pass:', error);
      }
      if (runOnce) break;

      console.log(`[ProcessReadyCases] Waiting ${pollIntervalSeconds} seconds...`);
      await sleep(pollIntervalSeconds * 1000, undefined, { signal: stop.signal }).catch((error: unknown) => {
        if (!stop.signal.aborted) throw error;
      });
    }
  } finally {
    await fetcher.close();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((error: unknown) => {
    console.error('[ProcessReadyCases] Critical Error:', error);
    process.exitCode = 1;
  });
}
