import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect } from 'vitest';

import { buildRuntime } from './processReadyCases.js';
import { CasePipeline } from './utils/casePipeline.js';
import { loadConfig } from './utils/config.js';
import { FileFetcher } from './utils/fileFetcher.js';
import { NotionCaseSource } from './utils/notionCases.js';

describe('buildRuntime', () => {
  it('should wire the collaborators from configuration without touching the network', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'runtime-'));
    try {
      const config = loadConfig({
        NOTION_API_KEY: 'test-notion-key',
        NOTION_DATABASE_ID: 'test-database',
        DROPBOX_ACCESS_TOKEN: 'test-token',
        DROPBOX_TOKEN_FILE: join(dir, '.dropbox_token'),
        DOWNLOAD_BASE_PATH: join(dir, 'downloads'),
      });

      const runtime = await buildRuntime(config);

      expect(runtime.records).toBeInstanceOf(NotionCaseSource);
      expect(runtime.fetcher).toBeInstanceOf(FileFetcher);
      expect(runtime.pipeline).toBeInstanceOf(CasePipeline);
      await runtime.fetcher.close();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
