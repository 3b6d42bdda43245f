import { pathToFileURL } from 'node:url';

import { Client } from '@notionhq/client';

import { ALL_STATUSES, CaseStatus, isTransient } from './utils/caseStatus.js';
import { loadNotionConfig } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { NotionCaseSource } from './utils/notionCases.js';

const STUCK_STATUSES = ALL_STATUSES.filter(isTransient);

/**
 * Manual reconciliation: puts cases left in a transient status by a crashed
 * run back to Ready for Download. Run it only when no archiver is running.
 */
export async function resetStuckCases(
  source: Pick<NotionCaseSource, 'findByStatus' | 'setStatus'>,
  limit?: number,
): Promise<{ reset: string[]; failed: string[] }> {
  const reset: string[] = [];
  const failed: string[] = [];

  for (const status of STUCK_STATUSES) {
    const stuck = await source.findByStatus(status, limit);
    console.log(`[ResetStuckCases] Found ${stuck.length} case(s) in "${status}"`);

    for (const record of stuck) {
      try {
        await source.setStatus(record.id, CaseStatus.Ready);
        reset.push(record.id);
        console.log(`[ResetStuckCases] ✅ Reset ${record.suspectName} (${record.id})`);
      } catch (error) {
        failed.push(record.id);
        console.error(`[ResetStuckCases] ❌ Failed to reset ${record.id}: ${errorMessage(error)}`);
      }
    }
  }

  return { reset, failed };
}

async function main() {
  const config = loadNotionConfig();
  const source = new NotionCaseSource(
    new Client({ auth: config.notion.apiKey }),
    config.notion.databaseId,
    config.notion.properties,
  );
  const { reset, failed } = await resetStuckCases(source, config.caseLimit);
  console.log(`[ResetStuckCases] Done: ${reset.length} reset, ${failed.length} failed`);
  if (failed.length > 0) process.exitCode = 1;
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((error: unknown) => {
    console.error('[ResetStuckCases] Critical Error:', error);
    process.exitCode = 1;
  });
}
