import type { CaseReport } from './casePipeline.js';
import { errorMessage } from './errors.js';
import type { RecordSource } from './notionCases.js';
import type { CaseRecord, CaseRunOutcome } from './types.js';

export interface BatchSummary {
  total: number;
  outcomes: Record<CaseRunOutcome, number>;
  /** Cases whose processing threw instead of reporting */
  crashed: Array<{ caseId: string; error: string }>;
  reports: CaseReport[];
  execution_time_ms: number;
}

export interface CaseProcessor {
  process(record: CaseRecord): Promise<CaseReport>;
}

/**
 * One pass: processes every ready case in turn. A crash in one case is
 * logged and recorded, and the pass moves on to the next case.
 */
export async function runBatch(
  source: Pick<RecordSource, 'findReady'>,
  pipeline: CaseProcessor,
  options: { limit?: number } = {},
): Promise<BatchSummary> {
  const startTime = Date.now();
  const cases = await source.findReady(options.limit);
  const summary: BatchSummary = {
    total: cases.length,
    outcomes: { uploaded: 0, rolled_back: 0, not_claimed: 0, reconciliation_required: 0, skipped: 0 },
    crashed: [],
    reports: [],
    execution_time_ms: 0,
  };

  console.log(`[BatchRunner] Starting pass over ${cases.length} case(s)${options.limit ? ` (limit ${options.limit})` : ''}`);

  for (const record of cases) {
    try {
      const report = await pipeline.process(record);
      summary.reports.push(report);
      summary.outcomes[report.outcome] += 1;
    } catch (error) {
      console.error(`[BatchRunner] ❌ Error processing case ${record.id}:`, error);
      summary.crashed.push({ caseId: record.id, error: errorMessage(error) });
    }
  }

  summary.execution_time_ms = Date.now() - startTime;
  const { uploaded, rolled_back, reconciliation_required } = summary.outcomes;
  console.log(
    `[BatchRunner] 🏁 Pass complete: ${uploaded} uploaded, ${rolled_back} rolled back, ` +
      `${reconciliation_required} need reconciliation, ${summary.crashed.length} crashed (${summary.execution_time_ms}ms)`,
  );
  return summary;
}
