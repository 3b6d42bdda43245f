/**
 * Case Pipeline
 *
 * Drives one case record through Ready -> Downloading -> Uploading -> Uploaded.
 *
 * Flow per case:
 *   1) Claim the record (status Downloading) before any network fetch
 *   2) Fetch every link; malformed tokens fail without a fetch
 *   3) All links failed -> roll back to Ready
 *   4) Status Uploading, upload each local file into the case folder
 *   5) All uploads failed -> roll back to Ready, keep local files
 *   6) Shared link -> record, status Uploaded
 *   7) Delete exactly the local files that were uploaded
 *
 * A record update that fails after the claim leaves the case for manual
 * reconciliation; nothing retries it.
 */

import { readdir, rm, rmdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { CaseRunLog } from './automationLogger.js';
import { CaseStatus, assertTransition } from './caseStatus.js';
import { maskPassword, parseCredentials } from './credentials.js';
import type { RemoteStore } from './dropboxClient.js';
import {
  AllLinksFailedError,
  AllUploadsFailedError,
  InvalidTransitionError,
  RecordUpdateError,
  errorMessage,
} from './errors.js';
import { malformedLinkResult, type FetchRequest, type LinkFetcher } from './fileFetcher.js';
import { buildCaseFolderName, buildCaseFolderPath, sanitizeName } from './folderPathBuilders.js';
import { buildDownloadLinkSet } from './linkSet.js';
import type { RecordSource } from './notionCases.js';
import { classifyOutcomes, failures, successes } from './outcomes.js';
import type {
  CaseRecord,
  CaseRunOutcome,
  Credentials,
  FetchResult,
  FolderHandle,
  LinkEntry,
  UploadResult,
} from './types.js';

export interface CasePipelineOptions {
  records: RecordSource;
  fetcher: LinkFetcher;
  store: RemoteStore;
  downloadRoot: string;
  remoteRoot: string;
  timeZone: string;
  fetchConcurrently?: boolean;
  runLog?: CaseRunLog;
  now?: () => Date;
}

export interface CaseReport {
  caseId: string;
  suspectName: string;
  outcome: CaseRunOutcome;
  /** Last status this run wrote (or found) on the record */
  status: CaseStatus;
  fetchResults: FetchResult[];
  uploadResults: UploadResult[];
  folderPath: string | null;
  sharedLink: string | null;
  deletedFiles: string[];
  error?: string;
}

/**
 * Tracks the record's status for one run and writes every transition
 * through the record source after checking it against the transition table.
 */
class StatusCursor {
  current: CaseStatus;

  constructor(
    private readonly records: RecordSource,
    private readonly caseId: string,
    initial: CaseStatus,
  ) {
    this.current = initial;
  }

  async advance(to: CaseStatus): Promise<void> {
    assertTransition(this.current, to);
    await this.records.setStatus(this.caseId, to);
    this.current = to;
  }
}

function describeFetchFailure(result: Extract<FetchResult, { ok: false }>): string {
  return `link [${result.slot}] ${result.url}: ${result.error}`;
}

function describeUploadFailure(result: Extract<UploadResult, { ok: false }>): string {
  return `upload ${result.localPath}: ${result.error}`;
}

function filePrefix(index: number): string {
  return `link-${String(index + 1).padStart(2, '0')}`;
}

export class CasePipeline {
  private readonly options: CasePipelineOptions;
  private readonly now: () => Date;

  constructor(options: CasePipelineOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async process(record: CaseRecord): Promise<CaseReport> {
    const startTime = Date.now();
    const report = await this.run(record);

    await this.options.runLog?.record({
      case_id: report.caseId,
      suspect_name: report.suspectName,
      outcome: report.outcome,
      links_total: report.fetchResults.length,
      links_failed: failures(report.fetchResults).length,
      files_uploaded: successes(report.uploadResults).length,
      files_failed: failures(report.uploadResults).length,
      shared_link: report.sharedLink,
      error_message: report.error,
      execution_time_ms: Date.now() - startTime,
    });

    return report;
  }

  private async run(record: CaseRecord): Promise<CaseReport> {
    const { records, store } = this.options;
    const report: CaseReport = {
      caseId: record.id,
      suspectName: record.suspectName,
      outcome: 'skipped',
      status: record.status,
      fetchResults: [],
      uploadResults: [],
      folderPath: null,
      sharedLink: null,
      deletedFiles: [],
    };

    const links = buildDownloadLinkSet(record);
    if (links.length === 0) {
      console.warn(`[CasePipeline] ${record.id} has no download links, skipping`);
      return report;
    }

    console.log(`[CasePipeline] PROCESSING: ${record.suspectName} (${record.id}), ${links.length} link(s)`);

    // Claim before any fetch so another run does not pick the case up
    const status = new StatusCursor(records, record.id, record.status);
    try {
      await status.advance(CaseStatus.Downloading);
    } catch (error) {
      if (!(error instanceof RecordUpdateError)) throw error;
      console.error(`[CasePipeline] ❌ Could not claim ${record.id}: ${error.message}`);
      report.outcome = 'not_claimed';
      report.error = error.message;
      return report;
    }
    report.status = status.current;

    const folderName = buildCaseFolderName(record.suspectName, this.now(), this.options.timeZone);
    const localDir = join(this.options.downloadRoot, `${folderName}-${sanitizeName(record.id, 'case')}`);
    const credentials = parseCredentials(record.credentials);
    console.log(`[CasePipeline] Credentials: ${maskPassword(credentials)}`);

    try {
      report.fetchResults = await this.fetchAll(links, credentials, localDir);
      if (classifyOutcomes(report.fetchResults) === 'all_failed') {
        throw new AllLinksFailedError(failures(report.fetchResults).map(describeFetchFailure));
      }

      await status.advance(CaseStatus.Uploading);
      report.status = status.current;

      report.folderPath = buildCaseFolderPath(this.options.remoteRoot, folderName);
      report.uploadResults = await this.uploadAll(successes(report.fetchResults), report.folderPath);
      if (classifyOutcomes(report.uploadResults) === 'all_failed') {
        throw new AllUploadsFailedError(failures(report.uploadResults).map(describeUploadFailure));
      }

      const sharedLink = await store.createSharedLink(report.folderPath);
      await records.setField(record.id, 'sharedLink', sharedLink);
      report.sharedLink = sharedLink;

      await this.writeNotes(record.id, this.summarize(report));
      await status.advance(CaseStatus.Uploaded);
      report.status = status.current;
      report.outcome = 'uploaded';
    } catch (error) {
      if (error instanceof InvalidTransitionError) throw error;
      report.error = errorMessage(error);

      if (error instanceof RecordUpdateError) {
        console.error(
          `[CasePipeline] ❌ ${record.id} needs manual reconciliation: record stuck in "${status.current}" (${error.message})`,
        );
        report.outcome = 'reconciliation_required';
        return report;
      }

      await this.rollback(status, report);
      return report;
    }

    await this.cleanup(report, localDir);
    const uploaded = successes(report.uploadResults).length;
    console.log(`[CasePipeline] ✅ ${record.suspectName}: ${uploaded} file(s) uploaded -> ${report.sharedLink}`);
    return report;
  }

  private async fetchAll(
    links: readonly LinkEntry[],
    credentials: Credentials | undefined,
    destinationDir: string,
  ): Promise<FetchResult[]> {
    const fetchOne = async (entry: LinkEntry, index: number): Promise<FetchResult> => {
      if (entry.kind === 'malformed') {
        console.warn(`[CasePipeline] Malformed link in [${entry.slot}]: "${entry.token}"`);
        return malformedLinkResult(entry);
      }
      const request: FetchRequest = {
        url: entry.url,
        slot: entry.slot,
        credentials,
        destinationDir,
        filePrefix: filePrefix(index),
      };
      try {
        return await this.options.fetcher.fetch(request);
      } catch (error) {
        return {
          ok: false,
          url: entry.url,
          slot: entry.slot,
          strategy: null,
          reason: 'network',
          error: errorMessage(error),
          attempts: [],
        };
      }
    };

    if (this.options.fetchConcurrently) {
      return Promise.all(links.map(fetchOne));
    }
    const results: FetchResult[] = [];
    for (const [index, entry] of links.entries()) {
      results.push(await fetchOne(entry, index));
    }
    return results;
  }

  /**
   * The case folder is created on the first upload and reused afterwards.
   */
  private async uploadAll(
    files: ReadonlyArray<Extract<FetchResult, { ok: true }>>,
    folderPath: string,
  ): Promise<UploadResult[]> {
    const { store } = this.options;
    const results: UploadResult[] = [];
    let folder: FolderHandle | null = null;

    for (const file of files) {
      try {
        folder ??= await store.ensureFolder(folderPath);
        const remotePath = await store.upload(file.localPath, folder);
        results.push({ ok: true, localPath: file.localPath, remotePath });
      } catch (error) {
        console.error(`[CasePipeline] ❌ Upload failed for ${file.localPath}: ${errorMessage(error)}`);
        results.push({ ok: false, localPath: file.localPath, error: errorMessage(error) });
      }
    }
    return results;
  }

  private summarize(report: CaseReport): string {
    const lines = [
      ...failures(report.fetchResults).map(r => `Failed ${describeFetchFailure(r)}`),
      ...failures(report.uploadResults).map(r => `Failed ${describeUploadFailure(r)}`),
    ];
    if (lines.length === 0) return '';

    const fetched = successes(report.fetchResults).length;
    const uploaded = successes(report.uploadResults).length;
    return [
      `Downloaded ${fetched}/${report.fetchResults.length} link(s), uploaded ${uploaded}/${report.uploadResults.length} file(s).`,
      ...lines,
    ].join('\n');
  }

  /**
   * Notes are for the operator only; a failed write is logged, not fatal.
   */
  private async writeNotes(caseId: string, notes: string): Promise<void> {
    try {
      await this.options.records.setField(caseId, 'notes', notes);
    } catch (error) {
      if (!(error instanceof RecordUpdateError)) throw error;
      console.warn(`[CasePipeline] Could not write notes for ${caseId}: ${error.message}`);
    }
  }

  private async rollback(status: StatusCursor, report: CaseReport): Promise<void> {
    console.error(`[CasePipeline] ❌ ${report.caseId} failed in "${status.current}": ${report.error}`);
    console.log(`[CasePipeline] 🔄 Rolling back ${report.caseId} to "${CaseStatus.Ready}"`);

    const summary = this.summarize(report);
    await this.writeNotes(report.caseId, [`Rolled back: ${report.error}`, summary].filter(Boolean).join('\n'));

    try {
      await status.advance(CaseStatus.Ready);
      report.status = status.current;
      report.outcome = 'rolled_back';
    } catch (error) {
      if (!(error instanceof RecordUpdateError)) throw error;
      console.error(
        `[CasePipeline] ❌ ${report.caseId} needs manual reconciliation: rollback failed (${error.message})`,
      );
      report.outcome = 'reconciliation_required';
    }
  }

  /**
   * Deletes a local file only when its upload succeeded.
   */
  private async cleanup(report: CaseReport, localDir: string): Promise<void> {
    for (const upload of successes(report.uploadResults)) {
      try {
        await rm(upload.localPath, { force: true });
        report.deletedFiles.push(upload.localPath);
      } catch (error) {
        console.warn(`[CasePipeline] Could not delete ${upload.localPath}: ${errorMessage(error)}`);
      }
    }

    try {
      const remaining = await readdir(localDir);
      if (remaining.length === 0) await rmdir(localDir);
    } catch (error) {
      console.warn(`[CasePipeline] Could not tidy ${localDir}: ${errorMessage(error)}`);
    }
  }
}
