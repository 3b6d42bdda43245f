import type { CaseStatus } from './caseStatus.js';
import type { FetchFailureReason } from './errors.js';

export interface LinkSlotValue {
  slot: string;
  value: string;
}

export interface CaseRecord {
  id: string;
  status: CaseStatus;
  title: string;
  suspectName: string;
  /** Raw slot contents in slot order; the multi-URL slot is kept as one string. */
  linkSlots: LinkSlotValue[];
  credentials: string;
  sharedLink: string | null;
}

export type LinkEntry =
  | { kind: 'valid'; slot: string; url: string }
  | { kind: 'malformed'; slot: string; token: string; reason: string };

export interface Credentials {
  username: string;
  password: string;
}

export type FetchStrategyName = 'direct' | 'browser';

export interface StrategyAttemptError {
  strategy: FetchStrategyName;
  reason: FetchFailureReason;
  message: string;
}

export type FetchResult =
  | {
      ok: true;
      url: string;
      slot: string;
      localPath: string;
      bytes: number;
      strategy: FetchStrategyName;
      attempts: StrategyAttemptError[];
    }
  | {
      ok: false;
      url: string;
      slot: string;
      strategy: FetchStrategyName | null;
      reason: FetchFailureReason;
      error: string;
      attempts: StrategyAttemptError[];
    };

export type UploadResult =
  | { ok: true; localPath: string; remotePath: string }
  | { ok: false; localPath: string; error: string };

export interface FolderHandle {
  path: string;
  created: boolean;
}

export type CaseRunOutcome = 'uploaded' | 'rolled_back' | 'not_claimed' | 'reconciliation_required' | 'skipped';
