import { InvalidTransitionError } from './errors.js';

export const CaseStatus = {
  Ready: 'Ready for Download',
  Downloading: 'Downloading',
  Uploading: 'Uploading',
  Uploaded: 'Uploaded',
} as const;

export type CaseStatus = (typeof CaseStatus)[keyof typeof CaseStatus];

export const ALL_STATUSES: readonly CaseStatus[] = Object.values(CaseStatus);

// Forward edges plus the rollback edges back to Ready.
const TRANSITIONS: Record<CaseStatus, readonly CaseStatus[]> = {
  [CaseStatus.Ready]: [CaseStatus.Downloading],
  [CaseStatus.Downloading]: [CaseStatus.Uploading, CaseStatus.Ready],
  [CaseStatus.Uploading]: [CaseStatus.Uploaded, CaseStatus.Ready],
  [CaseStatus.Uploaded]: [],
};

export function isCaseStatus(value: string): value is CaseStatus {
  return ALL_STATUSES.some(status => status === value);
}

export function canTransition(from: CaseStatus, to: CaseStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: CaseStatus, to: CaseStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTransient(status: CaseStatus): boolean {
  return status === CaseStatus.Downloading || status === CaseStatus.Uploading;
}
