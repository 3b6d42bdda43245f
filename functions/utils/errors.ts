/**
 * Error kinds raised across the archiving pipeline.
 *
 * Per-link and per-file errors (FetchError, UploadError) are captured into
 * tagged results and never abort sibling work. Case-level errors
 * (AllLinksFailedError, AllUploadsFailedError) trigger a rollback to Ready.
 */

export type FetchFailureReason =
  | 'timeout'
  | 'http_status'
  | 'html_page'
  | 'empty_body'
  | 'malformed_url'
  | 'network'
  | 'browser';

export type UploadFailureReason = 'quota' | 'network' | 'auth' | 'api';

export class FetchError extends Error {
  readonly reason: FetchFailureReason;

  constructor(reason: FetchFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
    this.reason = reason;
  }
}

export class UploadError extends Error {
  readonly reason: UploadFailureReason;
  readonly status?: number;

  constructor(reason: UploadFailureReason, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'UploadError';
    this.reason = reason;
    this.status = options?.status;
  }
}

export class SharedLinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SharedLinkError';
  }
}

export class RecordUpdateError extends Error {
  readonly recordId: string;

  constructor(recordId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordUpdateError';
    this.recordId = recordId;
  }
}

export class AllLinksFailedError extends Error {
  readonly failures: string[];

  constructor(failures: string[]) {
    super(`All ${failures.length} link(s) failed to download`);
    this.name = 'AllLinksFailedError';
    this.failures = failures;
  }
}

export class AllUploadsFailedError extends Error {
  readonly failures: string[];

  constructor(failures: string[]) {
    super(`All ${failures.length} file(s) failed to upload`);
    this.name = 'AllUploadsFailedError';
    this.failures = failures;
  }
}

export class InvalidTransitionError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid status transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
