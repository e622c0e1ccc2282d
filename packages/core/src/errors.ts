import { SyncErrorCode, type SyncState } from "@ordersync/types";

export interface SyncErrorOptions {
  message: string;
  /** Label of the data source or "spreadsheet" */
  source?: string;
  details?: string[];
  cause?: unknown;
}

/**
 * Base class for every failure that aborts a sync run.
 * `stage` is filled in by the orchestrator with the state it was trying to reach.
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly source?: string;
  readonly details: string[];
  stage?: SyncState;

  constructor(code: SyncErrorCode, opts: SyncErrorOptions) {
    super(opts.message, { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.source = opts.source;
    this.details = opts.details ?? [];
  }
}

export class ValidationError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.VALIDATION, opts);
  }
}

export class ConfigurationError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.CONFIGURATION, opts);
  }
}

export class ConnectionError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.CONNECTION, opts);
  }
}

export class QueryError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.QUERY, opts);
  }
}

export class TimeoutError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.TIMEOUT, opts);
  }
}

export class SpreadsheetAuthError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.SPREADSHEET_AUTH, opts);
  }
}

export class SpreadsheetPermissionError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.SPREADSHEET_PERMISSION, opts);
  }
}

export class SpreadsheetNotFoundError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.SPREADSHEET_NOT_FOUND, opts);
  }
}

export class SpreadsheetAppendError extends SyncError {
  constructor(opts: SyncErrorOptions) {
    super(SyncErrorCode.SPREADSHEET_APPEND, opts);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One-line description: `CODE (stage, source): message` */
export function describeSyncError(err: SyncError): string {
  const context = [err.stage, err.source].filter(Boolean).join(", ");
  return context ? `${err.code} (${context}): ${err.message}` : `${err.code}: ${err.message}`;
}
