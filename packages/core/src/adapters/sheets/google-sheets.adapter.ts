/**
 * Google Sheets adapter
 * Appends ledger rows through the Sheets v4 values.append endpoint.
 */

import type { sheets_v4 } from "googleapis";
import type { SyncRowValues } from "@ordersync/types";
import {
  SpreadsheetAppendError,
  SpreadsheetAuthError,
  SpreadsheetNotFoundError,
  SpreadsheetPermissionError,
  SyncError,
  TimeoutError,
  errorMessage,
} from "../../errors";
import { withTimeout } from "../../lib/with-timeout";
import type { ConnectionCheck } from "../source.adapter";
import type { AppendResult, SpreadsheetAppender } from "./spreadsheet.interface";

const SOURCE = "spreadsheet";

/** The part of the googleapis Sheets client this adapter calls */
export interface SheetsHandle {
  spreadsheets: {
    get(
      params: sheets_v4.Params$Resource$Spreadsheets$Get
    ): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    values: {
      append(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Append
      ): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
    };
  };
}

export interface GoogleSheetsAdapterOptions {
  documentId: string;
  sheetName?: string;
  timeoutMs: number;
}

export class GoogleSheetsAdapter implements SpreadsheetAppender {
  readonly documentId: string;

  constructor(
    private sheets: SheetsHandle,
    private options: GoogleSheetsAdapterOptions
  ) {
    this.documentId = options.documentId;
  }

  async appendRow(values: SyncRowValues): Promise<AppendResult> {
    const sheetTitle = await this.resolveSheetTitle();

    const response = await this.call("append", () =>
      this.sheets.spreadsheets.values.append({
        spreadsheetId: this.documentId,
        range: `${quoteSheetTitle(sheetTitle)}!A1`,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: [values] },
      })
    );

    const updatedRows = response.data.updates?.updatedRows ?? 0;
    const updatedRange = response.data.updates?.updatedRange;
    if (updatedRows !== 1 || !updatedRange) {
      throw new SpreadsheetAppendError({
        message: `Append to ${this.documentId} reported ${updatedRows} updated row(s), expected 1`,
        source: SOURCE,
      });
    }

    return { updatedRange };
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      await this.resolveSheetTitle();
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  /** Configured sheet if set, else the first sheet of the document */
  private async resolveSheetTitle(): Promise<string> {
    const { data } = await this.call("lookup", () =>
      this.sheets.spreadsheets.get({
        spreadsheetId: this.documentId,
        fields: "sheets.properties.title",
      })
    );

    const titles = (data.sheets ?? [])
      .map((sheet) => sheet.properties?.title)
      .filter((title): title is string => typeof title === "string");

    const wanted = this.options.sheetName;
    if (wanted !== undefined) {
      if (titles.includes(wanted)) return wanted;
      throw new SpreadsheetNotFoundError({
        message: `Sheet "${wanted}" not found in document ${this.documentId}`,
        source: SOURCE,
      });
    }

    if (titles.length === 0) {
      throw new SpreadsheetNotFoundError({
        message: `Document ${this.documentId} has no sheets`,
        source: SOURCE,
      });
    }
    return titles[0];
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        request(),
        this.options.timeoutMs,
        () =>
          new TimeoutError({
            message: `Google Sheets ${operation} timed out after ${this.options.timeoutMs} ms`,
            source: SOURCE,
          })
      );
    } catch (err) {
      throw toSpreadsheetError(err, this.documentId, operation);
    }
  }
}

export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

const CREDENTIAL_FAILURES = [
  /invalid_grant/i,
  /invalid_client/i,
  /could not load the default credentials/i,
  /no key or keyfile set/i,
  /private key/i,
  /ENOENT/,
];

/** Map a googleapis / gaxios failure onto the spreadsheet error kinds. */
export function toSpreadsheetError(
  err: unknown,
  documentId: string,
  operation: string
): SyncError {
  if (err instanceof SyncError) return err;

  const status = httpStatusOf(err);
  const detail = errorMessage(err);
  const opts = { source: SOURCE, cause: err };

  switch (status) {
    case 401:
      return new SpreadsheetAuthError({ ...opts, message: `Google rejected the credentials: ${detail}` });
    case 403:
      return new SpreadsheetPermissionError({
        ...opts,
        message: `No permission to write to document ${documentId}: ${detail}`,
      });
    case 404:
      return new SpreadsheetNotFoundError({ ...opts, message: `Document ${documentId} not found: ${detail}` });
  }

  if (status === undefined) {
    if (CREDENTIAL_FAILURES.some((pattern) => pattern.test(detail))) {
      return new SpreadsheetAuthError({ ...opts, message: `Cannot authenticate with Google: ${detail}` });
    }
    if (/timeout|ETIMEDOUT/i.test(detail)) {
      return new TimeoutError({ ...opts, message: `Google Sheets ${operation} timed out: ${detail}` });
    }
  }

  return new SpreadsheetAppendError({
    ...opts,
    message: `Google Sheets ${operation} failed${status ? ` (HTTP ${status})` : ""}: ${detail}`,
  });
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (
    "response" in err &&
    typeof err.response === "object" &&
    err.response !== null &&
    "status" in err.response &&
    typeof err.response.status === "number"
  ) {
    return err.response.status;
  }
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("code" in err && typeof err.code === "number") return err.code;
  return undefined;
}
