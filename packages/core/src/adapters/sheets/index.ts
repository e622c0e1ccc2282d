export type { SpreadsheetAppender, AppendResult } from "./spreadsheet.interface";
export {
  GoogleSheetsAdapter,
  quoteSheetTitle,
  toSpreadsheetError,
  type SheetsHandle,
  type GoogleSheetsAdapterOptions,
} from "./google-sheets.adapter";

import { google } from "googleapis";
import type { SyncConfig } from "../../config";
import { GoogleSheetsAdapter } from "./google-sheets.adapter";
import type { SpreadsheetAppender } from "./spreadsheet.interface";

export const SHEETS_SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

/** Authenticate with the service-account key file and wrap the Sheets client. */
export function createSpreadsheetAppender(config: SyncConfig): SpreadsheetAppender {
  const auth = new google.auth.GoogleAuth({
    keyFile: config.spreadsheet.credentialsFile,
    scopes: SHEETS_SCOPES,
  });
  const sheets = google.sheets({ version: "v4", auth, timeout: config.timeoutMs });

  return new GoogleSheetsAdapter(sheets, {
    documentId: config.spreadsheet.documentId,
    sheetName: config.spreadsheet.sheetName,
    timeoutMs: config.timeoutMs,
  });
}
