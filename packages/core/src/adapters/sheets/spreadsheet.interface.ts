import type { SyncRowValues } from "@ordersync/types";
import type { ConnectionCheck } from "../source.adapter";

export interface AppendResult {
  /** A1 range the new row landed in, e.g. `Ledger!A42:C42` */
  updatedRange: string;
}

export interface SpreadsheetAppender {
  readonly documentId: string;
  /** Insert one row after the last populated row. Never overwrites. */
  appendRow(values: SyncRowValues): Promise<AppendResult>;
  testConnection(): Promise<ConnectionCheck>;
}
