import type { SourceId } from "@ordersync/types";
import type { SyncConfig } from "./config";
import type { OrdersSourceAdapter } from "./adapters/source.adapter";
import type { SpreadsheetAppender } from "./adapters/sheets/spreadsheet.interface";

export interface SyncContext {
  config: SyncConfig;
  sources: Record<SourceId, OrdersSourceAdapter>;
  spreadsheet: SpreadsheetAppender;
}
