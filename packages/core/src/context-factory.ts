import { PostgresOrdersAdapter } from "./adapters/postgres-orders.adapter";
import { createSpreadsheetAppender } from "./adapters/sheets";
import type { SyncConfig } from "./config";
import type { SyncContext } from "./context";

/**
 * Wire the production adapters from a loaded configuration.
 * No connection is opened until a source or the spreadsheet is used.
 */
export function createSyncContext(config: SyncConfig): SyncContext {
  return {
    config,
    sources: {
      A: new PostgresOrdersAdapter(config.sources.A, config),
      B: new PostgresOrdersAdapter(config.sources.B, config),
    },
    spreadsheet: createSpreadsheetAppender(config),
  };
}
