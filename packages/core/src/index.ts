export * from "./errors";
export { loadConfig } from "./config";
export type {
  SyncConfig,
  SourceConfig,
  OrdersQueryConfig,
  SpreadsheetConfig,
  LoadConfigOptions,
} from "./config";
export type { SyncContext } from "./context";
export { createSyncContext } from "./context-factory";

export type { OrdersSourceAdapter, ConnectionCheck } from "./adapters/source.adapter";
export {
  PostgresOrdersAdapter,
  buildTotalQuery,
  quoteIdentifier,
  type TotalQuery,
} from "./adapters/postgres-orders.adapter";
export * from "./adapters/sheets";

export {
  resolveDateRange,
  formatRangeLabel,
  RANGE_LABEL_SEPARATOR,
} from "./services/date-range.service";
export {
  SyncService,
  buildSyncRecord,
  toRowValues,
  type SyncReport,
  type SyncServiceOptions,
  type SyncTransition,
} from "./services/sync.service";
export { withTimeout } from "./lib/with-timeout";
