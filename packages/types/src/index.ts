export { SourceId, SyncState, SyncErrorCode, EXIT_CODES } from "./enums";

export type {
  SourceId as SourceIdType,
  SyncState as SyncStateType,
  SyncErrorCode as SyncErrorCodeType,
} from "./enums";

export type { DateRange, SourceTotal, SyncRecord, SyncRowValues } from "./models";
