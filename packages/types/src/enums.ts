/** The two independently administered order databases */
export const SourceId = {
  A: "A",
  B: "B",
} as const;
export type SourceId = (typeof SourceId)[keyof typeof SourceId];

/** Orchestrator states, in the order a successful run visits them */
export const SyncState = {
  INIT: "INIT",
  RANGE_RESOLVED: "RANGE_RESOLVED",
  SOURCE_A_QUERIED: "SOURCE_A_QUERIED",
  SOURCE_B_QUERIED: "SOURCE_B_QUERIED",
  ROW_APPENDED: "ROW_APPENDED",
  DONE: "DONE",
  FAILED: "FAILED",
} as const;
export type SyncState = (typeof SyncState)[keyof typeof SyncState];

export const SyncErrorCode = {
  VALIDATION: "VALIDATION",
  CONFIGURATION: "CONFIGURATION",
  CONNECTION: "CONNECTION",
  QUERY: "QUERY",
  TIMEOUT: "TIMEOUT",
  SPREADSHEET_AUTH: "SPREADSHEET_AUTH",
  SPREADSHEET_PERMISSION: "SPREADSHEET_PERMISSION",
  SPREADSHEET_NOT_FOUND: "SPREADSHEET_NOT_FOUND",
  SPREADSHEET_APPEND: "SPREADSHEET_APPEND",
} as const;
export type SyncErrorCode = (typeof SyncErrorCode)[keyof typeof SyncErrorCode];

/** Process exit status per error code. 0 is success, 1 is anything unclassified. */
export const EXIT_CODES: Record<SyncErrorCode, number> = {
  VALIDATION: 2,
  CONFIGURATION: 3,
  CONNECTION: 4,
  QUERY: 5,
  TIMEOUT: 6,
  SPREADSHEET_AUTH: 7,
  SPREADSHEET_PERMISSION: 8,
  SPREADSHEET_NOT_FOUND: 9,
  SPREADSHEET_APPEND: 10,
};
