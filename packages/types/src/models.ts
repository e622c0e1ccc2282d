import type { SourceId } from "./enums";

/** Inclusive range of local calendar dates, both ends as YYYY-MM-DD */
export interface DateRange {
  readonly from: string;
  readonly to: string;
}

/** Aggregated order total from one source. Lives only for the duration of a run. */
export interface SourceTotal {
  sourceId: SourceId;
  label: string;
  range: DateRange;
  amount: number;
}

/** The row appended to the ledger spreadsheet */
export interface SyncRecord {
  rangeLabel: string;
  amountA: number;
  amountB: number;
}

export type SyncRowValues = [rangeLabel: string, amountA: number, amountB: number];
