/**
 * Sync Service
 * Resolves the range, queries both order sources, and appends a single
 * ledger row. Nothing is written unless both totals are in hand.
 *
 * INIT → RANGE_RESOLVED → SOURCE_A_QUERIED → SOURCE_B_QUERIED → ROW_APPENDED → DONE
 * Any failure moves straight to FAILED and is rethrown.
 */

import {
  SyncState,
  type DateRange,
  type SourceTotal,
  type SyncRecord,
  type SyncRowValues,
} from "@ordersync/types";
import type { SyncRequestInput } from "@ordersync/validators";
import type { SyncContext } from "../context";
import { SyncError } from "../errors";
import { formatRangeLabel, resolveDateRange } from "./date-range.service";

export interface SyncTransition {
  from: SyncState;
  to: SyncState;
  range?: DateRange;
  total?: SourceTotal;
  updatedRange?: string;
  error?: unknown;
}

export interface SyncServiceOptions {
  /** Query both sources at once. Row order is unaffected. */
  parallel?: boolean;
  onTransition?: (transition: SyncTransition) => void;
}

export interface SyncReport {
  range: DateRange;
  totals: [SourceTotal, SourceTotal];
  record: SyncRecord;
  updatedRange: string;
}

export function buildSyncRecord(
  range: DateRange,
  totalA: SourceTotal,
  totalB: SourceTotal
): SyncRecord {
  return {
    rangeLabel: formatRangeLabel(range),
    amountA: totalA.amount,
    amountB: totalB.amount,
  };
}

export function toRowValues(record: SyncRecord): SyncRowValues {
  return [record.rangeLabel, record.amountA, record.amountB];
}

/** Tracks one run's position in the state machine */
class RunTracker {
  state: SyncState = SyncState.INIT;
  target: SyncState = SyncState.RANGE_RESOLVED;

  constructor(private onTransition?: (transition: SyncTransition) => void) {}

  expect(next: SyncState) {
    this.target = next;
  }

  advance(detail: Omit<SyncTransition, "from" | "to"> = {}) {
    const from = this.state;
    this.state = this.target;
    this.onTransition?.({ from, to: this.state, ...detail });
  }

  fail(error: unknown) {
    if (error instanceof SyncError && error.stage === undefined) {
      error.stage = this.target;
    }
    const from = this.state;
    this.state = SyncState.FAILED;
    this.onTransition?.({ from, to: SyncState.FAILED, error });
  }
}

export class SyncService {
  constructor(
    private ctx: SyncContext,
    private options: SyncServiceOptions = {}
  ) {}

  async run(request: SyncRequestInput = {}, now: Date = new Date()): Promise<SyncReport> {
    const run = new RunTracker(this.options.onTransition);

    try {
      const range = resolveDateRange(request, now);
      run.advance({ range });

      const [totalA, totalB] = await this.queryTotals(range, run);
      const record = buildSyncRecord(range, totalA, totalB);

      run.expect(SyncState.ROW_APPENDED);
      const { updatedRange } = await this.ctx.spreadsheet.appendRow(toRowValues(record));
      run.advance({ updatedRange });

      run.expect(SyncState.DONE);
      run.advance();

      return { range, totals: [totalA, totalB], record, updatedRange };
    } catch (err) {
      run.fail(err);
      throw err;
    }
  }

  private async queryTotals(
    range: DateRange,
    run: RunTracker
  ): Promise<[SourceTotal, SourceTotal]> {
    const { A, B } = this.ctx.sources;

    if (!this.options.parallel) {
      run.expect(SyncState.SOURCE_A_QUERIED);
      const totalA = await A.fetchTotal(range);
      run.advance({ total: totalA });

      run.expect(SyncState.SOURCE_B_QUERIED);
      const totalB = await B.fetchTotal(range);
      run.advance({ total: totalB });

      return [totalA, totalB];
    }

    // Two independent tasks, joined; results are placed by source, not by completion order.
    const [settledA, settledB] = await Promise.allSettled([
      A.fetchTotal(range),
      B.fetchTotal(range),
    ]);

    run.expect(SyncState.SOURCE_A_QUERIED);
    const totalA = unwrap(settledA);
    run.advance({ total: totalA });

    run.expect(SyncState.SOURCE_B_QUERIED);
    const totalB = unwrap(settledB);
    run.advance({ total: totalB });

    return [totalA, totalB];
  }
}

function unwrap<T>(result: PromiseSettledResult<T>): T {
  if (result.status === "rejected") throw result.reason;
  return result.value;
}
