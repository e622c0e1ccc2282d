import {
  SyncService,
  formatRangeLabel,
  type SyncContext,
  type SyncReport,
  type SyncTransition,
} from "@ordersync/core";
import { SyncState } from "@ordersync/types";

export interface SyncOrdersJobData {
  fromDate?: string;
  toDate?: string;
  parallel?: boolean;
}

const TAG = "[sync-orders]";

export async function runSyncOrdersJob(
  ctx: SyncContext,
  data: SyncOrdersJobData,
  now: Date = new Date()
): Promise<SyncReport> {
  console.log(`${TAG} Starting order totals sync${data.parallel ? " (parallel)" : ""}`);

  const service = new SyncService(ctx, {
    parallel: data.parallel,
    onTransition: logTransition,
  });
  const report = await service.run(
    { fromDate: data.fromDate, toDate: data.toDate },
    now
  );

  console.log(`${TAG} Done.`);
  return report;
}

export function logTransition(transition: SyncTransition) {
  switch (transition.to) {
    case SyncState.RANGE_RESOLVED:
      if (transition.range) {
        console.log(`${TAG} Processing ${formatRangeLabel(transition.range)}`);
      }
      break;
    case SyncState.SOURCE_A_QUERIED:
    case SyncState.SOURCE_B_QUERIED:
      if (transition.total) {
        console.log(
          `${TAG}   ${transition.total.label} total: ${transition.total.amount.toFixed(2)}`
        );
      }
      break;
    case SyncState.ROW_APPENDED:
      console.log(`${TAG} Appended row to ${transition.updatedRange}`);
      break;
    case SyncState.FAILED:
      console.error(`${TAG} Run failed after ${transition.from}`);
      break;
  }
}
