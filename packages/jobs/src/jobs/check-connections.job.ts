import type { ConnectionCheck, SyncContext } from "@ordersync/core";

export interface ConnectionReport extends ConnectionCheck {
  name: string;
}

/** Probe both databases and the spreadsheet without writing anything. */
export async function runCheckConnectionsJob(
  ctx: SyncContext
): Promise<ConnectionReport[]> {
  const targets = [
    { name: ctx.sources.A.label, probe: ctx.sources.A },
    { name: ctx.sources.B.label, probe: ctx.sources.B },
    { name: `Google Sheets ${ctx.spreadsheet.documentId}`, probe: ctx.spreadsheet },
  ];

  const results: ConnectionReport[] = [];
  for (const { name, probe } of targets) {
    const check = await probe.testConnection();
    if (check.ok) {
      console.log(`[check] ${name}: ok`);
    } else {
      console.error(`[check] ${name}: ${check.error}`);
    }
    results.push({ name, ...check });
  }

  return results;
}
