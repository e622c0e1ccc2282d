/**
 * In-process stand-ins for the order databases and the ledger spreadsheet.
 * Test-only; imported as "@ordersync/core/testing".
 */

import {
  SourceId,
  type DateRange,
  type SourceTotal,
  type SyncRowValues,
} from "@ordersync/types";
import type { SyncConfig } from "./config";
import type { SyncContext } from "./context";
import type { ConnectionCheck, OrdersSourceAdapter } from "./adapters/source.adapter";
import type { AppendResult, SpreadsheetAppender } from "./adapters/sheets/spreadsheet.interface";
import { errorMessage } from "./errors";

type TotalBehaviour = number | Error | ((range: DateRange) => Promise<number>);

export class FakeOrdersSource implements OrdersSourceAdapter {
  readonly calls: DateRange[] = [];

  constructor(
    readonly sourceId: SourceId,
    readonly label: string,
    private behaviour: TotalBehaviour
  ) {}

  async fetchTotal(range: DateRange): Promise<SourceTotal> {
    this.calls.push(range);
    const amount = await this.amountFor(range);
    return { sourceId: this.sourceId, label: this.label, range, amount };
  }

  async testConnection(): Promise<ConnectionCheck> {
    return this.behaviour instanceof Error
      ? { ok: false, error: this.behaviour.message }
      : { ok: true };
  }

  private async amountFor(range: DateRange): Promise<number> {
    if (this.behaviour instanceof Error) throw this.behaviour;
    if (typeof this.behaviour === "function") return this.behaviour(range);
    return this.behaviour;
  }
}

export class MemorySpreadsheet implements SpreadsheetAppender {
  readonly documentId = "test-sheet";
  readonly rows: SyncRowValues[] = [];

  constructor(private failure?: Error) {}

  async appendRow(values: SyncRowValues): Promise<AppendResult> {
    if (this.failure) throw this.failure;
    this.rows.push(values);
    const row = this.rows.length;
    return { updatedRange: `Sheet1!A${row}:C${row}` };
  }

  async testConnection(): Promise<ConnectionCheck> {
    return this.failure ? { ok: false, error: errorMessage(this.failure) } : { ok: true };
  }
}

export const testConfig: SyncConfig = {
  sources: {
    A: {
      id: SourceId.A,
      label: "North Store",
      database: { host: "db-a.test", port: 5432, database: "orders_a", user: "reader", password: "test-secret" },
    },
    B: {
      id: SourceId.B,
      label: "South Store",
      database: { host: "db-b.test", port: 5432, database: "orders_b", user: "reader", password: "test-secret" },
    },
  },
  orders: {
    table: "orders_hist",
    dateColumn: "fo_day",
    totalColumn: "order_total",
    statusColumn: "sp_id",
    statusIds: [],
    paymentColumn: "payment_id",
  },
  spreadsheet: {
    documentId: "test-sheet",
    credentialsFile: "/tmp/test-credentials.json",
  },
  timeoutMs: 1_000,
};

export function createTestContext(parts: {
  A: OrdersSourceAdapter;
  B: OrdersSourceAdapter;
  spreadsheet: SpreadsheetAppender;
}): SyncContext {
  return {
    config: testConfig,
    sources: { A: parts.A, B: parts.B },
    spreadsheet: parts.spreadsheet,
  };
}
