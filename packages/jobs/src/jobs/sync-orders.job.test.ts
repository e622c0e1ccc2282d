import { afterEach, describe, it, expect, vi } from "vitest";
import { ConnectionError } from "@ordersync/core";
import { FakeOrdersSource, MemorySpreadsheet, createTestContext } from "@ordersync/core/testing";
import { SourceId } from "@ordersync/types";
import { runSyncOrdersJob } from "./sync-orders.job";

const now = new Date(2025, 11, 10, 6, 0);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runSyncOrdersJob", () => {
  it("logs each step and returns the report", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const spreadsheet = new MemorySpreadsheet();
    const ctx = createTestContext({
      A: new FakeOrdersSource(SourceId.A, "North Store", 150),
      B: new FakeOrdersSource(SourceId.B, "South Store", 275.5),
      spreadsheet,
    });

    const report = await runSyncOrdersJob(ctx, { fromDate: "2025-12-01", toDate: "2025-12-10" }, now);

    expect(report.record).toEqual({
      rangeLabel: "2025-12-01..2025-12-10",
      amountA: 150,
      amountB: 275.5,
    });
    expect(spreadsheet.rows).toEqual([["2025-12-01..2025-12-10", 150, 275.5]]);
    expect(log.mock.calls.map((call) => call.join(" "))).toEqual([
      "[sync-orders] Starting order totals sync",
      "[sync-orders] Processing 2025-12-01..2025-12-10",
      "[sync-orders]   North Store total: 150.00",
      "[sync-orders]   South Store total: 275.50",
      "[sync-orders] Appended row to Sheet1!A1:C1",
      "[sync-orders] Done.",
    ]);
  });

  it("logs the failure point and rethrows", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const failure = new ConnectionError({ message: "unreachable", source: "South Store" });
    const spreadsheet = new MemorySpreadsheet();
    const ctx = createTestContext({
      A: new FakeOrdersSource(SourceId.A, "North Store", 150),
      B: new FakeOrdersSource(SourceId.B, "South Store", failure),
      spreadsheet,
    });

    await expect(runSyncOrdersJob(ctx, { parallel: true }, now)).rejects.toBe(failure);

    expect(error).toHaveBeenCalledWith("[sync-orders] Run failed after SOURCE_A_QUERIED");
    expect(spreadsheet.rows).toEqual([]);
  });
});
