/**
 * PostgreSQL orders adapter
 * Aggregates order totals server-side, one connection per call.
 */

import { z } from "zod";
import {
  errorCodeOf,
  isDriverTimeout,
  openOrdersConnection,
  type ConnectFn,
  type OrdersConnection,
} from "@ordersync/database";
import type { DateRange, SourceId, SourceTotal } from "@ordersync/types";
import type { OrdersQueryConfig, SourceConfig, SyncConfig } from "../config";
import {
  ConnectionError,
  QueryError,
  SyncError,
  TimeoutError,
  errorMessage,
} from "../errors";
import { withTimeout } from "../lib/with-timeout";
import type { ConnectionCheck, OrdersSourceAdapter } from "./source.adapter";

export interface TotalQuery {
  text: string;
  values: unknown[];
}

// ROUND(...)::text keeps the decimal exact until it is parsed here.
const totalRowsSchema = z
  .array(
    z.object({
      total: z.string().regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal"),
    })
  )
  .length(1);

export function quoteIdentifier(identifier: string): string {
  return identifier
    .split(".")
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join(".");
}

/**
 * Build the aggregation query. `to` is inclusive: rows before the start of
 * the following day match, which works for both date and timestamp columns.
 */
export function buildTotalQuery(
  orders: OrdersQueryConfig,
  range: DateRange
): TotalQuery {
  const total = quoteIdentifier(orders.totalColumn);
  const date = quoteIdentifier(orders.dateColumn);
  const values: unknown[] = [range.from, range.to];
  const conditions = [
    `${total} IS NOT NULL`,
    `${date} >= $1::date`,
    `${date} < ($2::date + 1)`,
  ];

  if (orders.statusIds.length > 0) {
    values.push(orders.statusIds);
    conditions.push(
      `${quoteIdentifier(orders.statusColumn)} = ANY($${values.length}::int[])`
    );
  }

  if (orders.paymentId !== undefined) {
    values.push(orders.paymentId);
    conditions.push(`${quoteIdentifier(orders.paymentColumn)} = $${values.length}`);
  }

  const text = [
    `SELECT ROUND(COALESCE(SUM(${total}), 0)::numeric, 2)::text AS total`,
    `FROM ${quoteIdentifier(orders.table)}`,
    `WHERE ${conditions.join("\n  AND ")}`,
  ].join("\n");

  return { text, values };
}

export class PostgresOrdersAdapter implements OrdersSourceAdapter {
  readonly sourceId: SourceId;
  readonly label: string;

  constructor(
    private source: SourceConfig,
    private config: Pick<SyncConfig, "orders" | "timeoutMs">,
    private connect: ConnectFn = openOrdersConnection
  ) {
    this.sourceId = source.id;
    this.label = source.label;
  }

  async fetchTotal(range: DateRange): Promise<SourceTotal> {
    const conn = await this.open();
    try {
      const { text, values } = buildTotalQuery(this.config.orders, range);
      const { rows } = await withTimeout(
        conn.query(text, values),
        this.config.timeoutMs,
        () => this.timeoutError("query")
      );
      return {
        sourceId: this.sourceId,
        label: this.label,
        range,
        amount: this.parseTotal(rows),
      };
    } catch (err) {
      throw this.toQueryError(err);
    } finally {
      await this.close(conn);
    }
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      const conn = await this.open();
      try {
        await withTimeout(conn.query("SELECT 1", []), this.config.timeoutMs, () =>
          this.timeoutError("query")
        );
      } finally {
        await this.close(conn);
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  // The driver's connectionTimeoutMillis bounds the handshake.
  private async open(): Promise<OrdersConnection> {
    const { host, database } = this.source.database;
    try {
      return await this.connect(this.source.database, this.config.timeoutMs);
    } catch (err) {
      if (isDriverTimeout(err)) throw this.timeoutError("connect", err);
      throw new ConnectionError({
        message: `Cannot connect to ${this.label} (${host}/${database}): ${errorMessage(err)}`,
        source: this.label,
        cause: err,
      });
    }
  }

  private async close(conn: OrdersConnection): Promise<void> {
    try {
      await conn.end();
    } catch (err) {
      console.warn(`[${this.label}] Closing connection failed:`, errorMessage(err));
    }
  }

  private parseTotal(rows: unknown[]): number {
    const parsed = totalRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new QueryError({
        message: `${this.label} returned an unexpected total: ${JSON.stringify(rows)}`,
        source: this.label,
      });
    }
    return Number(parsed.data[0].total);
  }

  private toQueryError(err: unknown): SyncError {
    if (err instanceof SyncError) return err;
    if (isDriverTimeout(err)) return this.timeoutError("query", err);

    const code = errorCodeOf(err);
    return new QueryError({
      message: `Query against ${this.label} failed${code ? ` [${code}]` : ""}: ${errorMessage(err)}`,
      source: this.label,
      cause: err,
    });
  }

  private timeoutError(phase: "connect" | "query", cause?: unknown): TimeoutError {
    return new TimeoutError({
      message: `${this.label} ${phase} timed out after ${this.config.timeoutMs} ms`,
      source: this.label,
      cause,
    });
  }
}
