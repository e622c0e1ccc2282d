/**
 * Sync configuration
 *
 * Built once at process start from environment variables and passed to
 * every component. Nothing below this module reads process.env.
 */

import { existsSync } from "fs";
import path from "path";
import type { DatabaseParams } from "@ordersync/database";
import { SourceId } from "@ordersync/types";
import { syncEnvSchema, type SyncEnv } from "@ordersync/validators";
import { ConfigurationError } from "./errors";

export interface SourceConfig {
  id: SourceId;
  label: string;
  database: DatabaseParams;
}

export interface OrdersQueryConfig {
  table: string;
  dateColumn: string;
  totalColumn: string;
  statusColumn: string;
  /** Empty means no status filter */
  statusIds: number[];
  paymentColumn: string;
  paymentId?: number;
}

export interface SpreadsheetConfig {
  documentId: string;
  /** First sheet of the document when absent */
  sheetName?: string;
  credentialsFile: string;
}

export interface SyncConfig {
  sources: Record<SourceId, SourceConfig>;
  orders: OrdersQueryConfig;
  spreadsheet: SpreadsheetConfig;
  timeoutMs: number;
}

export interface LoadConfigOptions {
  cwd?: string;
  fileExists?: (filePath: string) => boolean;
}

export function loadConfig(
  env: Record<string, string | undefined>,
  options: LoadConfigOptions = {}
): SyncConfig {
  // An empty value in a .env file counts as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[1] !== undefined && entry[1].trim() !== ""
    )
  );

  const parsed = syncEnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError({
      message: `Missing or invalid environment variables: ${details.join("; ")}`,
      details,
    });
  }

  const config = toSyncConfig(parsed.data, options.cwd ?? process.cwd());

  const fileExists = options.fileExists ?? existsSync;
  if (!fileExists(config.spreadsheet.credentialsFile)) {
    throw new ConfigurationError({
      message: `Google credentials file not found: ${config.spreadsheet.credentialsFile}`,
      details: ["GOOGLE_CREDENTIALS_FILE"],
    });
  }

  return deepFreeze(config);
}

function toSyncConfig(env: SyncEnv, cwd: string): SyncConfig {
  return {
    sources: {
      A: {
        id: SourceId.A,
        label: env.SOURCE_A_LABEL,
        database: {
          host: env.SOURCE_A_DB_HOST,
          port: env.SOURCE_A_DB_PORT,
          database: env.SOURCE_A_DB_NAME,
          user: env.SOURCE_A_DB_USER,
          password: env.SOURCE_A_DB_PASSWORD,
        },
      },
      B: {
        id: SourceId.B,
        label: env.SOURCE_B_LABEL,
        database: {
          host: env.SOURCE_B_DB_HOST,
          port: env.SOURCE_B_DB_PORT,
          database: env.SOURCE_B_DB_NAME,
          user: env.SOURCE_B_DB_USER,
          password: env.SOURCE_B_DB_PASSWORD,
        },
      },
    },
    orders: {
      table: env.ORDERS_TABLE,
      dateColumn: env.ORDERS_DATE_COLUMN,
      totalColumn: env.ORDERS_TOTAL_COLUMN,
      statusColumn: env.ORDERS_STATUS_COLUMN,
      statusIds: env.ORDERS_STATUS_IDS ?? [],
      paymentColumn: env.ORDERS_PAYMENT_COLUMN,
      paymentId: env.ORDERS_PAYMENT_ID,
    },
    spreadsheet: {
      documentId: env.GOOGLE_SHEET_ID,
      sheetName: env.GOOGLE_SHEET_NAME,
      credentialsFile: path.resolve(cwd, env.GOOGLE_CREDENTIALS_FILE),
    },
    timeoutMs: env.SYNC_TIMEOUT_MS,
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}
