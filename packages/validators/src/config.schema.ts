import { z } from "zod";

// Plain or schema-qualified SQL identifier; these are interpolated into the query.
const sqlIdentifierSchema = z
  .string()
  .regex(
    /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/,
    "Must be a plain SQL identifier"
  );

const portSchema = z.coerce.number().int().min(1).max(65535).default(5432);

const idListSchema = z
  .string()
  .regex(/^\d+(\s*,\s*\d+)*$/, "Must be a comma-separated list of integers")
  .transform((value) => value.split(",").map((id) => Number(id.trim())));

export const syncEnvSchema = z.object({
  SOURCE_A_LABEL: z.string().default("Source A"),
  SOURCE_A_DB_HOST: z.string(),
  SOURCE_A_DB_PORT: portSchema,
  SOURCE_A_DB_NAME: z.string(),
  SOURCE_A_DB_USER: z.string(),
  SOURCE_A_DB_PASSWORD: z.string(),

  SOURCE_B_LABEL: z.string().default("Source B"),
  SOURCE_B_DB_HOST: z.string(),
  SOURCE_B_DB_PORT: portSchema,
  SOURCE_B_DB_NAME: z.string(),
  SOURCE_B_DB_USER: z.string(),
  SOURCE_B_DB_PASSWORD: z.string(),

  ORDERS_TABLE: sqlIdentifierSchema.default("orders_hist"),
  ORDERS_DATE_COLUMN: sqlIdentifierSchema.default("fo_day"),
  ORDERS_TOTAL_COLUMN: sqlIdentifierSchema.default("order_total"),
  ORDERS_STATUS_COLUMN: sqlIdentifierSchema.default("sp_id"),
  ORDERS_STATUS_IDS: idListSchema.optional(),
  ORDERS_PAYMENT_COLUMN: sqlIdentifierSchema.default("payment_id"),
  ORDERS_PAYMENT_ID: z.coerce.number().int().optional(),

  GOOGLE_SHEET_ID: z.string(),
  GOOGLE_SHEET_NAME: z.string().optional(),
  GOOGLE_CREDENTIALS_FILE: z.string().default("credentials.json"),

  SYNC_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type SyncEnvInput = z.input<typeof syncEnvSchema>;
export type SyncEnv = z.infer<typeof syncEnvSchema>;
