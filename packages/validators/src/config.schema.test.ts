import { describe, it, expect } from "vitest";
import { syncEnvSchema, type SyncEnvInput } from "./config.schema";

const baseEnv: SyncEnvInput = {
  SOURCE_A_DB_HOST: "db-a.internal",
  SOURCE_A_DB_NAME: "orders_a",
  SOURCE_A_DB_USER: "reader",
  SOURCE_A_DB_PASSWORD: "test-secret",
  SOURCE_B_DB_HOST: "db-b.internal",
  SOURCE_B_DB_NAME: "orders_b",
  SOURCE_B_DB_USER: "reader",
  SOURCE_B_DB_PASSWORD: "test-secret",
  GOOGLE_SHEET_ID: "sheet-123",
};

describe("syncEnvSchema", () => {
  it("fills in defaults for optional settings", () => {
    const env = syncEnvSchema.parse(baseEnv);

    expect(env.SOURCE_A_LABEL).toBe("Source A");
    expect(env.SOURCE_B_LABEL).toBe("Source B");
    expect(env.SOURCE_A_DB_PORT).toBe(5432);
    expect(env.ORDERS_TABLE).toBe("orders_hist");
    expect(env.ORDERS_DATE_COLUMN).toBe("fo_day");
    expect(env.ORDERS_TOTAL_COLUMN).toBe("order_total");
    expect(env.ORDERS_STATUS_IDS).toBeUndefined();
    expect(env.ORDERS_PAYMENT_ID).toBeUndefined();
    expect(env.GOOGLE_CREDENTIALS_FILE).toBe("credentials.json");
    expect(env.SYNC_TIMEOUT_MS).toBe(30_000);
  });

  it("coerces numeric settings from strings", () => {
    const env = syncEnvSchema.parse({
      ...baseEnv,
      SOURCE_B_DB_PORT: "6543",
      ORDERS_STATUS_IDS: "2, 3",
      ORDERS_PAYMENT_ID: "1",
      SYNC_TIMEOUT_MS: "5000",
    });

    expect(env.SOURCE_B_DB_PORT).toBe(6543);
    expect(env.ORDERS_STATUS_IDS).toEqual([2, 3]);
    expect(env.ORDERS_PAYMENT_ID).toBe(1);
    expect(env.SYNC_TIMEOUT_MS).toBe(5000);
  });

  it("accepts a schema-qualified table name", () => {
    const env = syncEnvSchema.parse({ ...baseEnv, ORDERS_TABLE: "sales.orders_hist" });
    expect(env.ORDERS_TABLE).toBe("sales.orders_hist");
  });

  it("rejects identifiers that are not plain names", () => {
    const result = syncEnvSchema.safeParse({
      ...baseEnv,
      ORDERS_TABLE: "orders; drop table orders",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.path.join("."))).toEqual(["ORDERS_TABLE"]);
    }
  });

  it("reports every missing variable", () => {
    const { GOOGLE_SHEET_ID: _sheet, SOURCE_B_DB_HOST: _host, ...partial } = baseEnv;
    const result = syncEnvSchema.safeParse(partial);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.path.join(".")).sort()).toEqual([
        "GOOGLE_SHEET_ID",
        "SOURCE_B_DB_HOST",
      ]);
    }
  });
});
