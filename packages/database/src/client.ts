import { Client } from "pg";

export interface DatabaseParams {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

/**
 * The slice of a PostgreSQL client the order sources need.
 * Tests substitute an in-process fake.
 */
export interface OrdersConnection {
  query(text: string, values: readonly unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export type ConnectFn = (
  params: DatabaseParams,
  timeoutMs: number
) => Promise<OrdersConnection>;

/**
 * Open a single read-only connection.
 * `timeoutMs` bounds both the connect handshake and each query.
 */
export const openOrdersConnection: ConnectFn = async (params, timeoutMs) => {
  const client = new Client({
    host: params.host,
    port: params.port,
    database: params.database,
    user: params.user,
    password: params.password,
    connectionTimeoutMillis: timeoutMs,
    query_timeout: timeoutMs,
    statement_timeout: timeoutMs,
    application_name: "order-totals-sync",
  });

  await client.connect();

  return {
    async query(text, values) {
      const result = await client.query(text, [...values]);
      return { rows: result.rows };
    },
    end: () => client.end(),
  };
};

const TIMEOUT_MESSAGES = [
  "connection timeout",
  "Query read timeout",
  "canceling statement due to statement timeout",
];

/** pg reports its own timeouts as plain Errors; recognise them by message or code. */
export function isDriverTimeout(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = errorCodeOf(err);
  if (code === "57014" || code === "ETIMEDOUT") return true;
  return TIMEOUT_MESSAGES.some((m) => err.message.includes(m));
}

/** SQLSTATE of a server error, or the errno code of a socket error */
export function errorCodeOf(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
