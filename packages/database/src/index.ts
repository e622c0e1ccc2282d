export {
  openOrdersConnection,
  isDriverTimeout,
  errorCodeOf,
} from "./client";
export type { DatabaseParams, OrdersConnection, ConnectFn } from "./client";
