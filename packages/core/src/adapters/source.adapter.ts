import type { DateRange, SourceId, SourceTotal } from "@ordersync/types";

export interface ConnectionCheck {
  ok: boolean;
  error?: string;
}

/**
 * Order source adapter interface.
 * Each database the sync reads from implements this contract.
 */
export interface OrdersSourceAdapter {
  readonly sourceId: SourceId;
  readonly label: string;

  /** Sum of order totals with an order date inside the range, inclusive. Zero when nothing matches. */
  fetchTotal(range: DateRange): Promise<SourceTotal>;

  /** Test connectivity / credentials */
  testConnection(): Promise<ConnectionCheck>;
}
