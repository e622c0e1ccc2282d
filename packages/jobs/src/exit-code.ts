import { SyncError, describeSyncError, errorMessage } from "@ordersync/core";
import { EXIT_CODES } from "@ordersync/types";

export function exitCodeFor(err: unknown): number {
  return err instanceof SyncError ? EXIT_CODES[err.code] : 1;
}

export function describeFailure(err: unknown): string {
  return err instanceof SyncError
    ? describeSyncError(err)
    : `Unexpected error: ${errorMessage(err)}`;
}
