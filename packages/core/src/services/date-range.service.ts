import { format } from "date-fns";
import type { DateRange } from "@ordersync/types";
import {
  ISO_DATE_FORMAT,
  syncRequestSchema,
  type SyncRequestInput,
} from "@ordersync/validators";
import { ValidationError } from "../errors";

/** Joins the ends of a multi-day range label: `2025-12-01..2025-12-10` */
export const RANGE_LABEL_SEPARATOR = "..";

/**
 * Resolve CLI dates into an inclusive range.
 * A single given date becomes a one-day range; no dates means today in local time.
 */
export function resolveDateRange(
  input: SyncRequestInput,
  now: Date = new Date()
): DateRange {
  const parsed = syncRequestSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "dates"}: ${issue.message}`
    );
    throw new ValidationError({
      message: `Invalid date range: ${details.join("; ")}`,
      details,
    });
  }

  const { fromDate, toDate } = parsed.data;
  const from = fromDate ?? toDate ?? format(now, ISO_DATE_FORMAT);
  const to = toDate ?? from;

  return Object.freeze({ from, to });
}

export function formatRangeLabel(range: DateRange): string {
  return range.from === range.to
    ? range.from
    : `${range.from}${RANGE_LABEL_SEPARATOR}${range.to}`;
}
