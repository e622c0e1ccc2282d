import { z } from "zod";
import { isValid, parse } from "date-fns";

export const ISO_DATE_FORMAT = "yyyy-MM-dd";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** True for YYYY-MM-DD strings naming a real calendar day (rejects 2025-02-30). */
export function isCalendarDate(value: string): boolean {
  return (
    ISO_DATE_PATTERN.test(value) &&
    isValid(parse(value, ISO_DATE_FORMAT, new Date()))
  );
}

export const isoDateSchema = z.string().refine(isCalendarDate, {
  message: "Expected a calendar date in YYYY-MM-DD format",
});

export const syncRequestSchema = z
  .object({
    fromDate: isoDateSchema.optional(),
    toDate: isoDateSchema.optional(),
  })
  .refine(
    ({ fromDate, toDate }) => !fromDate || !toDate || fromDate <= toDate,
    { message: "fromDate must be on or before toDate", path: ["toDate"] }
  );

export type SyncRequestInput = z.infer<typeof syncRequestSchema>;
