import { describe, it, expect } from "vitest";
import { isCalendarDate, syncRequestSchema } from "./date-range.schema";

describe("isCalendarDate", () => {
  it("accepts real calendar days", () => {
    expect(isCalendarDate("2025-12-10")).toBe(true);
    expect(isCalendarDate("2024-02-29")).toBe(true);
  });

  it("rejects impossible days and other formats", () => {
    expect(isCalendarDate("2025-02-30")).toBe(false);
    expect(isCalendarDate("2025-13-01")).toBe(false);
    expect(isCalendarDate("2025-2-3")).toBe(false);
    expect(isCalendarDate("12/10/2025")).toBe(false);
    expect(isCalendarDate("2025-12-10T00:00:00Z")).toBe(false);
    expect(isCalendarDate("")).toBe(false);
  });
});

describe("syncRequestSchema", () => {
  it("allows both dates to be omitted", () => {
    expect(syncRequestSchema.parse({})).toEqual({});
  });

  it("keeps an ordered pair unchanged", () => {
    expect(
      syncRequestSchema.parse({ fromDate: "2025-12-01", toDate: "2025-12-10" })
    ).toEqual({ fromDate: "2025-12-01", toDate: "2025-12-10" });
  });

  it("accepts equal dates", () => {
    const result = syncRequestSchema.safeParse({
      fromDate: "2025-12-10",
      toDate: "2025-12-10",
    });
    expect(result.success).toBe(true);
  });

  it("rejects an inverted pair on toDate", () => {
    const result = syncRequestSchema.safeParse({
      fromDate: "2025-12-10",
      toDate: "2025-12-01",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0].path).toEqual(["toDate"]);
      expect(result.error.issues[0].message).toBe(
        "fromDate must be on or before toDate"
      );
    }
  });

  it("reports the offending field for a malformed date", () => {
    const result = syncRequestSchema.safeParse({ fromDate: "2025-02-30" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["fromDate"]);
      expect(result.error.issues[0].message).toBe(
        "Expected a calendar date in YYYY-MM-DD format"
      );
    }
  });
});
