import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors";
import { formatRangeLabel, resolveDateRange } from "./date-range.service";

// Local time, so "today" is 2025-12-10 whatever the machine's timezone.
const now = new Date(2025, 11, 10, 23, 30);

describe("resolveDateRange", () => {
  it("defaults to today when no dates are given", () => {
    expect(resolveDateRange({}, now)).toEqual({ from: "2025-12-10", to: "2025-12-10" });
  });

  it("uses the current local date by default", () => {
    const today = new Date();
    const expected = [
      today.getFullYear(),
      String(today.getMonth() + 1).padStart(2, "0"),
      String(today.getDate()).padStart(2, "0"),
    ].join("-");

    const range = resolveDateRange({});
    expect(range.from).toBe(expected);
    expect(range.to).toBe(expected);
  });

  it("turns a lone fromDate into a one-day range", () => {
    expect(resolveDateRange({ fromDate: "2025-11-03" }, now)).toEqual({
      from: "2025-11-03",
      to: "2025-11-03",
    });
  });

  it("turns a lone toDate into a one-day range", () => {
    expect(resolveDateRange({ toDate: "2025-11-04" }, now)).toEqual({
      from: "2025-11-04",
      to: "2025-11-04",
    });
  });

  it("returns an ordered pair unchanged", () => {
    const pairs: Array<[string, string]> = [
      ["2025-12-01", "2025-12-10"],
      ["2025-12-10", "2025-12-10"],
      ["2024-12-31", "2025-01-01"],
      ["2024-02-28", "2024-02-29"],
    ];
    for (const [fromDate, toDate] of pairs) {
      expect(resolveDateRange({ fromDate, toDate }, now)).toEqual({ from: fromDate, to: toDate });
    }
  });

  it("rejects an inverted pair", () => {
    expect(() =>
      resolveDateRange({ fromDate: "2025-12-10", toDate: "2025-12-09" }, now)
    ).toThrowError(ValidationError);
  });

  it("rejects dates that are not on the calendar", () => {
    try {
      resolveDateRange({ fromDate: "2025-02-30", toDate: "2025-03-01" }, now);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.details[0]).toBe("fromDate: Expected a calendar date in YYYY-MM-DD format");
        expect(err.message).toContain("Invalid date range: fromDate:");
      }
    }
  });

  it("returns a frozen range", () => {
    expect(Object.isFrozen(resolveDateRange({}, now))).toBe(true);
  });
});

describe("formatRangeLabel", () => {
  it("renders a single day as that date", () => {
    expect(formatRangeLabel({ from: "2025-12-10", to: "2025-12-10" })).toBe("2025-12-10");
  });

  it("joins a multi-day range with ..", () => {
    expect(formatRangeLabel({ from: "2025-12-01", to: "2025-12-10" })).toBe(
      "2025-12-01..2025-12-10"
    );
  });
});
