/**
 * Tests for calendar dates.
 */

import { describe, it, expect } from "vitest";
import {
  daysBetween,
  daysInMonth,
  formatDate,
  formatTimestamp,
  isValidDate,
  monthBounds,
  parseDate,
  todayIn,
} from "../src/calendar.js";
import { LedgerError } from "../src/types.js";

describe("isValidDate", () => {
  it("accepts real calendar days", () => {
    expect(isValidDate("2024-03-05")).toBe(true);
    expect(isValidDate("2024-02-29")).toBe(true);
    expect(isValidDate("0001-01-01")).toBe(true);
  });

  it("rejects impossible days", () => {
    expect(isValidDate("2023-02-29")).toBe(false);
    expect(isValidDate("2024-04-31")).toBe(false);
    expect(isValidDate("2024-13-01")).toBe(false);
    expect(isValidDate("2024-00-10")).toBe(false);
    expect(isValidDate("0000-01-01")).toBe(false);
  });

  it("requires zero-padded YYYY-MM-DD", () => {
    expect(isValidDate("2024-3-5")).toBe(false);
    expect(isValidDate("05/03/2024")).toBe(false);
    expect(isValidDate("2024-03-05T00:00:00")).toBe(false);
    expect(isValidDate("")).toBe(false);
  });
});

describe("parseDate", () => {
  it("splits into numeric parts", () => {
    expect(parseDate("2024-12-31")).toEqual({ year: 2024, month: 12, day: 31 });
  });
});

describe("daysInMonth", () => {
  it("follows the leap-year rule", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
  });
});

describe("daysBetween", () => {
  it("counts whole days forward and backward", () => {
    expect(daysBetween("2024-03-10", "2024-03-05")).toBe(-5);
    expect(daysBetween("2024-03-05", "2024-03-05")).toBe(0);
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
  });

  it("crosses year boundaries", () => {
    expect(daysBetween("2023-12-31", "2024-01-01")).toBe(1);
  });

  it("throws INVALID_DATE on malformed input", () => {
    expect(() => daysBetween("2024-03-xx", "2024-03-05")).toThrow(LedgerError);
  });
});

describe("monthBounds", () => {
  it("bounds leap-year February", () => {
    expect(monthBounds(2024, 2)).toEqual({ startDate: "2024-02-01", endDate: "2024-02-29" });
  });

  it("bounds a common-year February", () => {
    expect(monthBounds(2023, 2)).toEqual({ startDate: "2023-02-01", endDate: "2023-02-28" });
  });

  it("rolls December over the year", () => {
    expect(monthBounds(2023, 12)).toEqual({ startDate: "2023-12-01", endDate: "2023-12-31" });
  });

  it("bounds thirty-day months", () => {
    expect(monthBounds(2024, 4)).toEqual({ startDate: "2024-04-01", endDate: "2024-04-30" });
  });

  it("rejects out-of-range months and years", () => {
    expect(() => monthBounds(2024, 13)).toThrow(LedgerError);
    expect(() => monthBounds(2024, 0)).toThrow(LedgerError);
    expect(() => monthBounds(0, 5)).toThrow(LedgerError);
    expect(() => monthBounds(2024.5, 5)).toThrow(LedgerError);
  });
});

describe("formatting", () => {
  const moment = new Date(2024, 2, 5, 9, 7, 3);

  it("formats the local calendar day", () => {
    expect(formatDate(moment)).toBe("2024-03-05");
  });

  it("formats local wall-clock timestamps", () => {
    expect(formatTimestamp(moment)).toBe("2024-03-05 09:07:03");
  });

  it("reads today from the clock", () => {
    expect(todayIn(() => moment)).toBe("2024-03-05");
  });
});
