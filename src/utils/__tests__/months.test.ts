import { describe, it, expect } from "vitest";
import { ValidationError } from "@/lib/errors";
import {
  canonicalTimestampText,
  composeTimestamp,
  dateKeyOf,
  monthLabel,
  monthRange,
  parseTimestampText,
  shiftMonth,
  timeOfDayOf,
  toTimestampText,
} from "@/utils/months";

describe("monthRange", () => {
  it("spans from the first of the month to the first of the next", () => {
    const { start, end } = monthRange(2025, 3);
    expect(toTimestampText(start)).toBe("2025-03-01 00:00:00");
    expect(toTimestampText(end)).toBe("2025-04-01 00:00:00");
  });

  it("rolls December into January of the next year", () => {
    const { start, end } = monthRange(2024, 12);
    expect(toTimestampText(start)).toBe("2024-12-01 00:00:00");
    expect(toTimestampText(end)).toBe("2025-01-01 00:00:00");
  });

  it("handles short and leap-year February", () => {
    expect(toTimestampText(monthRange(2024, 2).end)).toBe("2024-03-01 00:00:00");
    expect(toTimestampText(monthRange(2025, 2).end)).toBe("2025-03-01 00:00:00");
  });

  it("rejects months outside 1-12", () => {
    expect(() => monthRange(2025, 13)).toThrow(ValidationError);
    expect(() => monthRange(2025, 0)).toThrow(ValidationError);
  });
});

describe("timestamps", () => {
  it("serializes local fields as YYYY-MM-DD HH:MM:SS", () => {
    expect(toTimestampText(new Date(2025, 2, 1, 9, 5, 7))).toBe("2025-03-01 09:05:07");
  });

  it("composes form date and time", () => {
    expect(toTimestampText(composeTimestamp("2025-03-15", "10:00"))).toBe("2025-03-15 10:00:00");
    expect(toTimestampText(composeTimestamp("2025-03-15", "18:30:15"))).toBe("2025-03-15 18:30:15");
  });

  it("rejects malformed dates and times", () => {
    expect(() => composeTimestamp("2025-02-30", "10:00")).toThrow(ValidationError);
    expect(() => composeTimestamp("15/03/2025", "10:00")).toThrow(ValidationError);
    expect(() => composeTimestamp("2025-03-15", "25:00")).toThrow(ValidationError);
    expect(() => composeTimestamp("2025-03-15", "10h")).toThrow(ValidationError);
  });

  it("accepts ISO-style text from the backend", () => {
    expect(canonicalTimestampText("2025-03-01T09:00:00")).toBe("2025-03-01 09:00:00");
    expect(canonicalTimestampText("2025-03-01T09:00:00+00:00")).toBe("2025-03-01 09:00:00");
    expect(parseTimestampText("2025-12-31 23:59:59")).toEqual({ year: 2025, month: 12, day: 31, hour: 23, minute: 59, second: 59 });
  });

  it("splits stored timestamps into date and time of day", () => {
    expect(dateKeyOf("2025-03-15 10:00:00")).toBe("2025-03-15");
    expect(timeOfDayOf("2025-03-15 10:00:00")).toBe("10:00");
  });

  it("throws on unparsable timestamps", () => {
    expect(() => parseTimestampText("yesterday")).toThrow(ValidationError);
    expect(() => parseTimestampText("2025-02-29 10:00:00")).toThrow(ValidationError);
  });
});

describe("monthLabel", () => {
  it("uses Spanish month names", () => {
    expect(monthLabel(2025, 3)).toBe("Marzo 2025");
    expect(monthLabel(2024, 12)).toBe("Diciembre 2024");
  });
});

describe("shiftMonth", () => {
  it("crosses year boundaries both ways", () => {
    expect(shiftMonth(2024, 12, 1)).toEqual({ year: 2025, month: 1 });
    expect(shiftMonth(2025, 1, -1)).toEqual({ year: 2024, month: 12 });
    expect(shiftMonth(2025, 3, 0)).toEqual({ year: 2025, month: 3 });
  });
});
