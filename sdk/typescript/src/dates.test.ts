import { describe, expect, it } from "vitest";
import { formatLocalDateTime, normalizeDate } from "./dates.js";

describe("normalizeDate", () => {
  it.each([
    ["2024-03-05", "2024-03-05"],
    ["2024-03-05 10:11:12", "2024-03-05"],
    ["2024-03-05T10:11:12Z", "2024-03-05"],
    ["2024-03-05T23:00:00-05:00", "2024-03-05"],
    ["2024-03-05T23:00:00+0530", "2024-03-05"],
    ["  2024-01-01  ", "2024-01-01"],
  ])("reduces %s to its calendar date", (input, expected) => {
    expect(normalizeDate(input)).toBe(expected);
  });

  it("returns unrecognized strings unchanged", () => {
    expect(normalizeDate("yesterday")).toBe("yesterday");
    expect(normalizeDate("2024-02-30")).toBe("2024-02-30");
  });

  it("accepts Date values", () => {
    expect(normalizeDate(new Date(Date.UTC(2024, 0, 2, 23, 0, 0)))).toBe("2024-01-02");
    expect(normalizeDate(new Date("not a date"))).toBeNull();
  });

  it("passes through missing values", () => {
    expect(normalizeDate(null)).toBeNull();
    expect(normalizeDate(undefined)).toBeNull();
  });
});

describe("formatLocalDateTime", () => {
  it("formats local wall-clock time", () => {
    expect(formatLocalDateTime(new Date(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02 03:04:05");
  });
});
