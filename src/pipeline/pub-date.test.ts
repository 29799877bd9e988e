import { describe, it, expect } from "vitest";
import { parsePublishedDate } from "./pub-date";

describe("parsePublishedDate", () => {
  it("should parse an RSS date in GMT", () => {
    expect(parsePublishedDate("Mon, 01 Jan 2024 10:00:00 GMT")).toEqual({
      ok: true,
      date: new Date("2024-01-01T10:00:00Z"),
    });
  });

  it("should accept single-digit days and UTC", () => {
    const result = parsePublishedDate("Fri, 5 Jul 2024 23:59:59 UTC");
    expect(result).toEqual({ ok: true, date: new Date("2024-07-05T23:59:59Z") });
  });

  it("should apply numeric offsets", () => {
    const result = parsePublishedDate("Mon, 01 Jan 2024 10:00:00 +0530");
    expect(result).toEqual({ ok: true, date: new Date("2024-01-01T04:30:00Z") });

    const west = parsePublishedDate("Mon, 01 Jan 2024 10:00:00 -0500");
    expect(west).toEqual({ ok: true, date: new Date("2024-01-01T15:00:00Z") });
  });

  it("should keep two-digit-era years as written", () => {
    const result = parsePublishedDate("Mon, 01 Jan 0099 10:00:00 GMT");
    expect(result).toEqual({ ok: true, date: new Date("0099-01-01T10:00:00Z") });
  });

  it("should ignore surrounding whitespace and letter case in names", () => {
    const result = parsePublishedDate("  mon, 01 JAN 2024 10:00:00 gmt\n");
    expect(result).toEqual({ ok: true, date: new Date("2024-01-01T10:00:00Z") });
  });

  it.each([
    ["the missing-date sentinel", "No publication date available"],
    ["an empty string", ""],
    ["an ISO timestamp", "2024-01-01T10:00:00Z"],
    ["an unknown month", "Mon, 01 Foo 2024 10:00:00 GMT"],
    ["an unknown weekday", "Xyz, 01 Jan 2024 10:00:00 GMT"],
    ["an unknown zone", "Mon, 01 Jan 2024 10:00:00 XYZ"],
    ["a day that does not exist", "Sat, 31 Feb 2024 10:00:00 GMT"],
    ["hour 24", "Mon, 01 Jan 2024 24:00:00 GMT"],
    ["a missing time", "Mon, 01 Jan 2024 GMT"],
  ])("should reject %s", (_label, raw) => {
    expect(parsePublishedDate(raw).ok).toBe(false);
  });
});
