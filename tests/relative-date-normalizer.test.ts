import { describe, expect, it } from "vitest";
import {
  convertDateFilters,
  normalize,
  subtractMonths,
} from "../src/dates/relative-date-normalizer.js";
import { DateParseError } from "../src/errors/query-errors.js";

// A Friday afternoon.
const NOW = new Date("2025-10-31T15:30:00.000Z");

describe("normalize", () => {
  it.each([
    ["last 7 days", ">2025-10-24"],
    ["in last 7 days", ">2025-10-24"],
    ["Last   7   Days", ">2025-10-24"],
    ["last 1 day", ">2025-10-30"],
    ["last 2 weeks", ">2025-10-17"],
    ["last 3 months", ">2025-07-31"],
    ["last 1 year", ">2024-10-31"],
    ["older than 90 days", "<2025-08-02"],
    ["older than 1 month", "<2025-09-30"],
    ["today", ">2025-10-31"],
    ["yesterday", "2025-10-30"],
    ["this week", ">2025-10-27"],
    ["this month", ">2025-10-01"],
    ["this year", ">2025-01-01"],
  ])("maps %s to %s", (expression, value) => {
    expect(normalize(expression, NOW).value).toBe(value);
  });

  it("anchors relative dates at the start of the day", () => {
    expect(normalize("today", NOW)).toEqual({
      operator: ">",
      date: new Date("2025-10-31T00:00:00.000Z"),
      value: ">2025-10-31",
    });
  });

  it("uses equality for yesterday", () => {
    expect(normalize("yesterday", NOW).operator).toBe("=");
  });

  it("clamps month arithmetic to the end of shorter months", () => {
    const endOfMarch = new Date("2025-03-31T12:00:00.000Z");

    expect(normalize("last 1 month", endOfMarch).value).toBe(">2025-02-28");
    expect(subtractMonths(new Date("2024-02-29T00:00:00.000Z"), 12).toISOString()).toBe(
      "2023-02-28T00:00:00.000Z",
    );
  });

  it("passes well-formed dates through untouched", () => {
    expect(normalize("2025-10-01", NOW)).toEqual({
      operator: "=",
      date: new Date("2025-10-01T00:00:00.000Z"),
      value: "2025-10-01",
    });
    expect(normalize(">2025-10-01", NOW).operator).toBe(">");
    expect(normalize("<2025-10-01T08:00:00Z", NOW).value).toBe("<2025-10-01T08:00:00Z");
  });

  it("rejects impossible calendar dates", () => {
    expect(() => normalize("2025-02-30", NOW)).toThrow(DateParseError);
  });

  it("rejects expressions it does not understand", () => {
    expect(() => normalize("not a date", NOW)).toThrow('Unrecognized date expression "not a date"');
    expect(() => normalize("next tuesday", NOW)).toThrow(DateParseError);
    expect(() => normalize("last few days", NOW)).toThrow(DateParseError);
    expect(() => normalize("", NOW)).toThrow(DateParseError);
  });

  it("rejects amounts that leave the representable date range", () => {
    expect(() => normalize("last 300000 years", NOW)).toThrow(
      'Unrecognized date expression "last 300000 years": date out of range',
    );
    expect(() => normalize("older than 99999999999999999999 days", NOW)).toThrow(DateParseError);
  });

  it("is deterministic for a fixed reference time", () => {
    expect(normalize("last 30 days", NOW)).toEqual(normalize("last 30 days", NOW));
  });
});

describe("convertDateFilters", () => {
  it("rewrites date fields and keeps the rest", () => {
    expect(convertDateFilters({ created: "last 7 days", stageId: 3 }, NOW)).toEqual({
      created: ">2025-10-24",
      stageId: 3,
    });
  });

  it("folds convenience fields into created and updated", () => {
    expect(convertDateFilters({ createdInLast: "7 days" }, NOW)).toEqual({
      created: ">2025-10-24",
    });
    expect(convertDateFilters({ updatedOlderThan: "30 days" }, NOW)).toEqual({
      updated: "<2025-10-01",
    });
  });

  it("does not touch the input object", () => {
    const filters = { created: "today" };
    convertDateFilters(filters, NOW);

    expect(filters).toEqual({ created: "today" });
  });

  it("fails on unparsable values by default", () => {
    expect(() => convertDateFilters({ created: "whenever" }, NOW)).toThrow(DateParseError);
  });

  it("drops out-of-range values when asked to", () => {
    expect(convertDateFilters({ created: "last 300000 years", stageId: 1 }, NOW, "drop")).toEqual({
      stageId: 1,
    });
  });

  it("drops unparsable values when asked to", () => {
    expect(convertDateFilters({ created: "whenever", stageId: 1 }, NOW, "drop")).toEqual({
      stageId: 1,
    });
  });
});
