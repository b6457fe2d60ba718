import { describe, expect, it } from "vitest";
import {
  aggregate,
  applyAggregation,
  countBy,
  distinct,
  groupBy,
  parseAggregationSpec,
  sumBy,
} from "../src/processing/aggregations.js";

const DEALS = [
  { id: 1, stage: "Lead", price: 100 },
  { id: 2, stage: "Lead", price: "250" },
  { id: 3, stage: "Closed", price: 400 },
  { id: 4, price: "n/a" },
];

describe("aggregations", () => {
  it("groups records by a key", () => {
    const groups = groupBy(DEALS, "stage");

    expect(Object.keys(groups)).toEqual(["Lead", "Closed", "undefined"]);
    expect(groups.Lead?.map((deal) => deal.id)).toEqual([1, 2]);
  });

  it("counts records by a key", () => {
    expect(countBy(DEALS, "stage")).toEqual({ Lead: 2, Closed: 1, undefined: 1 });
  });

  it("keeps groups named like built-in object members", () => {
    const rows = [{ stage: "constructor" }, { stage: "toString" }, { stage: "toString" }];

    expect(groupBy(rows, "stage")).toEqual({
      constructor: [{ stage: "constructor" }],
      toString: [{ stage: "toString" }, { stage: "toString" }],
    });
    expect(countBy(rows, "stage")).toEqual({ constructor: 1, toString: 2 });
    expect(aggregate(rows, "stage", "price", "count")).toEqual({ constructor: 1, toString: 2 });
  });

  it("sums numeric values and skips the rest", () => {
    expect(sumBy(DEALS, "price")).toBe(750);
  });

  it("returns distinct values in first-seen order", () => {
    expect(distinct(DEALS, "stage")).toEqual(["Lead", "Closed", undefined]);
    expect(distinct([{ a: 1 }, { a: 1 }, { a: 2 }])).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it("aggregates a field per group", () => {
    expect(aggregate(DEALS, "stage", "price", "sum")).toEqual({
      Lead: 350,
      Closed: 400,
      undefined: 0,
    });
    expect(aggregate(DEALS, "stage", "price", "avg")).toEqual({
      Lead: 175,
      Closed: 400,
      undefined: 0,
    });
    expect(aggregate(DEALS, "stage", "price", "max")).toEqual({
      Lead: 250,
      Closed: 400,
      undefined: 0,
    });
    expect(aggregate(DEALS, "stage", "price", "count")).toEqual({
      Lead: 2,
      Closed: 1,
      undefined: 1,
    });
  });

  it("dispatches on the aggregation kind", () => {
    expect(applyAggregation(DEALS, { op: "countBy", key: "stage" })).toEqual({
      Lead: 2,
      Closed: 1,
      undefined: 1,
    });
    expect(applyAggregation([], { op: "sumBy", key: "price" })).toBe(0);
  });

  it("validates untrusted specs", () => {
    expect(parseAggregationSpec({ op: "sumBy", key: "price" })).toEqual({
      op: "sumBy",
      key: "price",
    });
    expect(parseAggregationSpec({ op: "distinct" })).toEqual({ op: "distinct" });
    expect(
      parseAggregationSpec({ op: "aggregate", groupBy: "stage", field: "price", operation: "avg" }),
    ).toEqual({ op: "aggregate", groupBy: "stage", field: "price", operation: "avg" });
    expect(parseAggregationSpec({ op: "aggregate", groupBy: "stage", field: "price", operation: "median" })).toBeNull();
    expect(parseAggregationSpec({ op: "sumBy" })).toBeNull();
    expect(parseAggregationSpec("countBy")).toBeNull();
  });
});
