import type { RemoteRecord } from "../remote/remote-api.js";

export type AggregateOperation = "sum" | "avg" | "count" | "min" | "max";

export type AggregationSpec =
  | { op: "groupBy"; key: string }
  | { op: "countBy"; key: string }
  | { op: "sumBy"; key: string }
  | { op: "distinct"; key?: string }
  | { op: "aggregate"; groupBy: string; field: string; operation: AggregateOperation };

export type AggregationResult =
  | Record<string, RemoteRecord[]>
  | Record<string, number>
  | number
  | unknown[];

const MISSING_GROUP = "undefined";

const AGGREGATE_OPERATIONS: readonly AggregateOperation[] = [
  "sum",
  "avg",
  "count",
  "min",
  "max",
];

export function groupBy(
  records: RemoteRecord[],
  key: string,
): Record<string, RemoteRecord[]> {
  const groups = new Map<string, RemoteRecord[]>();
  for (const record of records) {
    const groupKey = groupKeyOf(record, key);
    const group = groups.get(groupKey);
    if (group) {
      group.push(record);
    } else {
      groups.set(groupKey, [record]);
    }
  }
  // group names come from tenant data and may shadow Object.prototype members
  return Object.fromEntries(groups);
}

export function countBy(records: RemoteRecord[], key: string): Record<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const groupKey = groupKeyOf(record, key);
    counts.set(groupKey, (counts.get(groupKey) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

// Values that are not numeric are skipped.
export function sumBy(records: RemoteRecord[], key: string): number {
  return numericValues(records, key).reduce((total, value) => total + value, 0);
}

export function distinct(records: RemoteRecord[], key?: string): unknown[] {
  const seen = new Set<string>();
  const result: unknown[] = [];

  for (const record of records) {
    const value = key === undefined ? record : record[key];
    const identity = JSON.stringify(value) ?? String(value);
    if (!seen.has(identity)) {
      seen.add(identity);
      result.push(value);
    }
  }

  return result;
}

export function aggregate(
  records: RemoteRecord[],
  groupKey: string,
  field: string,
  operation: AggregateOperation,
): Record<string, number> {
  const result = new Map<string, number>();

  for (const [group, items] of Object.entries(groupBy(records, groupKey))) {
    const values = numericValues(items, field);
    switch (operation) {
      case "sum":
        result.set(group, values.reduce((total, value) => total + value, 0));
        break;
      case "avg":
        result.set(
          group,
          items.length === 0
            ? 0
            : values.reduce((total, value) => total + value, 0) / items.length,
        );
        break;
      case "count":
        result.set(group, items.length);
        break;
      case "min":
        result.set(group, values.length === 0 ? 0 : Math.min(...values));
        break;
      case "max":
        result.set(group, values.length === 0 ? 0 : Math.max(...values));
        break;
    }
  }

  return Object.fromEntries(result);
}

export function applyAggregation(
  records: RemoteRecord[],
  spec: AggregationSpec,
): AggregationResult {
  switch (spec.op) {
    case "groupBy":
      return groupBy(records, spec.key);
    case "countBy":
      return countBy(records, spec.key);
    case "sumBy":
      return sumBy(records, spec.key);
    case "distinct":
      return distinct(records, spec.key);
    case "aggregate":
      return aggregate(records, spec.groupBy, spec.field, spec.operation);
  }
}

/** Validates an untrusted aggregation description, e.g. from a request body. */
export function parseAggregationSpec(value: unknown): AggregationSpec | null {
  if (value === null || typeof value !== "object") {
    return null;
  }

  const op: unknown = Reflect.get(value, "op");
  const key: unknown = Reflect.get(value, "key");
  switch (op) {
    case "groupBy":
    case "countBy":
    case "sumBy":
      return typeof key === "string" && key ? { op, key } : null;
    case "distinct":
      if (key === undefined) {
        return { op };
      }
      return typeof key === "string" && key ? { op, key } : null;
    case "aggregate": {
      const groupKey: unknown = Reflect.get(value, "groupBy");
      const field: unknown = Reflect.get(value, "field");
      const operation: unknown = Reflect.get(value, "operation");
      const matched = AGGREGATE_OPERATIONS.find((candidate) => candidate === operation);
      if (typeof groupKey !== "string" || typeof field !== "string" || !matched) {
        return null;
      }
      return { op, groupBy: groupKey, field, operation: matched };
    }
    default:
      return null;
  }
}

function groupKeyOf(record: RemoteRecord, key: string): string {
  const value = record[key];
  return value === undefined || value === null ? MISSING_GROUP : String(value);
}

function numericValues(records: RemoteRecord[], key: string): number[] {
  const values: number[] = [];
  for (const record of records) {
    const raw = record[key];
    const value =
      typeof raw === "number" ? raw : typeof raw === "string" && raw.trim() ? Number(raw) : Number.NaN;
    if (Number.isFinite(value)) {
      values.push(value);
    }
  }
  return values;
}
