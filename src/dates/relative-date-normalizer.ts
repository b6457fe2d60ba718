import { DateParseError } from "../errors/query-errors.js";
import type { Filters } from "../remote/remote-api.js";

export type DateOperator = ">" | "<" | "=";

export type DatePredicate = {
  operator: DateOperator;
  date: Date;
  // filter value in the remote's syntax: ">2025-10-24", "<2025-08-02" or "2025-10-30"
  value: string;
};

type DateUnit = "day" | "week" | "month" | "year";

export type InvalidDatePolicy = "fail" | "drop";

const DAY_MS = 24 * 60 * 60 * 1000;

const RELATIVE_PATTERN =
  /^(?:(?:in\s+)?last|older\s+than)\s+(\d+)\s+(day|week|month|year)s?$/;
const RAW_PATTERN =
  /^([<>])?\s*(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

export const DATE_FILTER_FIELDS = [
  "created",
  "updated",
  "createdAfter",
  "createdBefore",
  "updatedAfter",
  "updatedBefore",
] as const;

const CONVENIENCE_FIELDS = [
  { field: "createdInLast", target: "created", prefix: "last" },
  { field: "updatedInLast", target: "updated", prefix: "last" },
  { field: "createdOlderThan", target: "created", prefix: "older than" },
  { field: "updatedOlderThan", target: "updated", prefix: "older than" },
] as const;

export function normalize(
  expression: string,
  referenceNow: Date = new Date(),
): DatePredicate {
  const text = expression.trim().toLowerCase().replace(/\s+/g, " ");
  if (Number.isNaN(referenceNow.getTime())) {
    throw new DateParseError(expression, "reference time is invalid");
  }

  const relative = text.match(RELATIVE_PATTERN);
  if (relative?.[1] && relative[2]) {
    const amount = Number.parseInt(relative[1], 10);
    const unit = toUnit(relative[2]);
    const operator: DateOperator = text.startsWith("older") ? "<" : ">";
    const date = startOfDay(subtract(referenceNow, amount, unit));
    if (Number.isNaN(date.getTime())) {
      throw new DateParseError(expression, "date out of range");
    }
    return predicate(operator, date);
  }

  switch (text) {
    case "today":
      return predicate(">", startOfDay(referenceNow));
    case "yesterday":
      return predicate("=", startOfDay(subtract(referenceNow, 1, "day")));
    case "this week":
      return predicate(">", startOfWeek(referenceNow));
    case "this month":
      return predicate(
        ">",
        new Date(Date.UTC(referenceNow.getUTCFullYear(), referenceNow.getUTCMonth(), 1)),
      );
    case "this year":
      return predicate(">", new Date(Date.UTC(referenceNow.getUTCFullYear(), 0, 1)));
  }

  const raw = parseRaw(expression.trim());
  if (raw) {
    return raw;
  }

  console.debug("[relative-date-normalizer:normalize] unrecognized expression", expression);
  throw new DateParseError(expression);
}

/**
 * Rewrites fuzzy date filters into the remote's comparison syntax and folds
 * the convenience fields (`createdInLast`, `updatedOlderThan`, ...) into
 * `created`/`updated`.
 */
export function convertDateFilters(
  filters: Filters,
  referenceNow: Date = new Date(),
  onInvalid: InvalidDatePolicy = "fail",
): Filters {
  const converted: Filters = { ...filters };

  const apply = (target: string, expression: string, source: string): void => {
    try {
      converted[target] = normalize(expression, referenceNow).value;
    } catch (error) {
      if (onInvalid === "fail" || !(error instanceof DateParseError)) {
        throw error;
      }
      console.warn(
        "[relative-date-normalizer:convertDateFilters] dropping unparsable filter",
        source,
        expression,
      );
      delete converted[target];
    }
  };

  for (const field of DATE_FILTER_FIELDS) {
    const value = converted[field];
    if (typeof value === "string") {
      apply(field, value, field);
    }
  }

  for (const { field, target, prefix } of CONVENIENCE_FIELDS) {
    const value = converted[field];
    if (value === undefined) {
      continue;
    }
    delete converted[field];
    apply(target, `${prefix} ${String(value)}`, field);
  }

  return converted;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function predicate(operator: DateOperator, date: Date): DatePredicate {
  const day = formatDate(date);
  return {
    operator,
    date,
    value: operator === "=" ? day : `${operator}${day}`,
  };
}

function parseRaw(text: string): DatePredicate | null {
  const match = text.match(RAW_PATTERN);
  if (!match) {
    return null;
  }

  const [, operatorText, yearText, monthText, dayText, hourText, minuteText, secondText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month - 1)) {
    throw new DateParseError(text, "calendar date does not exist");
  }

  const operator: DateOperator =
    operatorText === ">" || operatorText === "<" ? operatorText : "=";
  const date = new Date(
    Date.UTC(
      year,
      month - 1,
      day,
      Number(hourText ?? 0),
      Number(minuteText ?? 0),
      Number(secondText ?? 0),
    ),
  );

  // raw input passes through to the remote untouched
  return { operator, date, value: text };
}

function toUnit(value: string): DateUnit {
  switch (value) {
    case "day":
    case "week":
    case "month":
    case "year":
      return value;
    default:
      throw new DateParseError(value, "unknown unit");
  }
}

function subtract(from: Date, amount: number, unit: DateUnit): Date {
  switch (unit) {
    case "day":
      return new Date(from.getTime() - amount * DAY_MS);
    case "week":
      return new Date(from.getTime() - amount * 7 * DAY_MS);
    case "month":
      return subtractMonths(from, amount);
    case "year":
      return subtractMonths(from, amount * 12);
  }
}

/** Calendar month subtraction that clamps to the last day of the target month. */
export function subtractMonths(from: Date, months: number): Date {
  const totalMonths = from.getUTCFullYear() * 12 + from.getUTCMonth() - months;
  const year = Math.floor(totalMonths / 12);
  const month = totalMonths - year * 12;
  const day = Math.min(from.getUTCDate(), daysInMonth(year, month));

  return new Date(
    Date.UTC(
      year,
      month,
      day,
      from.getUTCHours(),
      from.getUTCMinutes(),
      from.getUTCSeconds(),
      from.getUTCMilliseconds(),
    ),
  );
}

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

function startOfDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}

// Weeks start on Monday.
function startOfWeek(date: Date): Date {
  const daysSinceMonday = (date.getUTCDay() + 6) % 7;
  return startOfDay(new Date(date.getTime() - daysSinceMonday * DAY_MS));
}
