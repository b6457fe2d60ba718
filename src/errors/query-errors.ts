import type { Filters, RemoteRecord } from "../remote/remote-api.js";

export type ErrorCode =
  | "VALUE_TOO_LARGE"
  | "RATE_LIMIT_EXCEEDED"
  | "FETCH_FAILED"
  | "VALIDATION_FAILED"
  | "DATE_PARSE_ERROR"
  | "REMOTE_REQUEST_FAILED"
  | "INVALID_QUERY";

export type FetchContext = {
  category: string;
  filters: Filters;
  pageIndex: number;
};

export class QueryLayerError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "QueryLayerError";
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

export class ValueTooLargeError extends QueryLayerError {
  readonly key: string;
  readonly sizeBytes: number;
  readonly maxBytes: number;

  constructor(key: string, sizeBytes: number, maxBytes: number) {
    super(
      "VALUE_TOO_LARGE",
      `Cache value for ${key} is ${sizeBytes} bytes, limit is ${maxBytes}`,
    );
    this.name = "ValueTooLargeError";
    this.key = key;
    this.sizeBytes = sizeBytes;
    this.maxBytes = maxBytes;
  }
}

export class RateLimitExceededError extends QueryLayerError {
  readonly context: FetchContext;
  readonly retryAfterMs: number;
  readonly partialRecords: RemoteRecord[];

  constructor(
    context: FetchContext,
    retryAfterMs: number,
    partialRecords: RemoteRecord[],
  ) {
    super(
      "RATE_LIMIT_EXCEEDED",
      `Remote refused ${context.category} page ${context.pageIndex}: rate limit exceeded, retry after ${retryAfterMs}ms`,
      { retryable: true },
    );
    this.name = "RateLimitExceededError";
    this.context = context;
    this.retryAfterMs = retryAfterMs;
    this.partialRecords = partialRecords;
  }
}

export type FetchFailureReason = "retries-exhausted" | "cancelled";

export class FetchFailedError extends QueryLayerError {
  readonly context: FetchContext;
  readonly reason: FetchFailureReason;
  readonly attempts: number;
  readonly partialRecords: RemoteRecord[];
  readonly partial = true;

  constructor(
    context: FetchContext,
    reason: FetchFailureReason,
    attempts: number,
    partialRecords: RemoteRecord[],
    cause?: unknown,
  ) {
    super(
      "FETCH_FAILED",
      reason === "cancelled"
        ? `Fetching ${context.category} was cancelled at page ${context.pageIndex}`
        : `Fetching ${context.category} page ${context.pageIndex} failed after ${attempts} attempts`,
      { retryable: reason === "retries-exhausted", cause },
    );
    this.name = "FetchFailedError";
    this.context = context;
    this.reason = reason;
    this.attempts = attempts;
    this.partialRecords = partialRecords;
  }
}

export class ValidationFailedError extends QueryLayerError {
  readonly context: FetchContext;
  readonly status: number;
  readonly parameter: string | undefined;
  readonly remoteMessage: string;
  readonly partialRecords: RemoteRecord[];

  constructor(
    context: FetchContext,
    status: number,
    remoteMessage: string,
    parameter: string | undefined,
    partialRecords: RemoteRecord[] = [],
  ) {
    super(
      "VALIDATION_FAILED",
      `Remote rejected ${context.category} page ${context.pageIndex} (${status})${
        parameter ? ` on parameter ${parameter}` : ""
      }: ${remoteMessage}`,
    );
    this.name = "ValidationFailedError";
    this.context = context;
    this.status = status;
    this.parameter = parameter;
    this.remoteMessage = remoteMessage;
    this.partialRecords = partialRecords;
  }
}

export class DateParseError extends QueryLayerError {
  readonly expression: string;

  constructor(expression: string, detail?: string) {
    super(
      "DATE_PARSE_ERROR",
      `Unrecognized date expression "${expression}"${detail ? `: ${detail}` : ""}`,
    );
    this.name = "DateParseError";
    this.expression = expression;
  }
}

export class RemoteRequestError extends QueryLayerError {
  readonly status: number;
  readonly body: string;
  readonly retryAfterMs: number | undefined;

  constructor(status: number, body: string, retryAfterMs?: number) {
    super(
      "REMOTE_REQUEST_FAILED",
      `Request failed: ${status}${body ? ` ${body.slice(0, 200)}` : ""}`,
      { retryable: status >= 500 || status === 429 },
    );
    this.name = "RemoteRequestError";
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

export class InvalidQueryError extends QueryLayerError {
  constructor(message: string) {
    super("INVALID_QUERY", message);
    this.name = "InvalidQueryError";
  }
}
