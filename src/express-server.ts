import express, { type Request, type Response } from "express";
import swaggerUi from "swagger-ui-express";
import type { EntityTypeFilter } from "./discovery/discovery-index.js";
import {
  DateParseError,
  FetchFailedError,
  InvalidQueryError,
  RateLimitExceededError,
  RemoteRequestError,
  ValidationFailedError,
} from "./errors/query-errors.js";
import { OPENAPI_SPEC } from "./openapi-spec.js";
import { parseAggregationSpec } from "./processing/aggregations.js";
import type {
  NamedAggregation,
  QueryContext,
  QueryEndpoint,
  QueryRequest,
} from "./query-context.js";
import type { Filters, RemoteRecord, WriteMethod } from "./remote/remote-api.js";

type QueryValue = string | string[] | undefined;

type RawQuery = Record<string, QueryValue>;

type ErrorResponse = {
  error: string;
  code?: string;
  [detail: string]: unknown;
};

const DEFAULT_FETCH_LIMIT = 100;
const RESERVED_RECORD_PARAMS = new Set(["limit", "onInvalidDate"]);
const ENTITY_TYPE_FILTERS: readonly EntityTypeFilter[] = [
  "any",
  "category",
  "enumeratedValue",
  "dynamicField",
  "sourceTag",
];

function firstValue(value: QueryValue): string {
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

function parseList(value: QueryValue): string[] {
  if (!value) {
    return [];
  }
  const joined = Array.isArray(value) ? value.join(",") : value;
  return joined
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseOptionalInteger(value: QueryValue): number | undefined | null {
  const text = firstValue(value);
  if (!text) {
    return undefined;
  }
  const parsed = Number.parseInt(text, 10);
  return Number.isNaN(parsed) || parsed < 0 ? null : parsed;
}

function parseEntityTypeFilter(value: QueryValue): EntityTypeFilter | null {
  const text = firstValue(value) || "any";
  return ENTITY_TYPE_FILTERS.find((candidate) => candidate === text) ?? null;
}

function queryToFilters(query: RawQuery): Filters {
  const filters: Filters = {};
  for (const [key, value] of Object.entries(query)) {
    if (RESERVED_RECORD_PARAMS.has(key) || typeof value !== "string") {
      continue;
    }
    filters[key] = value;
  }
  return filters;
}

function isRecord(value: unknown): value is RemoteRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseFilters(value: unknown): Filters | null {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    return null;
  }

  const filters: Filters = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== "string" && typeof item !== "number" && typeof item !== "boolean") {
      return null;
    }
    filters[key] = item;
  }
  return filters;
}

function parseQueryRequest(body: unknown): QueryRequest | string {
  if (!isRecord(body) || !Array.isArray(body.endpoints) || body.endpoints.length === 0) {
    return "Body must contain a non-empty 'endpoints' array.";
  }

  const endpoints: QueryEndpoint[] = [];
  for (const item of body.endpoints) {
    if (!isRecord(item) || typeof item.category !== "string" || !item.category) {
      return "Every endpoint needs a 'category'.";
    }
    const filters = parseFilters(item.filters);
    if (!filters) {
      return `Filters of ${item.category} must map names to scalar values.`;
    }
    const maxRecords =
      typeof item.maxRecords === "number" ? item.maxRecords : DEFAULT_FETCH_LIMIT;
    endpoints.push({
      category: item.category,
      filters,
      maxRecords,
      ...(typeof item.name === "string" && item.name ? { name: item.name } : {}),
    });
  }

  const aggregations: NamedAggregation[] = [];
  const rawAggregations: unknown = body.aggregations ?? [];
  if (!Array.isArray(rawAggregations)) {
    return "'aggregations' must be an array.";
  }
  for (const item of rawAggregations) {
    const spec = isRecord(item) ? parseAggregationSpec(item.spec) : null;
    if (
      !spec ||
      !isRecord(item) ||
      typeof item.name !== "string" ||
      typeof item.source !== "string"
    ) {
      return "Every aggregation needs 'name', 'source' and a valid 'spec'.";
    }
    aggregations.push({ name: item.name, source: item.source, spec });
  }

  return { endpoints, aggregations };
}

function sendError(
  res: Response<ErrorResponse>,
  status: number,
  message: string,
  details: Omit<ErrorResponse, "error"> = {},
): void {
  res.status(status).json({ ...details, error: message });
}

function sendQueryError(res: Response<ErrorResponse>, error: unknown, tag: string): void {
  if (error instanceof DateParseError) {
    console.warn(`[express-server:${tag}] date parse failed`, error.expression);
    sendError(res, 400, error.message, { code: error.code, expression: error.expression });
    return;
  }
  if (error instanceof ValidationFailedError) {
    console.warn(`[express-server:${tag}] remote validation failed`, error.parameter);
    sendError(res, 400, error.message, {
      code: error.code,
      category: error.context.category,
      pageIndex: error.context.pageIndex,
      parameter: error.parameter,
      partial: error.partialRecords.length > 0,
      records: error.partialRecords,
    });
    return;
  }
  if (error instanceof InvalidQueryError) {
    sendError(res, 400, error.message, { code: error.code });
    return;
  }
  if (error instanceof RateLimitExceededError) {
    console.warn(`[express-server:${tag}] rate limit exceeded`, error.retryAfterMs);
    res.setHeader("Retry-After", Math.ceil(error.retryAfterMs / 1000));
    sendError(res, 429, error.message, {
      code: error.code,
      retryable: true,
      retryAfterMs: error.retryAfterMs,
      partial: error.partialRecords.length > 0,
      records: error.partialRecords,
    });
    return;
  }
  if (error instanceof FetchFailedError) {
    console.error(`[express-server:${tag}] fetch failed`, error.reason, error.partialRecords.length);
    sendError(res, 502, error.message, {
      code: error.code,
      reason: error.reason,
      partial: true,
      records: error.partialRecords,
      category: error.context.category,
      pageIndex: error.context.pageIndex,
    });
    return;
  }
  if (error instanceof RemoteRequestError) {
    console.error(`[express-server:${tag}] remote request failed`, error.status);
    sendError(res, error.status >= 500 ? 502 : error.status, error.message, {
      code: error.code,
    });
    return;
  }

  console.error(`[express-server:${tag}] unexpected failure`, error);
  sendError(res, 500, "Internal error.");
}

export function createApp(context: QueryContext) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    console.log("[express-server:health] ok");
    res.json({ status: "ok" });
  });

  app.get(
    "/records/:category",
    async (
      req: Request<{ category: string }, unknown, never, RawQuery>,
      res: Response,
    ) => {
      const limit = parseOptionalInteger(req.query.limit);
      if (limit === null) {
        sendError(res, 400, "Query parameter 'limit' must be a non-negative integer.");
        return;
      }
      const onInvalidDate = firstValue(req.query.onInvalidDate) === "drop" ? "drop" : "fail";
      const filters = queryToFilters(req.query);

      console.log(
        "[express-server:records] fetching",
        req.params.category,
        limit ?? DEFAULT_FETCH_LIMIT,
        Object.keys(filters).length,
      );

      try {
        const result = await context.fetchUpTo(
          req.params.category,
          filters,
          limit ?? DEFAULT_FETCH_LIMIT,
          { onInvalidDate },
        );
        res.json(result);
      } catch (error) {
        sendQueryError(res, error, "records");
      }
    },
  );

  const handleWrite =
    (method: WriteMethod) =>
    async (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (method !== "DELETE" && !isRecord(body)) {
        sendError(res, 400, "Body must be a JSON object.");
        return;
      }

      try {
        const result = await context.mutate(
          method,
          req.params.category ?? "",
          req.params.id || undefined,
          isRecord(body) && method !== "DELETE" ? body : undefined,
        );
        res.json(result);
      } catch (error) {
        sendQueryError(res, error, "write");
      }
    };

  app.post("/records/:category", handleWrite("POST"));
  app.put("/records/:category/:id", handleWrite("PUT"));
  app.delete("/records/:category/:id", handleWrite("DELETE"));

  app.get(
    "/discovery/find",
    async (req: Request<Record<string, string>, unknown, never, RawQuery>, res: Response) => {
      const keywords = parseList(req.query.keywords);
      const entityType = parseEntityTypeFilter(req.query.type);
      const limit = parseOptionalInteger(req.query.limit);

      if (keywords.length === 0) {
        console.warn("[express-server:find] missing keywords");
        sendError(res, 400, "Query parameter 'keywords' is required.");
        return;
      }
      if (!entityType || limit === null) {
        sendError(res, 400, "Invalid 'type' or 'limit'.");
        return;
      }

      try {
        res.json(await context.find(keywords, entityType, limit));
      } catch (error) {
        sendQueryError(res, error, "find");
      }
    },
  );

  app.get("/discovery/quick-reference", async (_req: Request, res: Response) => {
    try {
      res.json(await context.quickReference());
    } catch (error) {
      sendQueryError(res, error, "quickReference");
    }
  });

  app.get(
    "/dates/normalize",
    (req: Request<Record<string, string>, unknown, never, RawQuery>, res: Response) => {
      const expression = firstValue(req.query.expression);
      const nowText = firstValue(req.query.now);
      if (!expression) {
        sendError(res, 400, "Query parameter 'expression' is required.");
        return;
      }

      const referenceNow = nowText ? new Date(nowText) : undefined;
      if (referenceNow && Number.isNaN(referenceNow.getTime())) {
        sendError(res, 400, "Query parameter 'now' must be an ISO timestamp.");
        return;
      }

      try {
        const predicate = context.normalize(expression, referenceNow);
        res.json({ ...predicate, date: predicate.date.toISOString() });
      } catch (error) {
        sendQueryError(res, error, "normalize");
      }
    },
  );

  app.post("/query", async (req: Request, res: Response) => {
    const parsed = parseQueryRequest(req.body);
    if (typeof parsed === "string") {
      sendError(res, 400, parsed);
      return;
    }

    try {
      res.json(await context.runQuery(parsed));
    } catch (error) {
      sendQueryError(res, error, "query");
    }
  });

  app.post("/cache/invalidate", (req: Request, res: Response) => {
    const body: unknown = req.body;
    const category =
      isRecord(body) && typeof body.category === "string" && body.category
        ? body.category
        : undefined;
    const removed = context.invalidate(category);
    console.log("[express-server:invalidate] cache invalidated", category ?? "*", removed);
    res.json({ category: category ?? null, removed });
  });

  app.get("/cache/stats", (_req: Request, res: Response) => {
    res.json(context.cacheStats());
  });

  app.get("/openapi.json", (_req: Request, res: Response) => {
    console.debug("[express-server:openapi] serving openapi document");
    res.json(OPENAPI_SPEC);
  });

  app.use("/docs", swaggerUi.serve, swaggerUi.setup(OPENAPI_SPEC));

  return app;
}
