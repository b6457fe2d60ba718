const errorResponse = {
  description: "Error",
  content: {
    "application/json": {
      schema: { $ref: "#/components/schemas/ErrorResponse" },
    },
  },
} as const;

const jsonResponse = (description: string, ref: string) =>
  ({
    description,
    content: {
      "application/json": {
        schema: { $ref: `#/components/schemas/${ref}` },
      },
    },
  }) as const;

export const OPENAPI_SPEC = {
  openapi: "3.0.0",
  info: {
    title: "Resilient Query Layer API",
    version: "1.0.0",
  },
  servers: [{ url: "/" }],
  paths: {
    "/health": {
      get: {
        summary: "Health check",
        responses: {
          "200": {
            description: "OK",
            content: {
              "application/json": {
                schema: {
                  type: "object",
                  properties: { status: { type: "string" } },
                  required: ["status"],
                },
              },
            },
          },
        },
      },
    },
    "/records/{category}": {
      get: {
        summary: "Fetch up to `limit` records of a category, paging and caching automatically",
        parameters: [
          { name: "category", in: "path", required: true, schema: { type: "string" } },
          {
            name: "limit",
            in: "query",
            required: false,
            schema: { type: "integer", default: 100 },
            description: "Maximum number of records; may exceed the remote page size.",
          },
          {
            name: "onInvalidDate",
            in: "query",
            required: false,
            schema: { type: "string", enum: ["fail", "drop"] },
          },
          {
            name: "created",
            in: "query",
            required: false,
            schema: { type: "string" },
            description: "Date filter such as 'last 7 days', 'this month' or '>2024-01-01'. Any other query parameter is forwarded as a filter.",
          },
        ],
        responses: {
          "200": jsonResponse("Fetched records", "FetchResult"),
          "400": errorResponse,
          "429": errorResponse,
          "502": jsonResponse("Partial records after a failed page", "PartialFetch"),
        },
      },
      post: {
        summary: "Create a record and invalidate the category cache",
        parameters: [
          { name: "category", in: "path", required: true, schema: { type: "string" } },
        ],
        requestBody: {
          content: { "application/json": { schema: { type: "object" } } },
        },
        responses: { "200": { description: "Remote response" }, "400": errorResponse },
      },
    },
    "/records/{category}/{id}": {
      put: {
        summary: "Update a record and invalidate the category cache",
        parameters: [
          { name: "category", in: "path", required: true, schema: { type: "string" } },
          { name: "id", in: "path", required: true, schema: { type: "string" } },
        ],
        requestBody: {
          content: { "application/json": { schema: { type: "object" } } },
        },
        responses: { "200": { description: "Remote response" }, "400": errorResponse },
      },
      delete: {
        summary: "Delete a record and invalidate the category cache",
        parameters: [
          { name: "category", in: "path", required: true, schema: { type: "string" } },
          { name: "id", in: "path", required: true, schema: { type: "string" } },
        ],
        responses: { "200": { description: "Remote response" }, "400": errorResponse },
      },
    },
    "/discovery/find": {
      get: {
        summary: "Find categories, stages, custom fields and sources by keyword",
        parameters: [
          {
            name: "keywords",
            in: "query",
            required: true,
            schema: { type: "string" },
            description: "Comma-separated keyword list.",
          },
          {
            name: "type",
            in: "query",
            required: false,
            schema: {
              type: "string",
              enum: ["any", "category", "enumeratedValue", "dynamicField", "sourceTag"],
            },
          },
          { name: "limit", in: "query", required: false, schema: { type: "integer" } },
        ],
        responses: {
          "200": {
            description: "Ranked entities",
            content: {
              "application/json": {
                schema: {
                  type: "array",
                  items: { $ref: "#/components/schemas/DiscoveryEntity" },
                },
              },
            },
          },
          "400": errorResponse,
        },
      },
    },
    "/discovery/quick-reference": {
      get: {
        summary: "Entities grouped into people, activity and lookup buckets",
        responses: { "200": { description: "Quick reference" } },
      },
    },
    "/dates/normalize": {
      get: {
        summary: "Normalize a relative date expression into a filter predicate",
        parameters: [
          { name: "expression", in: "query", required: true, schema: { type: "string" } },
          {
            name: "now",
            in: "query",
            required: false,
            schema: { type: "string", format: "date-time" },
          },
        ],
        responses: {
          "200": jsonResponse("Date predicate", "DatePredicate"),
          "400": errorResponse,
        },
      },
    },
    "/query": {
      post: {
        summary: "Fetch several categories and apply aggregation primitives",
        requestBody: {
          content: { "application/json": { schema: { type: "object" } } },
        },
        responses: { "200": { description: "Query result" }, "400": errorResponse },
      },
    },
    "/cache/invalidate": {
      post: {
        summary: "Drop cached pages of a category, or all when no category is given",
        requestBody: {
          content: {
            "application/json": {
              schema: { type: "object", properties: { category: { type: "string" } } },
            },
          },
        },
        responses: { "200": { description: "Number of removed entries" } },
      },
    },
    "/cache/stats": {
      get: {
        summary: "Cache statistics",
        responses: { "200": { description: "Cache statistics" } },
      },
    },
  },
  components: {
    schemas: {
      FetchResult: {
        type: "object",
        properties: {
          category: { type: "string" },
          records: { type: "array", items: { type: "object" } },
          networkRequests: { type: "number" },
          cacheHits: { type: "number" },
          endOfData: { type: "boolean" },
          partial: { type: "boolean" },
        },
        required: ["category", "records", "networkRequests", "cacheHits", "endOfData", "partial"],
      },
      PartialFetch: {
        type: "object",
        properties: {
          error: { type: "string" },
          code: { type: "string" },
          partial: { type: "boolean" },
          records: { type: "array", items: { type: "object" } },
          pageIndex: { type: "number" },
        },
        required: ["error", "partial", "records"],
      },
      DiscoveryEntity: {
        type: "object",
        properties: {
          type: { type: "string" },
          name: { type: "string" },
          identifier: { oneOf: [{ type: "string" }, { type: "number" }] },
          usageHint: { type: "string" },
          score: { type: "number" },
        },
        required: ["type", "name", "identifier", "usageHint", "score"],
      },
      DatePredicate: {
        type: "object",
        properties: {
          operator: { type: "string", enum: [">", "<", "="] },
          date: { type: "string", format: "date-time" },
          value: { type: "string" },
        },
        required: ["operator", "date", "value"],
      },
      ErrorResponse: {
        type: "object",
        properties: {
          error: { type: "string" },
          code: { type: "string" },
        },
        required: ["error"],
      },
    },
  },
} as const;
