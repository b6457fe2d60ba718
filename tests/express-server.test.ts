import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { getAppConfig } from "../src/config/app-config.js";
import { RemoteRequestError } from "../src/errors/query-errors.js";
import { createApp } from "../src/express-server.js";
import { createQueryContext } from "../src/query-context.js";
import {
  createFakeRemote,
  createRecordingSleep,
  makeRecords,
} from "./helpers/fake-remote.js";

const fake = createFakeRemote(
  { people: makeRecords(200), tickets: makeRecords(200, "ticket") },
  {
    failWith: (request) => {
      if (request.category === "tickets" && request.offset === 100) {
        return new RemoteRequestError(400, JSON.stringify({ errorMessage: "Invalid offset" }));
      }
      if (request.category === "limited") {
        return new RemoteRequestError(429, "", 3000);
      }
      if (request.category === "broken") {
        return new RemoteRequestError(400, JSON.stringify({ errorMessage: "Unknown field color" }));
      }
      return undefined;
    },
  },
);
const context = createQueryContext({
  config: getAppConfig({}),
  remote: fake.remote,
  clock: () => Date.parse("2025-10-31T15:30:00.000Z"),
  sleep: createRecordingSleep().sleep,
});

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  const app = createApp(context);
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server is not listening on a port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

async function call(path: string, init?: RequestInit) {
  const response = await fetch(`${baseUrl}${path}`, init);
  const body: unknown = await response.json();
  return { status: response.status, headers: response.headers, body };
}

function postJson(path: string, body: unknown) {
  return call(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("express server", () => {
  it("reports health", async () => {
    expect(await call("/health")).toMatchObject({ status: 200, body: { status: "ok" } });
  });

  it("fetches records with query filters", async () => {
    const { status, body } = await call("/records/people?limit=150&stageId=3");

    expect(status).toBe(200);
    expect(body).toMatchObject({
      category: "people",
      filters: { stageId: "3" },
      networkRequests: 2,
      endOfData: false,
      partial: false,
    });
    expect(fake.requests.at(-1)).toEqual({
      category: "people",
      filters: { stageId: "3" },
      offset: 100,
      limit: 50,
    });
  });

  it("rejects a bad limit", async () => {
    expect(await call("/records/people?limit=abc")).toMatchObject({
      status: 400,
      body: { error: "Query parameter 'limit' must be a non-negative integer." },
    });
  });

  it("reports unparsable date filters", async () => {
    expect(await call("/records/people?created=whenever")).toMatchObject({
      status: 400,
      body: { code: "DATE_PARSE_ERROR", expression: "whenever" },
    });
  });

  it("can drop unparsable date filters instead", async () => {
    const { status, body } = await call(
      "/records/people?limit=5&created=whenever&onInvalidDate=drop",
    );

    expect(status).toBe(200);
    expect(body).toMatchObject({ filters: {} });
  });

  it("maps remote validation failures to 400", async () => {
    expect(await call("/records/broken?color=red")).toMatchObject({
      status: 400,
      body: {
        code: "VALIDATION_FAILED",
        category: "broken",
        pageIndex: 0,
        parameter: "color",
        partial: false,
        records: [],
      },
    });
  });

  it("returns the records fetched before a remote validation failure", async () => {
    const { status, body } = await call("/records/tickets?limit=200");

    expect(status).toBe(400);
    expect(body).toMatchObject({
      code: "VALIDATION_FAILED",
      pageIndex: 1,
      parameter: "offset",
      partial: true,
    });
    const records =
      typeof body === "object" && body !== null && "records" in body ? body.records : undefined;
    expect(Array.isArray(records) ? records.length : 0).toBe(100);

    context.invalidate("tickets");
  });

  it("maps rate limit rejections to 429", async () => {
    const { status, headers, body } = await call("/records/limited");

    expect(status).toBe(429);
    expect(headers.get("retry-after")).toBe("3");
    expect(body).toMatchObject({
      code: "RATE_LIMIT_EXCEEDED",
      retryAfterMs: 3000,
      partial: false,
      records: [],
    });
  });

  it("finds schema entities", async () => {
    const { status, body } = await call("/discovery/find?keywords=deal,pipeline&type=category");

    expect(status).toBe(200);
    expect(body).toEqual([
      expect.objectContaining({ type: "category", name: "deals", score: 7 }),
    ]);
  });

  it("validates discovery parameters", async () => {
    expect((await call("/discovery/find")).status).toBe(400);
    expect((await call("/discovery/find?keywords=lead&type=bogus")).status).toBe(400);
  });

  it("normalizes date expressions", async () => {
    expect(
      await call("/dates/normalize?expression=last%207%20days&now=2025-10-31T15:30:00Z"),
    ).toMatchObject({
      status: 200,
      body: { operator: ">", date: "2025-10-24T00:00:00.000Z", value: ">2025-10-24" },
    });
  });

  it("forwards writes", async () => {
    expect(await postJson("/records/people", { name: "Ann" })).toMatchObject({
      status: 200,
      body: { id: "new", name: "Ann" },
    });
    expect(fake.writes.at(-1)).toEqual({
      method: "POST",
      category: "people",
      id: undefined,
      body: { name: "Ann" },
    });
  });

  it("runs composite queries", async () => {
    const { status, body } = await postJson("/query", {
      endpoints: [{ name: "sample", category: "people", maxRecords: 3 }],
      aggregations: [{ name: "ids", source: "sample", spec: { op: "distinct", key: "id" } }],
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({ aggregations: { ids: [0, 1, 2] } });
  });

  it("rejects malformed composite queries", async () => {
    expect(await postJson("/query", { endpoints: [] })).toMatchObject({
      status: 400,
      body: { error: "Body must contain a non-empty 'endpoints' array." },
    });
  });

  it("invalidates and reports the cache", async () => {
    await call("/records/people?limit=10");

    const invalidated = await postJson("/cache/invalidate", { category: "people" });
    expect(invalidated.status).toBe(200);
    expect(invalidated.body).toMatchObject({ category: "people" });

    expect(await call("/cache/stats")).toMatchObject({
      status: 200,
      body: { enabled: true, size: 0, maxEntries: 1000 },
    });
  });
});
