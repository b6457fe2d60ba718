import { describe, expect, it, vi } from "vitest";
import { RemoteRequestError } from "../src/errors/query-errors.js";
import {
  buildPageUrl,
  createHttpRemoteClient,
  parsePageBody,
  parseQuota,
} from "../src/remote/http-remote-client.js";
import { rejectionOf } from "./helpers/fake-remote.js";

function jsonResponse(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function createClient(response: () => Response) {
  const fetchImpl = vi.fn<typeof fetch>(async () => response());
  const client = createHttpRemoteClient({
    baseUrl: "https://remote.test/v1/",
    apiKey: "test-secret",
    systemName: "query-layer-tests",
    fetchImpl,
  });
  return { client, fetchImpl };
}

describe("http remote client", () => {
  it("requests a page with filters, paging and auth", async () => {
    const { client, fetchImpl } = createClient(() =>
      jsonResponse(
        { people: [{ id: 1 }, { id: 2 }], _metadata: { total: 2 } },
        { "X-RateLimit-Remaining": "42" },
      ),
    );

    const page = await client.listPage({
      category: "people",
      filters: { stageId: 3 },
      offset: 0,
      limit: 100,
    });

    expect(page).toEqual({ records: [{ id: 1 }, { id: 2 }], total: 2, remainingQuota: 42 });
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://remote.test/v1/people?stageId=3&limit=100&offset=0",
      expect.objectContaining({
        method: "GET",
        headers: {
          Accept: "application/json",
          "X-System": "query-layer-tests",
          Authorization: "Basic dGVzdC1zZWNyZXQ6",
        },
      }),
    );
  });

  it("reports an unknown quota when the header is missing", async () => {
    const { client } = createClient(() => jsonResponse({ people: [] }));

    const page = await client.listPage({ category: "people", filters: {}, offset: 0, limit: 10 });

    expect(page.remainingQuota).toBeUndefined();
    expect(page.records).toEqual([]);
  });

  it("turns error responses into request errors", async () => {
    const { client } = createClient(
      () => new Response("slow down", { status: 429, headers: { "Retry-After": "3" } }),
    );

    const error = await rejectionOf(
      client.listPage({ category: "people", filters: {}, offset: 0, limit: 10 }),
      RemoteRequestError,
    );

    expect(error.status).toBe(429);
    expect(error.body).toBe("slow down");
    expect(error.retryAfterMs).toBe(3000);
    expect(error.retryable).toBe(true);
  });

  it("sends writes as json", async () => {
    const { client, fetchImpl } = createClient(() => jsonResponse({ id: 12, name: "Ann" }));

    const result = await client.send("PUT", "people", "12", { name: "Ann" });

    expect(result).toEqual({ id: 12, name: "Ann" });
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://remote.test/v1/people/12",
      expect.objectContaining({ method: "PUT", body: '{"name":"Ann"}' }),
    );
  });

  it("returns an empty object for no-content writes", async () => {
    const { client } = createClient(() => new Response(null, { status: 204 }));

    expect(await client.send("DELETE", "people", "12")).toEqual({});
  });
});

describe("page helpers", () => {
  it("builds page urls", () => {
    expect(
      buildPageUrl("https://remote.test", {
        category: "/deals/",
        filters: { created: ">2025-10-24" },
        offset: 200,
        limit: 50,
      }),
    ).toBe("https://remote.test/deals?created=%3E2025-10-24&limit=50&offset=200");
  });

  it("finds the records array whatever its name", () => {
    expect(parsePageBody({ _metadata: { total: 9 }, deals: [{ id: 1 }, "junk"] })).toEqual({
      records: [{ id: 1 }],
      total: 9,
    });
    expect(parsePageBody("nope")).toEqual({ records: [] });
  });

  it("parses quota headers", () => {
    expect(parseQuota("17")).toBe(17);
    expect(parseQuota("lots")).toBeUndefined();
    expect(parseQuota(null)).toBeUndefined();
  });
});
