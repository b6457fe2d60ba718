import { RemoteRequestError } from "../errors/query-errors.js";
import {
  normalizeCategory,
  type PageRequest,
  type PageResponse,
  type RemoteApi,
  type RemoteRecord,
  type WriteMethod,
} from "./remote-api.js";

export type HttpRemoteClientOptions = {
  baseUrl: string;
  apiKey: string;
  systemName: string;
  fetchImpl?: typeof fetch;
};

const RATE_LIMIT_REMAINING_HEADER = "x-ratelimit-remaining";

export function createHttpRemoteClient(
  options: HttpRemoteClientOptions,
): RemoteApi {
  const baseUrl = normalizeBaseUrl(options.baseUrl);
  const fetchImpl = options.fetchImpl ?? fetch.bind(globalThis);
  const headers: Record<string, string> = {
    Accept: "application/json",
    "X-System": options.systemName,
  };
  if (options.apiKey) {
    headers.Authorization = `Basic ${Buffer.from(`${options.apiKey}:`).toString("base64")}`;
  }

  return {
    async listPage(request: PageRequest, signal?: AbortSignal) {
      const url = buildPageUrl(baseUrl, request);
      console.debug("[http-remote-client:listPage] fetching page", url);

      const response = await fetchImpl(url, {
        method: "GET",
        headers,
        signal,
      });
      if (!response.ok) {
        throw await toRequestError(response);
      }

      const body: unknown = await response.json();
      const page = parsePageBody(body);
      const remainingQuota = parseQuota(
        response.headers.get(RATE_LIMIT_REMAINING_HEADER),
      );

      console.debug(
        "[http-remote-client:listPage] page loaded",
        request.category,
        page.records.length,
        remainingQuota,
      );
      return { ...page, remainingQuota };
    },

    async send(
      method: WriteMethod,
      category: string,
      id?: string,
      body?: RemoteRecord,
    ) {
      const path = id
        ? `/${normalizeCategory(category)}/${encodeURIComponent(id)}`
        : `/${normalizeCategory(category)}`;
      console.log("[http-remote-client:send] sending write", method, path);

      const response = await fetchImpl(`${baseUrl}${path}`, {
        method,
        headers:
          body === undefined
            ? headers
            : { ...headers, "Content-Type": "application/json" },
        body: body === undefined ? null : JSON.stringify(body),
      });
      if (!response.ok) {
        throw await toRequestError(response);
      }
      if (response.status === 204) {
        return {};
      }

      const result: unknown = await response.json();
      return isRecord(result) ? result : { result };
    },
  };
}

export function buildPageUrl(baseUrl: string, request: PageRequest): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(request.filters)) {
    searchParams.set(key, String(value));
  }
  searchParams.set("limit", String(request.limit));
  searchParams.set("offset", String(request.offset));

  return `${baseUrl}/${normalizeCategory(request.category)}?${searchParams.toString()}`;
}

/**
 * The remote names the records array after the category (`{"people": [...]}`)
 * and puts paging totals under `_metadata`.
 */
export function parsePageBody(body: unknown): Omit<PageResponse, "remainingQuota"> {
  if (!isRecord(body)) {
    console.warn("[http-remote-client:parsePageBody] body is not an object");
    return { records: [] };
  }

  const fields: RemoteRecord = body;
  const recordsKey = Object.keys(fields).find(
    (key) => key !== "_metadata" && Array.isArray(fields[key]),
  );
  const rawRecords = recordsKey ? fields[recordsKey] : undefined;
  const records = Array.isArray(rawRecords) ? rawRecords.filter(isRecord) : [];

  const metadata = fields._metadata;
  const total =
    isRecord(metadata) && typeof metadata.total === "number"
      ? metadata.total
      : undefined;

  return total === undefined ? { records } : { records, total };
}

export function parseQuota(value: string | null): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

async function toRequestError(response: Response): Promise<RemoteRequestError> {
  const text = await response.text();
  const retryAfter = response.headers.get("retry-after");
  const retryAfterSeconds = retryAfter ? Number.parseFloat(retryAfter) : Number.NaN;

  console.error(
    "[http-remote-client:toRequestError] request failed",
    response.status,
    response.statusText,
  );
  return new RemoteRequestError(
    response.status,
    text,
    Number.isNaN(retryAfterSeconds) ? undefined : retryAfterSeconds * 1000,
  );
}

function isRecord(value: unknown): value is RemoteRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function normalizeBaseUrl(baseUrl: string): string {
  if (!baseUrl) {
    throw new Error("baseUrl is required for the remote client");
  }
  return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
}
