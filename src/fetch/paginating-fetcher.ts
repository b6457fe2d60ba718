import { setTimeout as delay } from "node:timers/promises";
import type { QueryCache } from "../cache/query-cache.js";
import {
  convertDateFilters,
  type InvalidDatePolicy,
} from "../dates/relative-date-normalizer.js";
import {
  FetchFailedError,
  RateLimitExceededError,
  RemoteRequestError,
  ValidationFailedError,
  type FetchContext,
} from "../errors/query-errors.js";
import type { RateGovernor } from "../rate/rate-governor.js";
import {
  normalizeCategory,
  type Filters,
  type PageRequest,
  type PageResponse,
  type RemoteApi,
  type RemoteRecord,
} from "../remote/remote-api.js";

export type CachedPage = {
  records: RemoteRecord[];
  total?: number;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type PaginatingFetcherOptions = {
  remote: RemoteApi;
  cache: QueryCache<CachedPage>;
  governor: RateGovernor;
  pageSize: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  sleep?: Sleep;
};

export type FetchUpToOptions = {
  signal?: AbortSignal;
  referenceNow?: Date;
  onInvalidDate?: InvalidDatePolicy;
};

export type FetchResult = {
  category: string;
  filters: Filters;
  records: RemoteRecord[];
  networkRequests: number;
  cacheHits: number;
  endOfData: boolean;
  partial: false;
};

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Sequential page walker. Page N+1 is requested only after page N settled so
 * that every pacing decision sees the quota hint of the previous response.
 */
export class PaginatingFetcher {
  private readonly sleep: Sleep;

  constructor(private readonly options: PaginatingFetcherOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetchUpTo(
    category: string,
    filters: Filters,
    maxRecords: number,
    fetchOptions: FetchUpToOptions = {},
  ): Promise<FetchResult> {
    const normalizedCategory = normalizeCategory(category);
    const resolvedFilters = convertDateFilters(
      filters,
      fetchOptions.referenceNow ?? new Date(),
      fetchOptions.onInvalidDate ?? "fail",
    );
    const wanted = Math.max(0, Math.floor(maxRecords));
    const pageSize = this.options.pageSize;
    const pageCount = Math.ceil(wanted / pageSize);

    console.log(
      "[PaginatingFetcher:fetchUpTo] fetching",
      normalizedCategory,
      wanted,
      pageCount,
    );

    const records: RemoteRecord[] = [];
    let networkRequests = 0;
    let cacheHits = 0;
    let endOfData = false;

    for (let pageIndex = 0; pageIndex < pageCount; pageIndex += 1) {
      const offset = pageIndex * pageSize;
      const limit = Math.min(pageSize, wanted - offset);
      const cacheParams = { filters: resolvedFilters, offset, limit };
      const context: FetchContext = {
        category: normalizedCategory,
        filters: resolvedFilters,
        pageIndex,
      };

      let page = this.options.cache.get(normalizedCategory, cacheParams);
      if (page) {
        cacheHits += 1;
        console.debug("[PaginatingFetcher:fetchUpTo] page from cache", pageIndex);
      } else {
        const { response, attempts } = await this.fetchPage(
          { category: normalizedCategory, filters: resolvedFilters, offset, limit },
          context,
          records,
          fetchOptions.signal,
        );
        networkRequests += attempts;
        page =
          response.total === undefined
            ? { records: response.records }
            : { records: response.records, total: response.total };
        this.options.cache.put(normalizedCategory, cacheParams, page);
      }

      records.push(...page.records.slice(0, limit));

      if (page.records.length < limit) {
        endOfData = true;
        console.debug(
          "[PaginatingFetcher:fetchUpTo] short page, stopping",
          pageIndex,
          page.records.length,
        );
        break;
      }
    }

    console.log(
      "[PaginatingFetcher:fetchUpTo] done",
      normalizedCategory,
      records.length,
      networkRequests,
      cacheHits,
    );

    return {
      category: normalizedCategory,
      filters: resolvedFilters,
      records,
      networkRequests,
      cacheHits,
      endOfData,
      partial: false,
    };
  }

  private async fetchPage(
    request: PageRequest,
    context: FetchContext,
    accumulated: RemoteRecord[],
    signal: AbortSignal | undefined,
  ): Promise<{ response: PageResponse; attempts: number }> {
    const { governor, maxRetries, retryBackoffMs } = this.options;
    let attempts = 0;

    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      await this.pause(governor.nextDelay(), context, accumulated, signal);

      try {
        attempts += 1;
        const response = await this.requestWithTimeout(request, signal);
        governor.observe(response.remainingQuota);
        return { response, attempts };
      } catch (error) {
        if (signal?.aborted) {
          throw new FetchFailedError(
            context,
            "cancelled",
            attempts,
            [...accumulated],
            error,
          );
        }

        if (error instanceof RemoteRequestError && error.status === 429) {
          const cooldownMs = governor.recordRejection(error.retryAfterMs);
          await this.pause(cooldownMs, context, accumulated, signal);
          console.error(
            "[PaginatingFetcher:fetchPage] rate limit exceeded",
            context.category,
            context.pageIndex,
          );
          throw new RateLimitExceededError(context, cooldownMs, [...accumulated]);
        }

        if (error instanceof RemoteRequestError && !isTransientStatus(error.status)) {
          const message = extractRemoteMessage(error.body) || error.message;
          console.error(
            "[PaginatingFetcher:fetchPage] remote rejected request",
            context.category,
            context.pageIndex,
            error.status,
          );
          throw new ValidationFailedError(
            context,
            error.status,
            message,
            findOffendingParameter(message, request),
            [...accumulated],
          );
        }

        if (attempt === maxRetries) {
          console.error(
            "[PaginatingFetcher:fetchPage] retries exhausted",
            context.category,
            context.pageIndex,
            attempts,
          );
          throw new FetchFailedError(
            context,
            "retries-exhausted",
            attempts,
            [...accumulated],
            error,
          );
        }

        const backoffMs = retryBackoffMs * 2 ** attempt;
        console.warn(
          "[PaginatingFetcher:fetchPage] transient failure, retrying",
          context.category,
          context.pageIndex,
          backoffMs,
          error instanceof Error ? error.message : error,
        );
        await this.pause(backoffMs, context, accumulated, signal);
      }
    }

    throw new FetchFailedError(context, "retries-exhausted", attempts, [...accumulated]);
  }

  private async requestWithTimeout(
    request: PageRequest,
    signal: AbortSignal | undefined,
  ): Promise<PageResponse> {
    const timeoutMs = this.options.requestTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new RequestTimeoutError(timeoutMs));
    }, timeoutMs);
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    // the remote may ignore the signal, so the abort itself settles the request
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
        once: true,
      });
    });

    try {
      return await Promise.race([
        this.options.remote.listPage(request, controller.signal),
        aborted,
      ]);
    } catch (error) {
      if (timedOut) {
        throw new RequestTimeoutError(timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async pause(
    ms: number,
    context: FetchContext,
    accumulated: RemoteRecord[],
    signal: AbortSignal | undefined,
  ): Promise<void> {
    if (signal?.aborted) {
      throw new FetchFailedError(context, "cancelled", 0, [...accumulated], signal.reason);
    }
    if (ms <= 0) {
      return;
    }

    try {
      await this.sleep(ms, signal);
    } catch (error) {
      throw new FetchFailedError(context, "cancelled", 0, [...accumulated], error);
    }
  }
}

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408;
}

function extractRemoteMessage(body: string): string {
  if (!body) {
    return "";
  }

  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed !== null && typeof parsed === "object") {
      for (const field of ["errorMessage", "message", "error"]) {
        const value: unknown = Reflect.get(parsed, field);
        if (typeof value === "string" && value.length > 0) {
          return value;
        }
      }
    }
  } catch {
    console.debug("[paginating-fetcher:extractRemoteMessage] body is not json");
  }

  return body.trim();
}

function findOffendingParameter(
  message: string,
  request: PageRequest,
): string | undefined {
  const candidates = [...Object.keys(request.filters), "limit", "offset"];
  const lowered = message.toLowerCase();

  return candidates.find((name) =>
    new RegExp(`\\b${escapeRegExp(name.toLowerCase())}\\b`).test(lowered),
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
