import type { CacheStats } from "./cache/query-cache.js";
import { QueryCache } from "./cache/query-cache.js";
import type { Clock } from "./cache/cache-store.js";
import { createMemoryCacheStore } from "./cache/memory-cache-store.js";
import type { AppConfig } from "./config/app-config.js";
import {
  normalize as normalizeDate,
  type DatePredicate,
} from "./dates/relative-date-normalizer.js";
import {
  DiscoveryIndex,
  type EntityTypeFilter,
  type QuickReference,
  type RankedEntity,
} from "./discovery/discovery-index.js";
import {
  PaginatingFetcher,
  type CachedPage,
  type FetchResult,
  type FetchUpToOptions,
  type Sleep,
} from "./fetch/paginating-fetcher.js";
import { InvalidQueryError } from "./errors/query-errors.js";
import {
  applyAggregation,
  type AggregationResult,
  type AggregationSpec,
} from "./processing/aggregations.js";
import { RateGovernor } from "./rate/rate-governor.js";
import {
  normalizeCategory,
  type Filters,
  type RemoteApi,
  type RemoteRecord,
  type WriteMethod,
} from "./remote/remote-api.js";

export type QueryEndpoint = {
  // key the fetched records are stored under in the result
  name?: string;
  category: string;
  filters?: Filters;
  maxRecords: number;
};

export type NamedAggregation = {
  name: string;
  source: string;
  spec: AggregationSpec;
};

export type QueryRequest = {
  endpoints: QueryEndpoint[];
  aggregations?: NamedAggregation[];
};

export type QueryResponse = {
  data: Record<string, RemoteRecord[]>;
  aggregations: Record<string, AggregationResult>;
  networkRequests: number;
  cacheHits: number;
};

export type QueryContext = {
  fetchUpTo: (
    category: string,
    filters: Filters,
    maxRecords: number,
    options?: FetchUpToOptions,
  ) => Promise<FetchResult>;
  find: (
    keywords: Iterable<string>,
    entityTypeFilter?: EntityTypeFilter,
    limit?: number,
  ) => Promise<RankedEntity[]>;
  quickReference: () => Promise<QuickReference>;
  normalize: (expression: string, referenceNow?: Date) => DatePredicate;
  invalidate: (category?: string) => number;
  mutate: (
    method: WriteMethod,
    category: string,
    id?: string,
    body?: RemoteRecord,
  ) => Promise<RemoteRecord>;
  runQuery: (request: QueryRequest, options?: FetchUpToOptions) => Promise<QueryResponse>;
  cacheStats: () => CacheStats;
  clear: () => void;
  governor: RateGovernor;
};

export type QueryContextOptions = {
  config: AppConfig;
  remote: RemoteApi;
  clock?: Clock;
  sleep?: Sleep;
};

/**
 * Wires one cache, one rate governor, the fetcher and the discovery index
 * around a remote. Each call builds an isolated set; share the returned
 * context to share the state.
 */
export function createQueryContext(options: QueryContextOptions): QueryContext {
  const { config, remote } = options;
  const clock = options.clock ?? Date.now;

  const cache = new QueryCache<CachedPage>(
    createMemoryCacheStore<CachedPage>({
      maxEntries: config.cacheMaxEntries,
      maxValueBytes: config.cacheMaxValueBytes,
      clock,
    }),
    {
      enabled: config.cacheEnabled,
      maxEntries: config.cacheMaxEntries,
      ttl: config.ttl,
    },
  );
  const governor = new RateGovernor(config.rate, clock);
  const fetcher = new PaginatingFetcher({
    remote,
    cache,
    governor,
    pageSize: config.pageSize,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryBackoffMs: config.retryBackoffMs,
    sleep: options.sleep,
  });
  const discovery = new DiscoveryIndex({
    fetcher,
    clock,
    quickReferenceTtlMs: config.ttl.mediumMs,
  });

  console.log(
    "[query-context:createQueryContext] context created",
    config.cacheEnabled,
    config.cacheMaxEntries,
    config.pageSize,
  );

  const invalidate = (category?: string) => cache.invalidate(category);

  return {
    fetchUpTo: (category, filters, maxRecords, fetchOptions) =>
      fetcher.fetchUpTo(category, filters, maxRecords, {
        ...fetchOptions,
        referenceNow: fetchOptions?.referenceNow ?? new Date(clock()),
      }),
    find: (keywords, entityTypeFilter, limit) =>
      discovery.find(keywords, entityTypeFilter, limit),
    quickReference: () => discovery.quickReference(),
    normalize: (expression, referenceNow) =>
      normalizeDate(expression, referenceNow ?? new Date(clock())),
    invalidate,
    async mutate(method, category, id, body) {
      const result = await remote.send(method, category, id, body);
      invalidate(category);
      return result;
    },
    async runQuery(request, fetchOptions) {
      const names = request.endpoints.map(
        (endpoint) => endpoint.name ?? normalizeCategory(endpoint.category),
      );
      const unknown = (request.aggregations ?? []).find(
        (aggregation) => !names.includes(aggregation.source),
      );
      if (unknown) {
        throw new InvalidQueryError(
          `Aggregation ${unknown.name} references unknown endpoint ${unknown.source}`,
        );
      }

      const data: Record<string, RemoteRecord[]> = {};
      let networkRequests = 0;
      let cacheHits = 0;

      // one endpoint at a time, the governor paces them as a single stream
      for (const [index, endpoint] of request.endpoints.entries()) {
        const result = await fetcher.fetchUpTo(
          endpoint.category,
          endpoint.filters ?? {},
          endpoint.maxRecords,
          {
            ...fetchOptions,
            referenceNow: fetchOptions?.referenceNow ?? new Date(clock()),
          },
        );
        data[names[index] ?? result.category] = result.records;
        networkRequests += result.networkRequests;
        cacheHits += result.cacheHits;
      }

      const aggregations: Record<string, AggregationResult> = {};
      for (const aggregation of request.aggregations ?? []) {
        aggregations[aggregation.name] = applyAggregation(
          data[aggregation.source] ?? [],
          aggregation.spec,
        );
      }

      return { data, aggregations, networkRequests, cacheHits };
    },
    cacheStats: () => cache.stats(),
    clear: () => {
      cache.clear();
      governor.reset();
    },
    governor,
  };
}
