import { createHash } from "node:crypto";
import type { TtlTiers } from "../config/app-config.js";
import { ValueTooLargeError } from "../errors/query-errors.js";
import { normalizeCategory } from "../remote/remote-api.js";
import type { CacheEntryInfo, CacheStore } from "./cache-store.js";

export type TtlTier = "long" | "medium" | "short";

// Dictionary-style data the tenant rarely edits.
const LONG_TTL_CATEGORIES = new Set([
  "customfields",
  "stages",
  "pipelines",
  "users",
  "sources",
  "groups",
]);

// Append-heavy activity logs.
const SHORT_TTL_CATEGORIES = new Set([
  "events",
  "calls",
  "notes",
  "appointments",
  "textmessages",
  "emails",
]);

export type CacheStats = {
  enabled: boolean;
  size: number;
  maxEntries: number;
  entries: CacheEntryInfo[];
};

type QueryCacheOptions = {
  enabled: boolean;
  maxEntries: number;
  ttl: TtlTiers;
};

export type CacheParams = Record<string, unknown>;

export function buildCacheKey(category: string, params: CacheParams): string {
  const digest = createHash("sha256")
    .update(stableStringify(params))
    .digest("hex");
  const cacheKey = `${normalizeCategory(category)}:${digest}`;
  console.debug("[query-cache:buildCacheKey] cache key built", cacheKey);
  return cacheKey;
}

export function resolveTtlTier(category: string): TtlTier {
  const root = normalizeCategory(category).split("/")[0]?.toLowerCase() ?? "";
  if (LONG_TTL_CATEGORIES.has(root)) {
    return "long";
  }
  if (SHORT_TTL_CATEGORIES.has(root)) {
    return "short";
  }
  return "medium";
}

/**
 * Category-aware view over a {@link CacheStore}. Keys are prefixed with the
 * normalized category, so write paths can drop a whole category at once.
 */
export class QueryCache<T> {
  constructor(
    private readonly store: CacheStore<T>,
    private readonly options: QueryCacheOptions,
  ) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  get(category: string, params: CacheParams): T | undefined {
    if (!this.options.enabled) {
      return undefined;
    }
    return this.store.get(buildCacheKey(category, params));
  }

  /** Returns false when the value was not cached. */
  put(category: string, params: CacheParams, value: T): boolean {
    if (!this.options.enabled) {
      return false;
    }

    const cacheKey = buildCacheKey(category, params);
    try {
      this.store.set(cacheKey, value, this.ttlFor(category));
      return true;
    } catch (error) {
      if (error instanceof ValueTooLargeError) {
        console.warn(
          "[query-cache:put] value too large, continuing uncached",
          cacheKey,
          error.sizeBytes,
        );
        return false;
      }
      throw error;
    }
  }

  ttlFor(category: string): number {
    const tier = resolveTtlTier(category);
    if (tier === "long") {
      return this.options.ttl.longMs;
    }
    if (tier === "short") {
      return this.options.ttl.shortMs;
    }
    return this.options.ttl.mediumMs;
  }

  /** Drops every entry under `category`, or the whole cache when omitted. */
  invalidate(category?: string): number {
    if (category === undefined) {
      const removed = this.store.size();
      this.store.clear();
      console.log("[query-cache:invalidate] all entries dropped", removed);
      return removed;
    }

    // "people" also covers sub-paths such as "people/5", never "peopleRelationships"
    const normalized = normalizeCategory(category);
    const removed = this.store.invalidate(
      (key) => key.startsWith(`${normalized}:`) || key.startsWith(`${normalized}/`),
    );
    console.log("[query-cache:invalidate] category dropped", normalized, removed);
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  stats(): CacheStats {
    return {
      enabled: this.options.enabled,
      size: this.store.size(),
      maxEntries: this.options.maxEntries,
      entries: this.store.entries(),
    };
  }
}

function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(Reflect.get(value, key))]),
    );
  }
  return value;
}
