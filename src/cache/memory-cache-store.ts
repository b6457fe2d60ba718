import { ValueTooLargeError } from "../errors/query-errors.js";
import type {
  CacheEntry,
  CacheEntryInfo,
  CacheStore,
  Clock,
} from "./cache-store.js";

export type MemoryCacheStoreOptions<T> = {
  maxEntries: number;
  maxValueBytes?: number;
  clock?: Clock;
  sizeOf?: (value: T) => number;
};

/**
 * TTL map with least-recently-used eviction once `maxEntries` is reached.
 *
 * Map iteration order doubles as recency order: every read or write moves the
 * key to the end, so the first key is always the least recently accessed one.
 */
export class MemoryCacheStore<T> implements CacheStore<T> {
  private entriesByKey = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly maxValueBytes: number | undefined;
  private readonly clock: Clock;
  private readonly sizeOf: (value: T) => number;

  constructor(options: MemoryCacheStoreOptions<T>) {
    this.maxEntries = Math.max(1, options.maxEntries);
    this.maxValueBytes = options.maxValueBytes;
    this.clock = options.clock ?? Date.now;
    this.sizeOf = options.sizeOf ?? jsonByteLength;
  }

  get(key: string): T | undefined {
    const entry = this.entriesByKey.get(key);
    if (!entry) {
      console.debug("[MemoryCacheStore:get] cache miss", key);
      return undefined;
    }

    const now = this.clock();
    if (isExpired(entry, now)) {
      console.debug("[MemoryCacheStore:get] cache expired", key);
      this.entriesByKey.delete(key);
      return undefined;
    }

    entry.lastAccessed = now;
    this.entriesByKey.delete(key);
    this.entriesByKey.set(key, entry);
    console.debug("[MemoryCacheStore:get] cache hit", key);
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    if (this.maxValueBytes !== undefined) {
      const sizeBytes = this.sizeOf(value);
      if (sizeBytes > this.maxValueBytes) {
        throw new ValueTooLargeError(key, sizeBytes, this.maxValueBytes);
      }
    }

    const now = this.clock();
    if (this.entriesByKey.has(key)) {
      this.entriesByKey.delete(key);
    } else if (this.entriesByKey.size >= this.maxEntries) {
      this.evict(now);
    }

    this.entriesByKey.set(key, {
      value,
      insertedAt: now,
      ttlMs,
      lastAccessed: now,
    });
    console.debug("[MemoryCacheStore:set] cache set", key, ttlMs);
  }

  delete(key: string): void {
    this.entriesByKey.delete(key);
    console.debug("[MemoryCacheStore:delete] cache delete", key);
  }

  invalidate(match: string | ((key: string) => boolean)): number {
    const matches =
      typeof match === "string"
        ? (key: string) => key.startsWith(match)
        : match;

    let removed = 0;
    for (const key of [...this.entriesByKey.keys()]) {
      if (matches(key)) {
        this.entriesByKey.delete(key);
        removed += 1;
      }
    }

    console.debug("[MemoryCacheStore:invalidate] entries removed", removed);
    return removed;
  }

  size(): number {
    return this.entriesByKey.size;
  }

  clear(): void {
    this.entriesByKey.clear();
    console.debug("[MemoryCacheStore:clear] cache cleared");
  }

  entries(): CacheEntryInfo[] {
    const now = this.clock();
    return [...this.entriesByKey.entries()].map(([key, entry]) => ({
      key,
      ageMs: now - entry.insertedAt,
      ttlMs: entry.ttlMs,
      expiresAt: entry.insertedAt + entry.ttlMs,
    }));
  }

  private evict(now: number): void {
    for (const [key, entry] of this.entriesByKey) {
      if (isExpired(entry, now)) {
        this.entriesByKey.delete(key);
      }
    }
    if (this.entriesByKey.size < this.maxEntries) {
      console.debug("[MemoryCacheStore:evict] expired entries purged");
      return;
    }

    const oldestKey = this.entriesByKey.keys().next();
    if (!oldestKey.done) {
      this.entriesByKey.delete(oldestKey.value);
      console.debug("[MemoryCacheStore:evict] least recently used evicted", oldestKey.value);
    }
  }
}

function isExpired<T>(entry: CacheEntry<T>, now: number): boolean {
  return now >= entry.insertedAt + entry.ttlMs;
}

function jsonByteLength(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value) ?? "", "utf8");
}

export function createMemoryCacheStore<T>(
  options: MemoryCacheStoreOptions<T>,
): CacheStore<T> {
  console.log(
    "[memory-cache-store:createMemoryCacheStore] creating cache store",
    options.maxEntries,
  );
  return new MemoryCacheStore<T>(options);
}
