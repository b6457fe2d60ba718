import { describe, expect, it } from "vitest";
import { MemoryCacheStore } from "../src/cache/memory-cache-store.js";
import {
  QueryCache,
  buildCacheKey,
  resolveTtlTier,
} from "../src/cache/query-cache.js";

const TTL = { longMs: 300_000, mediumMs: 60_000, shortMs: 30_000 };

function createCache(enabled = true, maxValueBytes?: number) {
  const store = new MemoryCacheStore<string>({ maxEntries: 100, maxValueBytes });
  return new QueryCache<string>(store, { enabled, maxEntries: 100, ttl: TTL });
}

describe("buildCacheKey", () => {
  it("ignores parameter order", () => {
    expect(buildCacheKey("people", { b: 1, a: { y: 2, x: 1 } })).toBe(
      buildCacheKey("people", { a: { x: 1, y: 2 }, b: 1 }),
    );
  });

  it("prefixes the normalized category", () => {
    expect(buildCacheKey("/people/", { a: 1 }).startsWith("people:")).toBe(true);
  });

  it("separates different parameters", () => {
    expect(buildCacheKey("people", { offset: 0 })).not.toBe(
      buildCacheKey("people", { offset: 100 }),
    );
  });
});

describe("resolveTtlTier", () => {
  it("classifies categories", () => {
    expect(resolveTtlTier("customFields")).toBe("long");
    expect(resolveTtlTier("stages")).toBe("long");
    expect(resolveTtlTier("events")).toBe("short");
    expect(resolveTtlTier("textMessages")).toBe("short");
    expect(resolveTtlTier("people")).toBe("medium");
    expect(resolveTtlTier("people/12")).toBe("medium");
  });
});

describe("QueryCache", () => {
  it("stores and returns values by category and params", () => {
    const cache = createCache();

    expect(cache.put("people", { offset: 0 }, "page")).toBe(true);
    expect(cache.get("people", { offset: 0 })).toBe("page");
    expect(cache.get("people", { offset: 100 })).toBeUndefined();
  });

  it("invalidates one category only", () => {
    const cache = createCache();
    cache.put("people", { offset: 0 }, "p0");
    cache.put("people", { offset: 100 }, "p1");
    cache.put("deals", { offset: 0 }, "d0");

    expect(cache.invalidate("people")).toBe(2);
    expect(cache.get("people", { offset: 0 })).toBeUndefined();
    expect(cache.get("deals", { offset: 0 })).toBe("d0");
  });

  it("does not treat a category as a prefix of a longer one", () => {
    const cache = createCache();
    cache.put("people", {}, "p");
    cache.put("peopleRelationships", {}, "r");

    expect(cache.invalidate("people")).toBe(1);
    expect(cache.get("peopleRelationships", {})).toBe("r");
  });

  it("drops sub-paths of the category as well", () => {
    const cache = createCache();
    cache.put("people/5", {}, "one person");
    cache.put("people/5/notes", { offset: 0 }, "notes");
    cache.put("peopleRelationships", {}, "r");

    expect(cache.invalidate("people")).toBe(2);
    expect(cache.get("people/5", {})).toBeUndefined();
    expect(cache.get("people/5/notes", { offset: 0 })).toBeUndefined();
    expect(cache.get("peopleRelationships", {})).toBe("r");
  });

  it("clears everything when no category is given", () => {
    const cache = createCache();
    cache.put("people", {}, "p");
    cache.put("deals", {}, "d");

    expect(cache.invalidate()).toBe(2);
    expect(cache.stats().size).toBe(0);
  });

  it("never stores when disabled", () => {
    const cache = createCache(false);

    expect(cache.put("people", {}, "p")).toBe(false);
    expect(cache.get("people", {})).toBeUndefined();
    expect(cache.stats().enabled).toBe(false);
  });

  it("skips values over the size limit", () => {
    const cache = createCache(true, 4);

    expect(cache.put("people", {}, "too large")).toBe(false);
    expect(cache.get("people", {})).toBeUndefined();
  });

  it("uses the tier ttl for each category", () => {
    const cache = createCache();

    expect(cache.ttlFor("stages")).toBe(300_000);
    expect(cache.ttlFor("people")).toBe(60_000);
    expect(cache.ttlFor("calls")).toBe(30_000);
  });
});
