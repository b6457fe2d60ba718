export type CacheStore<T> = {
  // undefined is the miss signal; expired entries read as misses
  get: (key: string) => T | undefined;
  // throws ValueTooLargeError and leaves the store unchanged when the value is over the size limit
  set: (key: string, value: T, ttlMs: number) => void;
  delete: (key: string) => void;
  invalidate: (match: string | ((key: string) => boolean)) => number;
  size: () => number;
  clear: () => void;
  entries: () => CacheEntryInfo[];
};

export type CacheEntry<T> = {
  value: T;
  insertedAt: number;
  ttlMs: number;
  lastAccessed: number;
};

export type CacheEntryInfo = {
  key: string;
  ageMs: number;
  ttlMs: number;
  expiresAt: number;
};

export type Clock = () => number;
