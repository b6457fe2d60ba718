import dotenv from "dotenv";

export type TtlTiers = {
  longMs: number;
  mediumMs: number;
  shortMs: number;
};

export type RatePolicy = {
  baseDelayMs: number;
  moderateDelayMs: number;
  maxDelayMs: number;
  lowQuotaThreshold: number;
  criticalQuotaThreshold: number;
  cooldownMs: number;
};

export type AppConfig = {
  port: number;
  remoteBaseUrl: string;
  remoteApiKey: string;
  remoteSystemName: string;
  cacheEnabled: boolean;
  cacheMaxEntries: number;
  cacheMaxValueBytes: number;
  ttl: TtlTiers;
  rate: RatePolicy;
  pageSize: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
};

const DEFAULT_PORT = 3000;
const DEFAULT_REMOTE_BASE_URL = "https://api.example.com/v1";
const DEFAULT_SYSTEM_NAME = "resilient-query-layer";
const DEFAULT_CACHE_MAX_ENTRIES = 1000;
const DEFAULT_CACHE_MAX_VALUE_BYTES = 2 * 1024 * 1024;
const DEFAULT_TTL_LONG_MS = 5 * 60 * 1000;
const DEFAULT_TTL_MEDIUM_MS = 60 * 1000;
const DEFAULT_TTL_SHORT_MS = 30 * 1000;
const DEFAULT_BASE_DELAY_MS = 50;
const DEFAULT_MODERATE_DELAY_MS = 150;
const DEFAULT_MAX_DELAY_MS = 250;
const DEFAULT_LOW_QUOTA_THRESHOLD = 50;
const DEFAULT_CRITICAL_QUOTA_THRESHOLD = 10;
const DEFAULT_COOLDOWN_MS = 2000;
// The remote rejects any page larger than this.
const MAX_REMOTE_PAGE_SIZE = 100;
const DEFAULT_REQUEST_TIMEOUT_MS = 30 * 1000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BACKOFF_MS = 500;

export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    dotenv.config();
    console.log("[app-config:getAppConfig] env loaded");
  }

  const baseDelayMs = parseNumber(
    env.RATE_BASE_DELAY_MS,
    DEFAULT_BASE_DELAY_MS,
    "rate.baseDelayMs",
  );
  const moderateDelayMs = Math.max(
    baseDelayMs,
    parseNumber(
      env.RATE_MODERATE_DELAY_MS,
      DEFAULT_MODERATE_DELAY_MS,
      "rate.moderateDelayMs",
    ),
  );
  const maxDelayMs = Math.max(
    moderateDelayMs,
    parseNumber(env.RATE_MAX_DELAY_MS, DEFAULT_MAX_DELAY_MS, "rate.maxDelayMs"),
  );

  const pageSize = parseNumber(env.PAGE_SIZE, MAX_REMOTE_PAGE_SIZE, "pageSize");
  if (pageSize > MAX_REMOTE_PAGE_SIZE || pageSize < 1) {
    console.warn(
      "[app-config:getAppConfig] page size out of range, clamping",
      pageSize,
    );
  }

  return {
    port: parseNumber(env.PORT, DEFAULT_PORT, "port"),
    remoteBaseUrl: env.REMOTE_API_BASE_URL || DEFAULT_REMOTE_BASE_URL,
    remoteApiKey: env.REMOTE_API_KEY ?? "",
    remoteSystemName: env.REMOTE_SYSTEM_NAME || DEFAULT_SYSTEM_NAME,
    cacheEnabled: parseBoolean(env.CACHE_ENABLED, true, "cacheEnabled"),
    cacheMaxEntries: parseNumber(
      env.CACHE_MAX_ENTRIES,
      DEFAULT_CACHE_MAX_ENTRIES,
      "cacheMaxEntries",
    ),
    cacheMaxValueBytes: parseNumber(
      env.CACHE_MAX_VALUE_BYTES,
      DEFAULT_CACHE_MAX_VALUE_BYTES,
      "cacheMaxValueBytes",
    ),
    ttl: {
      longMs: parseNumber(env.CACHE_TTL_LONG_MS, DEFAULT_TTL_LONG_MS, "ttl.longMs"),
      mediumMs: parseNumber(
        env.CACHE_TTL_MEDIUM_MS,
        DEFAULT_TTL_MEDIUM_MS,
        "ttl.mediumMs",
      ),
      shortMs: parseNumber(
        env.CACHE_TTL_SHORT_MS,
        DEFAULT_TTL_SHORT_MS,
        "ttl.shortMs",
      ),
    },
    rate: {
      baseDelayMs,
      moderateDelayMs,
      maxDelayMs,
      lowQuotaThreshold: parseNumber(
        env.RATE_LOW_QUOTA_THRESHOLD,
        DEFAULT_LOW_QUOTA_THRESHOLD,
        "rate.lowQuotaThreshold",
      ),
      criticalQuotaThreshold: parseNumber(
        env.RATE_CRITICAL_QUOTA_THRESHOLD,
        DEFAULT_CRITICAL_QUOTA_THRESHOLD,
        "rate.criticalQuotaThreshold",
      ),
      cooldownMs: parseNumber(
        env.RATE_COOLDOWN_MS,
        DEFAULT_COOLDOWN_MS,
        "rate.cooldownMs",
      ),
    },
    pageSize: Math.min(Math.max(pageSize, 1), MAX_REMOTE_PAGE_SIZE),
    requestTimeoutMs: parseNumber(
      env.REQUEST_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
      "requestTimeoutMs",
    ),
    maxRetries: parseNumber(
      env.FETCH_MAX_RETRIES,
      DEFAULT_MAX_RETRIES,
      "maxRetries",
    ),
    retryBackoffMs: parseNumber(
      env.FETCH_RETRY_BACKOFF_MS,
      DEFAULT_RETRY_BACKOFF_MS,
      "retryBackoffMs",
    ),
  };
}

function parseNumber(
  value: string | undefined,
  fallback: number,
  name: string,
): number {
  if (!value) {
    console.debug("[app-config:parseNumber] using default", name, fallback);
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    console.warn(
      "[app-config:parseNumber] invalid value using default",
      name,
      value,
    );
    return fallback;
  }

  return parsed;
}

function parseBoolean(
  value: string | undefined,
  fallback: boolean,
  name: string,
): boolean {
  if (!value) {
    console.debug("[app-config:parseBoolean] using default", name, fallback);
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }

  console.warn(
    "[app-config:parseBoolean] invalid value using default",
    name,
    value,
  );
  return fallback;
}
