import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false });
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
};

const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return "info";
};

const parseStatusCodes = (value: string | undefined, fallback: number[]): number[] => {
  if (!value) return fallback;
  const codes = value
    .split(",")
    .map((part) => Number(part.trim()))
    .filter((code) => Number.isInteger(code) && code >= 100 && code <= 599);
  return codes.length > 0 ? codes : fallback;
};

// 5 days
export const DEFAULT_CACHE_TTL_SECONDS = 5 * 86_400;

export const appConfig = {
  endpoints: {
    openTargets:
      process.env.OPENTARGETS_GRAPHQL_URL ??
      "https://api.platform.opentargets.org/api/v4/graphql",
    clinicalTrials:
      process.env.CLINICALTRIALS_API_URL ?? "https://clinicaltrials.gov/api/v2/studies",
    openFda: process.env.OPENFDA_API_URL ?? "https://api.fda.gov/drug/event.json",
  },
  openFda: {
    apiKey: process.env.OPENFDA_API_KEY?.trim() || null,
  },
  request: {
    timeoutMs: parseNumber(process.env.REQUEST_TIMEOUT_MS, 30_000),
    maxRetries: Math.max(0, Math.floor(parseNumber(process.env.REQUEST_MAX_RETRIES, 3))),
    baseDelayMs: parseNumber(process.env.REQUEST_BASE_DELAY_MS, 1_000),
    maxDelayMs: parseNumber(process.env.REQUEST_MAX_DELAY_MS, 30_000),
    backoffFactor: parseNumber(process.env.REQUEST_BACKOFF_FACTOR, 2),
    retryableStatusCodes: parseStatusCodes(
      process.env.REQUEST_RETRYABLE_STATUS_CODES,
      [429, 500, 502, 503, 504],
    ),
  },
  rateLimit: {
    requestsPerSecond: parseNumber(process.env.RATE_LIMIT_RPS, 5),
    burst: Math.max(1, Math.floor(parseNumber(process.env.RATE_LIMIT_BURST, 10))),
  },
  cache: {
    directory: path.resolve(process.cwd(), process.env.CACHE_DIR ?? "_cache"),
    ttlSeconds: parseNumber(process.env.CACHE_TTL_SECONDS, DEFAULT_CACHE_TTL_SECONDS),
    maxEntries: parseNumber(process.env.CACHE_MAX_ENTRIES, 500),
    persist: parseBoolean(process.env.CACHE_PERSIST, true),
  },
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
