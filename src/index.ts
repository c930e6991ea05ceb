export { appConfig, DEFAULT_CACHE_TTL_SECONDS, type LogLevel } from "./config.js";
export {
  DataSourceError,
  EntityNotFoundError,
  ExhaustedRetryError,
  MalformedResponseError,
  TerminalResponseError,
  TransientNetworkError,
  isDataSourceError,
  type DataSourceErrorKind,
  type ErrorContext,
} from "./errors.js";
export {
  RequestExecutor,
  buildUrl,
  computeBackoffMs,
  createRequestConfig,
  type FetchFn,
  type QueryParams,
  type RequestConfig,
  type RequestConfigInput,
  type RequestContext,
  type RequestExecutorOptions,
  type RequestTransport,
} from "./http.js";
export { TokenBucketRateLimiter, parseRetryAfterMs, type RateLimitConfig } from "./rate-limit.js";
export { TwoTierCache, type CacheStats, type TwoTierCacheOptions } from "./cache/manager.js";
export { cacheKey, type CacheParams } from "./cache/key.js";
export { normalizeDrugName } from "./helpers/drug-names.js";
export { setLogLevel } from "./telemetry.js";
export { OpenTargetsClient, type OpenTargetsClientOptions } from "./sources/opentargets.js";
export {
  ClinicalTrialsClient,
  aggregateLandscape,
  buildSearchParams,
  classifyStopReason,
  normalizePhase,
  phaseRank,
  type ClinicalTrialsClientOptions,
  type PhaseCode,
  type SearchTrialsOptions,
} from "./sources/clinicaltrials.js";
export {
  MAX_LIMIT as OPENFDA_MAX_LIMIT,
  OpenFdaClient,
  parseEvent as parseFaersEvent,
  reactionOutcome,
  type OpenFdaClientOptions,
} from "./sources/openfda.js";
export * from "./lib/contracts.js";
