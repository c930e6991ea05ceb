import { z } from "zod";
import { appConfig } from "./config.js";
import {
  ExhaustedRetryError,
  MalformedResponseError,
  TerminalResponseError,
  TransientNetworkError,
  type ErrorContext,
} from "./errors.js";
import {
  TokenBucketRateLimiter,
  defaultSleep,
  parseRetryAfterMs,
  type RateLimitConfig,
  type Sleep,
} from "./rate-limit.js";
import { logEvent, toErrorMessage } from "./telemetry.js";

export type RequestConfig = Readonly<{
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  retryableStatusCodes: ReadonlySet<number>;
}>;

export type RequestConfigInput = {
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  retryableStatusCodes?: Iterable<number>;
};

export function createRequestConfig(overrides: RequestConfigInput = {}): RequestConfig {
  const defaults = appConfig.request;
  return Object.freeze({
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
    maxRetries: Math.max(0, Math.floor(overrides.maxRetries ?? defaults.maxRetries)),
    baseDelayMs: overrides.baseDelayMs ?? defaults.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? defaults.maxDelayMs,
    backoffFactor: overrides.backoffFactor ?? defaults.backoffFactor,
    retryableStatusCodes: new Set(overrides.retryableStatusCodes ?? defaults.retryableStatusCodes),
  });
}

/** Delay before the retry that follows failed attempt `attempt` (0-based). */
export function computeBackoffMs(config: RequestConfig, attempt: number): number {
  return Math.min(
    config.baseDelayMs * Math.pow(config.backoffFactor, attempt),
    config.maxDelayMs,
  );
}

export type RequestContext = ErrorContext & {
  identifier?: string;
};

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/**
 * The call shapes every domain client composes over. `RequestExecutor` is the
 * network implementation; tests substitute in-process fakes.
 */
export interface RequestTransport {
  getJson(url: string, params: QueryParams, context: RequestContext): Promise<unknown>;
  postGraphQL(
    url: string,
    query: string,
    variables: Record<string, unknown>,
    context: RequestContext,
  ): Promise<unknown>;
  getText(url: string, params: QueryParams, context: RequestContext): Promise<string>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type RequestExecutorOptions = {
  config?: RequestConfigInput;
  /** `null` turns rate limiting off. */
  rateLimit?: RateLimitConfig | null;
  fetchImpl?: FetchFn;
  sleep?: Sleep;
  userAgent?: string;
};

type OutboundRequest = {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: string;
};

type RawResponse = {
  status: number;
  ok: boolean;
  headers: Headers;
  body: string;
};

const graphQlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string().optional() }).passthrough())
    .optional(),
});

export function buildUrl(url: string, params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value == null) continue;
    search.set(key, String(value));
  }
  const query = search.toString();
  if (!query) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

function identifierOf(context: RequestContext, fallback: string): string {
  return context.identifier ?? fallback;
}

export class RequestExecutor implements RequestTransport {
  readonly config: RequestConfig;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: Sleep;
  private readonly limiter: TokenBucketRateLimiter | null;
  private readonly userAgent: string;

  constructor(options: RequestExecutorOptions = {}) {
    this.config = createRequestConfig(options.config);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    const rateLimit = options.rateLimit === undefined ? appConfig.rateLimit : options.rateLimit;
    this.limiter = rateLimit ? new TokenBucketRateLimiter(rateLimit, { sleep: this.sleep }) : null;
    this.userAgent = options.userAgent ?? "evidence-retrieval/0.1";
  }

  async getJson(url: string, params: QueryParams, context: RequestContext): Promise<unknown> {
    const target = buildUrl(url, params);
    const response = await this.execute(
      { method: "GET", url: target, headers: { accept: "application/json" } },
      context,
    );
    return this.parseJson(response, context, target);
  }

  async postGraphQL(
    url: string,
    query: string,
    variables: Record<string, unknown>,
    context: RequestContext,
  ): Promise<unknown> {
    const response = await this.execute(
      {
        method: "POST",
        url,
        headers: { accept: "application/json", "content-type": "application/json" },
        body: JSON.stringify({ query, variables }),
      },
      context,
    );

    const payload = this.parseJson(response, context, url);
    const envelope = graphQlEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new MalformedResponseError(
        context,
        identifierOf(context, url),
        "GraphQL body is not an object",
        { status: response.status, body: response.body },
      );
    }

    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      const messages = errors.map((error) => error.message ?? "unknown GraphQL error");
      throw new TerminalResponseError(context, `GraphQL errors: ${messages.join("; ")}`, {
        status: response.status,
        body: response.body,
      });
    }

    if (envelope.data.data == null) {
      throw new MalformedResponseError(
        context,
        identifierOf(context, url),
        "GraphQL body has no data member",
        { status: response.status, body: response.body },
      );
    }

    return envelope.data.data;
  }

  async getText(url: string, params: QueryParams, context: RequestContext): Promise<string> {
    const response = await this.execute(
      { method: "GET", url: buildUrl(url, params), headers: { accept: "text/*, application/xml" } },
      context,
    );
    return response.body;
  }

  /**
   * Runs one request under the retry policy. Transient failures are retried
   * with exponential backoff; anything else surfaces on the first attempt.
   */
  private async execute(request: OutboundRequest, context: RequestContext): Promise<RawResponse> {
    const { maxRetries, retryableStatusCodes } = this.config;

    for (let attempt = 0; ; attempt += 1) {
      if (this.limiter) {
        await this.limiter.acquire();
      }

      logEvent("debug", "request.attempt", {
        source: context.source,
        operation: context.operation,
        method: request.method,
        url: request.url,
        attempt: attempt + 1,
      });

      let transient: TransientNetworkError;
      let waitMs = computeBackoffMs(this.config, attempt);

      try {
        const response = await this.attemptOnce(request);

        if (response.ok) {
          return response;
        }

        if (!retryableStatusCodes.has(response.status)) {
          throw new TerminalResponseError(context, `HTTP ${response.status}`, {
            status: response.status,
            body: response.body,
          });
        }

        transient = new TransientNetworkError(context, `HTTP ${response.status}`, {
          status: response.status,
          body: response.body,
        });
        if (response.status === 429) {
          const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
          if (retryAfterMs != null) {
            waitMs = Math.min(retryAfterMs, this.config.maxDelayMs);
          }
        }
      } catch (error) {
        if (error instanceof TerminalResponseError) throw error;
        transient = new TransientNetworkError(context, toErrorMessage(error), { cause: error });
      }

      if (attempt >= maxRetries) {
        logEvent("error", "request.exhausted", {
          source: context.source,
          operation: context.operation,
          url: request.url,
          attempts: attempt + 1,
          status: transient.status,
        });
        throw new ExhaustedRetryError(context, attempt + 1, transient);
      }

      logEvent("warn", "request.retry", {
        source: context.source,
        operation: context.operation,
        url: request.url,
        attempt: attempt + 1,
        status: transient.status,
        waitMs,
        message: transient.message,
      });
      await this.sleep(waitMs);
    }
  }

  private async attemptOnce(request: OutboundRequest): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: { "user-agent": this.userAgent, ...request.headers },
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text();
      return { status: response.status, ok: response.ok, headers: response.headers, body };
    } catch (error) {
      if (timedOut) {
        throw new Error(`timeout after ${this.config.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseJson(response: RawResponse, context: RequestContext, url: string): unknown {
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new MalformedResponseError(
        context,
        identifierOf(context, url),
        "body is not valid JSON",
        { status: response.status, body: response.body, cause: error },
      );
    }
  }
}
