export type DataSourceErrorKind =
  | "transient"
  | "exhausted"
  | "terminal"
  | "malformed"
  | "not_found";

export type ErrorContext = {
  source: string;
  operation: string;
};

type DataSourceErrorOptions = {
  status?: number | null;
  body?: string | null;
  cause?: unknown;
};

function excerpt(body: string | null | undefined, max = 500): string | null {
  if (body == null) return null;
  return body.length > max ? body.slice(0, max) : body;
}

/**
 * Base class for every failure surfaced by a data source. Carries the source
 * name, the operation being attempted and the upstream status when there was one.
 */
export class DataSourceError extends Error {
  readonly kind: DataSourceErrorKind;
  readonly source: string;
  readonly operation: string;
  readonly status: number | null;
  readonly body: string | null;
  /** The message without the source/operation prefix. */
  readonly detail: string;

  constructor(
    kind: DataSourceErrorKind,
    context: ErrorContext,
    message: string,
    options: DataSourceErrorOptions = {},
  ) {
    super(`[${context.source}] ${context.operation}: ${message}`, { cause: options.cause });
    this.name = "DataSourceError";
    this.kind = kind;
    this.source = context.source;
    this.operation = context.operation;
    this.status = options.status ?? null;
    this.body = excerpt(options.body);
    this.detail = message;
  }
}

/** Timeout, connection failure or retryable status for a single attempt. */
export class TransientNetworkError extends DataSourceError {
  constructor(context: ErrorContext, message: string, options: DataSourceErrorOptions = {}) {
    super("transient", context, message, options);
    this.name = "TransientNetworkError";
  }
}

export class ExhaustedRetryError extends DataSourceError {
  readonly attempts: number;

  constructor(context: ErrorContext, attempts: number, lastError: TransientNetworkError) {
    super(
      "exhausted",
      context,
      `gave up after ${attempts} attempts: ${lastError.detail}`,
      { status: lastError.status, body: lastError.body, cause: lastError },
    );
    this.name = "ExhaustedRetryError";
    this.attempts = attempts;
  }
}

/** Non-retryable status (e.g. 404) or an error reported inside a GraphQL body. */
export class TerminalResponseError extends DataSourceError {
  constructor(context: ErrorContext, message: string, options: DataSourceErrorOptions = {}) {
    super("terminal", context, message, options);
    this.name = "TerminalResponseError";
  }
}

export class MalformedResponseError extends DataSourceError {
  readonly identifier: string;

  constructor(
    context: ErrorContext,
    identifier: string,
    message: string,
    options: DataSourceErrorOptions = {},
  ) {
    super("malformed", context, `malformed response for '${identifier}': ${message}`, options);
    this.name = "MalformedResponseError";
    this.identifier = identifier;
  }
}

export class EntityNotFoundError extends DataSourceError {
  readonly identifier: string;

  constructor(context: ErrorContext, identifier: string, message: string) {
    super("not_found", context, message);
    this.name = "EntityNotFoundError";
    this.identifier = identifier;
  }
}

export function isDataSourceError(error: unknown): error is DataSourceError {
  return error instanceof DataSourceError;
}
