import { randomUUID } from "node:crypto";
import { appConfig, type LogLevel } from "./config.js";

type EmitLevel = Exclude<LogLevel, "silent">;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel = appConfig.logLevel;

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export type OperationLogContext = {
  operationId: string;
  source: string;
  operation: string;
  startedAt: number;
};

function nowIso() {
  return new Date().toISOString();
}

function compactString(value: string, max = 240): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= max) return normalized;
  return `${normalized.slice(0, max - 1)}…`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return compactString(error.message);
  if (typeof error === "string") return compactString(error);
  return "unknown error";
}

export function logEvent(level: EmitLevel, event: string, fields: Record<string, unknown> = {}) {
  if (levelOrder[level] < levelOrder[activeLevel]) return;
  const payload = {
    ts: nowIso(),
    level,
    event,
    ...fields,
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function startOperationLog(
  source: string,
  operation: string,
  fields: Record<string, unknown> = {},
): OperationLogContext {
  const context: OperationLogContext = {
    operationId: randomUUID().slice(0, 8),
    source,
    operation,
    startedAt: Date.now(),
  };

  logEvent("info", "operation.start", {
    operationId: context.operationId,
    source,
    operation,
    ...fields,
  });
  return context;
}

function contextFields(context: OperationLogContext) {
  return {
    operationId: context.operationId,
    source: context.source,
    operation: context.operation,
    elapsedMs: Date.now() - context.startedAt,
  };
}

export function stepOperationLog(
  context: OperationLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  logEvent("info", event, { ...contextFields(context), ...fields });
}

export function errorOperationLog(
  context: OperationLogContext,
  event: string,
  error: unknown,
  fields: Record<string, unknown> = {},
) {
  logEvent("error", event, {
    ...contextFields(context),
    message: toErrorMessage(error),
    ...fields,
  });
}

export function endOperationLog(
  context: OperationLogContext,
  fields: Record<string, unknown> = {},
) {
  logEvent("info", "operation.end", { ...contextFields(context), ...fields });
}

/**
 * Runs `task` between a start and end log line; failures are logged and rethrown.
 */
export async function withOperationLog<T>(
  source: string,
  operation: string,
  fields: Record<string, unknown>,
  task: (context: OperationLogContext) => Promise<T>,
): Promise<T> {
  const context = startOperationLog(source, operation, fields);
  try {
    const result = await task(context);
    endOperationLog(context);
    return result;
  } catch (error) {
    errorOperationLog(context, "operation.failed", error);
    throw error;
  }
}
