import { randomUUID } from "node:crypto";
import { appConfig, type LogLevelSetting } from "./config.js";

type LogLevel = Exclude<LogLevelSetting, "silent">;
type Fields = Record<string, unknown>;

export type RequestLogContext = {
  requestId: string;
  route: string;
  startedAt: number;
};

const levelRank: Record<LogLevelSetting, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

const sinks: Record<LogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function compactString(value: string, max = 240): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  return normalized.length <= max ? normalized : `${normalized.slice(0, max - 1)}…`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return compactString(error.message);
  if (typeof error === "string") return compactString(error);
  return "unknown error";
}

function emit(level: LogLevel, event: string, fields: Fields) {
  if (levelRank[level] < levelRank[appConfig.logging.level]) return;
  sinks[level](JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }));
}

function requestFields(context: RequestLogContext): Fields {
  return {
    requestId: context.requestId,
    route: context.route,
    elapsedMs: Date.now() - context.startedAt,
  };
}

/** Lifecycle events that are not tied to a request (startup, rebuilds, provider choice). */
export function logEvent(level: LogLevel, event: string, fields: Fields = {}) {
  emit(level, event, fields);
}

export function startRequestLog(route: string, fields: Fields = {}): RequestLogContext {
  const context = { requestId: randomUUID().slice(0, 8), route, startedAt: Date.now() };
  emit("info", "request.start", { requestId: context.requestId, route, ...fields });
  return context;
}

export function stepRequestLog(context: RequestLogContext, event: string, fields: Fields = {}) {
  emit("info", event, { ...requestFields(context), ...fields });
}

export function warnRequestLog(context: RequestLogContext, event: string, fields: Fields = {}) {
  emit("warn", event, { ...requestFields(context), ...fields });
}

export function errorRequestLog(
  context: RequestLogContext,
  event: string,
  error: unknown,
  fields: Fields = {},
) {
  emit("error", event, { ...requestFields(context), message: toErrorMessage(error), ...fields });
}

export function endRequestLog(context: RequestLogContext, fields: Fields = {}) {
  emit("info", "request.end", { ...requestFields(context), ...fields });
}
