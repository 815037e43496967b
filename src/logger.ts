import { trace } from "@opentelemetry/api";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let _minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";
let _context: Record<string, unknown> = {};

/** Merge fields into every subsequent log line of this process (e.g. service, replica id). */
export function setLogContext(ctx: Record<string, unknown>): void {
  _context = { ..._context, ...ctx };
}

export function clearLogContext(): void {
  _context = {};
}

export function setLogLevel(level: LogLevel): void {
  _minLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[_minLevel];
}

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

function emit(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  const ctx = trace.getActiveSpan()?.spanContext();
  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    msg,
    ..._context,
    ...(ctx?.traceId && { trace_id: ctx.traceId }),
    ...(ctx?.spanId && { span_id: ctx.spanId }),
    ...extra,
  };
  const line = JSON.stringify(entry);
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

export const logger: Logger = {
  debug: (msg, extra) => emit("debug", msg, extra),
  info: (msg, extra) => emit("info", msg, extra),
  warn: (msg, extra) => emit("warn", msg, extra),
  error: (msg, extra) => emit("error", msg, extra),
};

/**
 * Logger that stamps fixed fields (component, session_id, ...) on each line.
 * Call-site fields win over bound ones.
 */
export function childLogger(bound: Record<string, unknown>): Logger {
  return {
    debug: (msg, extra) => emit("debug", msg, { ...bound, ...extra }),
    info: (msg, extra) => emit("info", msg, { ...bound, ...extra }),
    warn: (msg, extra) => emit("warn", msg, { ...bound, ...extra }),
    error: (msg, extra) => emit("error", msg, { ...bound, ...extra }),
  };
}
