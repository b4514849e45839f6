import { env, type Env } from "./env";

type LogContext = Record<string, unknown>;

type Level = "debug" | "info" | "warn" | "error";

export type LogLevel = Env["LOG_LEVEL"];

type LoggerFn = (message: string, context?: LogContext) => void;

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let threshold = ORDER[env.LOG_LEVEL];

export function setLogLevel(level: LogLevel): void {
  threshold = ORDER[level];
}

/**
 * All logs go to stderr; stdout stays free for CLI/JSON output.
 */
const emit = (level: Level, message: string, context?: LogContext): void => {
  if (ORDER[level] < threshold) return;
  const out = level === "warn" ? console.warn : console.error;
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
  if (context && Object.keys(context).length > 0) {
    out(line, context);
    return;
  }
  out(line);
};

export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);

export type Logger = {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
};

export const logger: Logger = { info: logInfo, warn: logWarning, error: logError, debug: logDebug };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
