import { format } from "util";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? "").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return "info";
}

/**
 * Writes `<ts> <LEVEL> [scope] message` lines to stderr; stdout carries the MCP stdio transport.
 * `%s`-style placeholders are expanded with util.format.
 */
export function createConsoleLogger(scope: string, level: LogLevel = parseLogLevel(process.env.BENCHDOCK_LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (lvl: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    console.error(`${new Date().toISOString()} ${lvl.toUpperCase()} [${scope}] ${format(message, ...args)}`);
  };
  return {
    debug: (message, ...args) => emit("debug", message, args),
    info: (message, ...args) => emit("info", message, args),
    warn: (message, ...args) => emit("warn", message, args),
    error: (message, ...args) => emit("error", message, args)
  };
}
