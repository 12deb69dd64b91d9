/**
 * Structured JSON Logger
 *
 * Outputs newline-delimited JSON to stderr for structured log collection.
 * Level comes from BRIDGE_LOG_LEVEL, or from setLogLevel() once config is loaded.
 */

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getConfiguredLevel(): LogLevel {
  const env = process.env.BRIDGE_LOG_LEVEL?.toLowerCase();
  if (env && isLogLevel(env)) return env;
  return "info";
}

let configuredLevel = getConfiguredLevel();

export function setLogLevel(level: LogLevel): void {
  configuredLevel = level;
}

export function getLogLevel(): LogLevel {
  return configuredLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[configuredLevel];
}

function writeLog(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + "\n");
}

export interface Logger {
  debug: (message: string, extra?: Record<string, unknown>) => void;
  info: (message: string, extra?: Record<string, unknown>) => void;
  warn: (message: string, extra?: Record<string, unknown>) => void;
  error: (message: string, extra?: Record<string, unknown>) => void;
  /** Logger that stamps every entry with the given fields */
  child: (bindings: Record<string, unknown>) => Logger;
}

export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      ...bindings,
      ...extra,
    };

    writeLog(entry);
  }

  return {
    debug: (message, extra) => emit("debug", message, extra),
    info: (message, extra) => emit("info", message, extra),
    warn: (message, extra) => emit("warn", message, extra),
    error: (message, extra) => emit("error", message, extra),
    child: (extra) => createLogger(component, { ...bindings, ...extra }),
  };
}
