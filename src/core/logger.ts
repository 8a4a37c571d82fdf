/**
 * Namespaced logger
 *
 * Writes to stderr so that JSON printed on stdout stays machine readable.
 * The threshold comes from LOG_LEVEL (debug, info, warn, error); setting DEBUG
 * lowers it to debug. Defaults to warn.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the active level from the environment.
 * Read on every call so tests and the CLI can change it at runtime.
 */
export function getLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.DEBUG ? "debug" : "warn";
}

export function createLogger(namespace: string): Logger {
  const write = (level: LogLevel, args: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[getLogLevel()]) {
      return;
    }
    console.error(`[${namespace}]`, ...args);
  };

  return {
    debug: (...args) => write("debug", args),
    info: (...args) => write("info", args),
    warn: (...args) => write("warn", args),
    error: (...args) => write("error", args),
  };
}
