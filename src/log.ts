/**
 * Scoped console logging.
 *
 * Each module creates its own logger; lines carry a `[scope]` prefix and are
 * gated by one process-wide level, read from SLICESTITCH_LOG at startup.
 */

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const raw = typeof process !== "undefined" ? process.env?.SLICESTITCH_LOG : undefined;
  return raw !== undefined && isLogLevel(raw) ? raw : "warn";
}

let globalLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export type Logger = {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const enabled = (level: LogLevel) => RANK[globalLevel] >= RANK[level];
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
