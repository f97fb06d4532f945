/**
 * Leveled diagnostics on stderr.
 *
 * Command results are printed to stdout by the commands themselves; this
 * logger carries warnings and debugging detail only, so piping `arbor path`
 * into `cd` keeps working.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_PREFIX = "[arbor]";

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.ARBOR_LOG_LEVEL?.toLowerCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  if (process.env.ARBOR_DEBUG === "1" || process.env.ARBOR_DEBUG === "true") {
    return "debug";
  }

  return DEFAULT_LOG_LEVEL;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[getLogLevel()];
}

export function formatMessage(level: LogLevel, message: string, context?: string): string {
  const levelTag = level.toUpperCase().padEnd(5);
  const contextTag = context ? `[${context}]` : "";
  return `${LOG_PREFIX} ${levelTag} ${contextTag} ${message}`.trim();
}

function emit(level: LogLevel, message: string, context?: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  console.error(formatMessage(level, message, context));
  if (data) {
    console.error(`${LOG_PREFIX}       `, JSON.stringify(data, null, 2));
  }
}

export const logger = {
  debug(message: string, context?: string, data?: Record<string, unknown>): void {
    emit("debug", message, context, data);
  },

  info(message: string, context?: string, data?: Record<string, unknown>): void {
    emit("info", message, context, data);
  },

  warn(message: string, context?: string, data?: Record<string, unknown>): void {
    emit("warn", message, context, data);
  }
};
