export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Console logger that drops anything below `level` and tags every line. */
export function createLogger(level: LogLevel, prefix: string): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
