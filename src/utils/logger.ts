/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

let currentLogLevel: LogLevel = "info";

/**
 * Type guard for values read from the environment or other untyped sources.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Sets the active log level.
 * Should be called once during application startup after configuration is loaded.
 *
 * @param level - The level to apply
 */
export function initializeLogger(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Returns the log level currently in effect.
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Simple logger with configurable log levels.
 *
 * The level comes from `LOG_LEVEL` and is applied by `initializeLogger()`.
 * Before initialization, defaults to "info".
 *
 * Log levels (from most to least verbose):
 * - debug: Detailed debugging information
 * - info: General operational information (default)
 * - warn: Warning messages
 * - error: Error messages only
 * - none: No logging
 */
export const logger = {
  debug(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.debug) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  },

  info(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.info) {
      console.info(`[INFO] ${message}`, ...args);
    }
  },

  warn(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.warn) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  },

  error(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.error) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  },
};
