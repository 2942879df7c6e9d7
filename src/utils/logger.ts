/**
 * @module utils/logger
 * @description Scoped, level-filtered console logging.
 *
 * Levels in ascending severity: DEBUG, INFO, WARNING, ERROR. The minimum
 * level comes from the explicit argument, else `CPOR_LOG_LEVEL`, else
 * `LOG_LEVEL`, else INFO. Environment lookups happen per call so a level
 * change takes effect without recreating loggers.
 *
 * @example
 * ```ts
 * const logger = createLogger("cpor:crypto");
 * logger.warn("TPM not available, falling back to software storage");
 * // Output: [cpor:crypto] TPM not available, falling back to software storage
 * ```
 */

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = [
  "DEBUG",
  "INFO",
  "WARNING",
  "ERROR",
];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the minimum level from the environment.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  for (const candidate of [env.CPOR_LOG_LEVEL, env.LOG_LEVEL]) {
    const upper = candidate?.toUpperCase();
    if (upper && isLogLevel(upper)) {
      return upper;
    }
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Creates a logger that prefixes every line with `[scope]`.
 *
 * @param scope - Prefix such as "cpor:crypto".
 * @param level - Fixed minimum level; omit to follow the environment.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const prefix = `[${scope}]`;
  const shouldLog = (messageLevel: LogLevel): boolean =>
    LOG_LEVEL_VALUES[messageLevel] >=
    LOG_LEVEL_VALUES[level ?? getLogLevel()];

  return {
    debug(message, ...args) {
      if (shouldLog("DEBUG")) console.debug(prefix, message, ...args);
    },
    info(message, ...args) {
      if (shouldLog("INFO")) console.log(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (shouldLog("WARNING")) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (shouldLog("ERROR")) console.error(prefix, message, ...args);
    },
  };
}
