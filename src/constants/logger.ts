/**
 * Logger constants — log level priority mapping
 */

import type { LogLevel } from "@/types";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Default level when LOG_LEVEL is unset or invalid
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * CLI --verbose level to log level
 * 0 = warnings and errors, 1 = general, 2 = everything
 */
export const VERBOSITY_LOG_LEVELS: readonly LogLevel[] = ["warn", "info", "debug"];
