import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Use NestJS LogLevel type for consistency with framework
 * Valid values: "error" | "warn" | "log" | "debug" | "verbose" | "fatal"
 */
export type LogLevel = NestLogLevel;

/**
 * Log level hierarchy for filtering, most severe first
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

/**
 * Check if a message should be logged based on current log level
 */
export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Levels enabled for a configured threshold, in the order NestJS expects them
 */
export function enabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  return LOG_LEVELS.filter(level => shouldLog(level, currentLevel));
}
