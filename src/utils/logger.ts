/**
 * Logging system for infragen
 * Based on tslog with structured output
 */

import { Logger, type ILogObj } from "tslog";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "infragen",
  level: "info",
  prettyPrint: true,
};

/**
 * Map log level string to tslog minLevel number
 */
function levelToNumber(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  return new Logger<ILogObj>({
    name: finalConfig.name,
    minLevel: levelToNumber(finalConfig.level),
    type: finalConfig.prettyPrint ? "pretty" : "json",
    prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

let globalLogger: Logger<ILogObj> | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Set the global logger instance
 */
export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}

/**
 * Log execution timing of a synchronous step
 */
export function logTiming<T>(logger: Logger<ILogObj>, operation: string, fn: () => T): T {
  const start = performance.now();
  try {
    const result = fn();
    const duration = performance.now() - start;
    logger.debug({ operation, durationMs: duration.toFixed(2), status: "success" });
    return result;
  } catch (error) {
    const duration = performance.now() - start;
    logger.debug({ operation, durationMs: duration.toFixed(2), status: "error" });
    throw error;
  }
}
