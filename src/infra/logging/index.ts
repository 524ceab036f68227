/**
 * Logging Infrastructure
 *
 * Defines the Logger interface every component receives at construction.
 */

/**
 * Log levels for filtering output
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

/**
 * Log categories used for filtering and de-duplication
 */
export type LogCategory =
  | "STARTUP"
  | "RECONCILE"
  | "JOURNAL"
  | "HEALTH"
  | "RPC"
  | "RUNTIME";

/** Structured fields attached to a log line */
export interface LogContext {
  runId?: string;
  botId?: string;
  category?: LogCategory;
  [key: string]: unknown;
}

/**
 * Logger interface for consistent logging across the application
 */
export interface Logger {
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
}

/**
 * Create a no-op logger that discards all output
 * Useful for testing or when logging should be suppressed
 */
export function createNullLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
