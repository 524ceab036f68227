/**
 * Structured Logging System
 *
 * Provides JSON and human-readable logging with:
 * - Run correlation ID
 * - Log categories for filtering
 * - Deduplication (5 second window)
 * - Secret redaction
 * - Suppression counters
 */

import crypto from "node:crypto";
import chalk from "chalk";
import type {
  LogCategory,
  LogContext,
  LogLevel,
  Logger,
} from "../infra/logging";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
}

export type LogFormat = "json" | "pretty";

/** Where formatted lines go; console by default */
export type LogSink = (line: string) => void;

interface DeduplicationEntry {
  message: string;
  category?: LogCategory;
  firstSeen: number;
  lastSeen: number;
  count: number;
}

const DEDUP_WINDOW_MS = 5000;
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

// Compared lower-case
const SECRET_KEYS = new Set([
  "servicerolekey",
  "runtimetoken",
  "apikey",
  "authorization",
  "x-runtime-token",
]);

/**
 * Generate a unique run ID
 */
export function generateRunId(): string {
  return `run_${Date.now()}_${crypto.randomBytes(4).toString("hex")}`;
}

function isNestedContext(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact credentials from log context, recursing into nested objects
 */
export function redactSecrets(context: LogContext): LogContext {
  const redacted: LogContext = { ...context };

  for (const key of Object.keys(redacted)) {
    const value = redacted[key];
    if (SECRET_KEYS.has(key.toLowerCase()) && typeof value === "string") {
      redacted[key] = `[REDACTED len=${value.length}]`;
    } else if (isNestedContext(value)) {
      redacted[key] = redactSecrets(value);
    }
  }

  return redacted;
}

function parseFormat(value: string): LogFormat {
  return value.toLowerCase().trim() === "pretty" ? "pretty" : "json";
}

function parseLevel(value: string): LogLevel {
  const normalized = value.toLowerCase().trim();
  if (
    normalized === "error" ||
    normalized === "warn" ||
    normalized === "info" ||
    normalized === "debug"
  ) {
    return normalized;
  }
  return "info";
}

/**
 * Structured Logger with deduplication
 */
export class StructuredLogger implements Logger {
  private readonly format: LogFormat;
  private readonly level: LogLevel;
  private readonly baseContext: LogContext;
  private readonly sink: LogSink;
  private readonly now: () => number;
  private readonly deduplicationMap = new Map<string, DeduplicationEntry>();
  private deduplicationTimer?: NodeJS.Timeout;

  constructor(options?: {
    format?: string;
    level?: string;
    baseContext?: LogContext;
    sink?: LogSink;
    now?: () => number;
    /** Periodic flush of suppression counters (default: true) */
    autoFlush?: boolean;
  }) {
    this.format = parseFormat(
      options?.format ?? process.env.LOG_FORMAT ?? "json",
    );
    this.level = parseLevel(options?.level ?? process.env.LOG_LEVEL ?? "info");
    this.baseContext = options?.baseContext ?? {};
    this.sink = options?.sink ?? ((line) => console.log(line));
    this.now = options?.now ?? Date.now;

    if (options?.autoFlush ?? true) {
      this.startDeduplicationCleanup();
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }

  private startDeduplicationCleanup(): void {
    this.deduplicationTimer = setInterval(() => {
      this.flushDeduplication();
    }, DEDUP_WINDOW_MS);

    // Don't prevent Node.js from exiting
    this.deduplicationTimer.unref();
  }

  /**
   * Emit suppression summaries for entries whose window has closed
   */
  flushDeduplication(): void {
    const now = this.now();

    for (const [key, entry] of this.deduplicationMap.entries()) {
      if (now - entry.lastSeen >= DEDUP_WINDOW_MS) {
        if (entry.count > 1) {
          this.emitSuppressionMessage(entry);
        }
        this.deduplicationMap.delete(key);
      }
    }
  }

  private emitSuppressionMessage(entry: DeduplicationEntry): void {
    this.emitLog("info", `(suppressed ${entry.count - 1} repeats)`, {
      ...this.baseContext,
      category: entry.category,
      suppressedCount: entry.count - 1,
    });
  }

  private checkDeduplication(message: string, context: LogContext): boolean {
    // Only messages with a category are de-duplicated
    if (!context.category) return false;
    const key = `${context.category}:${message}`;

    const now = this.now();
    const existing = this.deduplicationMap.get(key);

    if (existing && now - existing.firstSeen < DEDUP_WINDOW_MS) {
      existing.lastSeen = now;
      existing.count++;
      return true;
    }

    if (existing && existing.count > 1) {
      this.emitSuppressionMessage(existing);
    }
    this.deduplicationMap.set(key, {
      message,
      category: context.category,
      firstSeen: now,
      lastSeen: now,
      count: 1,
    });
    return false;
  }

  private emitLog(level: LogLevel, message: string, context: LogContext): void {
    const timestamp = new Date(this.now()).toISOString();
    const redactedContext = redactSecrets(context);

    if (this.format === "json") {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        context: redactedContext,
      };
      this.sink(JSON.stringify(entry));
      return;
    }

    const levelColor =
      level === "error"
        ? chalk.red
        : level === "warn"
          ? chalk.yellow
          : level === "info"
            ? chalk.cyan
            : chalk.gray;

    const prefix = [
      levelColor(`[${level.toUpperCase()}]`),
      context.category ? chalk.magenta(`[${context.category}]`) : "",
      context.runId ? chalk.dim(`[${context.runId}]`) : "",
    ]
      .filter(Boolean)
      .join(" ");

    const contextKeys = Object.keys(redactedContext).filter(
      (k) => k !== "runId" && k !== "category",
    );

    if (contextKeys.length === 0) {
      this.sink(`${prefix} ${message}`);
      return;
    }

    const contextStr = contextKeys
      .map((k) => {
        const v = redactedContext[k];
        return `${k}=${typeof v === "object" ? JSON.stringify(v) : String(v)}`;
      })
      .join(" ");
    this.sink(`${prefix} ${message} ${chalk.dim(contextStr)}`);
  }

  log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (!this.shouldLog(level)) return;

    const fullContext = { ...this.baseContext, ...context };

    if (this.checkDeduplication(message, fullContext)) {
      return;
    }

    this.emitLog(level, message, fullContext);
  }

  child(context: LogContext): StructuredLogger {
    return new StructuredLogger({
      format: this.format,
      level: this.level,
      baseContext: { ...this.baseContext, ...context },
      sink: this.sink,
      now: this.now,
      autoFlush: this.deduplicationTimer !== undefined,
    });
  }

  error(message: string, context: LogContext = {}): void {
    this.log("error", message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log("warn", message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log("info", message, context);
  }

  debug(message: string, context: LogContext = {}): void {
    this.log("debug", message, context);
  }

  /**
   * Cleanup on shutdown
   */
  shutdown(): void {
    this.flushDeduplication();
    if (this.deduplicationTimer) {
      clearInterval(this.deduplicationTimer);
      this.deduplicationTimer = undefined;
    }
  }
}

let globalLogger: StructuredLogger | null = null;

/**
 * Get or create the process logger
 */
export function getLogger(): StructuredLogger {
  if (!globalLogger) {
    globalLogger = new StructuredLogger({
      baseContext: { runId: generateRunId() },
    });
  }
  return globalLogger;
}

/**
 * Reset the process logger (for testing)
 */
export function resetLogger(): void {
  if (globalLogger) {
    globalLogger.shutdown();
  }
  globalLogger = null;
}
