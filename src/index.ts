/**
 * Runtime consistency and health evidence core for a single trading bot.
 */

export * from "./config";
export * from "./core";
export * from "./monitoring";
export * from "./models";
export * from "./services";
export * from "./errors/app.errors";
export { newClientOrderId } from "./utils/client-order-id";
export {
  withRetry,
  calculateBackoff,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type RetryOptions,
  type RetryResult,
} from "./utils/retry";
export {
  StructuredLogger,
  getLogger,
  resetLogger,
  generateRunId,
  redactSecrets,
} from "./utils/structured-logger";
export { createNullLogger, type Logger, type LogContext, type LogCategory } from "./infra/logging";
export { TickLoop, type TickLoopOptions, type TickResult, type TickLoopExit } from "./app/tick-loop";
export {
  startRuntime,
  installShutdownHandlers,
  type StartRuntimeOptions,
  type RuntimeHandle,
} from "./app/main";
