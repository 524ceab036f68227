/**
 * Configuration Index - Re-exports all configuration utilities and types
 *
 * - env.ts: Environment variable parsing
 * - presets.ts: Polling tier flush cadence and reconciliation cadence
 * - schema.ts: Configuration type definitions
 */

export {
  loadRuntimeEnv,
  DEFAULT_RPC_TIMEOUT_MS,
  DEFAULT_QUANTITY_TOLERANCE,
  DEFAULT_EXCHANGE,
  DEFAULT_TIMEFRAME,
} from "./env";

export {
  POLLING_TIERS,
  DEFAULT_TIER,
  FLUSH_INTERVALS_IN_POSITION,
  FLUSH_INTERVALS_OUT_OF_POSITION,
  ROLLING_WINDOW_SECONDS,
  DEBOUNCE_SECONDS,
  CRITICAL_DELAY_SECONDS,
  normalizeTier,
  getFlushIntervalSeconds,
  createFlushPolicy,
  resolveFlushIntervalMs,
  getReconcileIntervalMs,
  getPollIntervalMs,
  POLL_INTERVALS,
  timeframeToSeconds,
} from "./presets";

export type { PollingTier, FlushPolicy } from "./presets";

export type { RpcConfig, BotConfig, RuntimeEnv, LogLevel } from "./schema";
