/**
 * Configuration Schema
 *
 * Type definitions for the runtime configuration.
 */

import type { LogLevel } from "../infra/logging";
import type { PollingTier } from "./presets";

export type { LogLevel };

/**
 * Connection settings for the system-of-record RPC endpoint
 */
export interface RpcConfig {
  /** Base URL, e.g. https://project.supabase.co */
  rpcBaseUrl: string;

  /** Service role key sent as apikey and bearer token */
  serviceRoleKey: string;

  /** Ownership credential passed through on every call, never inspected */
  runtimeToken: string;

  /** Per-call timeout in milliseconds */
  rpcTimeoutMs: number;
}

/**
 * Identity of the single bot this process runs
 */
export interface BotConfig {
  botId: string;
  symbol: string;
  exchange: string;
  timeframe: string;
  tier: PollingTier;
}

export interface RuntimeEnv extends RpcConfig, BotConfig {
  /** Relative quantity tolerance for exchange/canonical comparison */
  quantityTolerance: number;
  logLevel: LogLevel;
  logFormat: "json" | "pretty";
}
