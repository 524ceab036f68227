import { ConfigurationError } from "../errors/app.errors";
import type { LogLevel } from "../infra/logging";
import { normalizeTier } from "./presets";
import type { RuntimeEnv } from "./schema";

export const DEFAULT_RPC_TIMEOUT_MS = 15_000;
export const DEFAULT_QUANTITY_TOLERANCE = 0.000001;
export const DEFAULT_EXCHANGE = "binance";
export const DEFAULT_TIMEFRAME = "15m";

type EnvSource = Record<string, string | undefined>;

export function loadRuntimeEnv(source: EnvSource = process.env): RuntimeEnv {
  const read = (key: string): string | undefined => {
    const value = source[key] ?? source[key.toLowerCase()];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };

  const required = (name: string): string => {
    const v = read(name);
    if (!v) throw new ConfigurationError(`Missing required env var: ${name}`);
    return v;
  };

  const parseNumber = (key: string, fallback: number): number => {
    const raw = read(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < 0) return fallback;
    return parsed;
  };

  const parseLevel = (raw: string | undefined): LogLevel => {
    const normalized = (raw ?? "info").toLowerCase();
    return normalized === "error" ||
      normalized === "warn" ||
      normalized === "debug"
      ? normalized
      : "info";
  };

  return {
    rpcBaseUrl: required("SUPABASE_URL").replace(/\/+$/, ""),
    serviceRoleKey: required("SUPABASE_SERVICE_ROLE_KEY"),
    runtimeToken: required("RUNTIME_TOKEN"),
    rpcTimeoutMs: parseNumber("RPC_TIMEOUT_MS", DEFAULT_RPC_TIMEOUT_MS),
    botId: required("BOT_ID"),
    symbol: required("BOT_SYMBOL"),
    exchange: read("BOT_EXCHANGE") ?? DEFAULT_EXCHANGE,
    timeframe: read("BOT_TIMEFRAME") ?? DEFAULT_TIMEFRAME,
    tier: normalizeTier(read("POLLING_TIER")),
    quantityTolerance: parseNumber("QTY_TOLERANCE", DEFAULT_QUANTITY_TOLERANCE),
    logLevel: parseLevel(read("LOG_LEVEL")),
    logFormat: read("LOG_FORMAT")?.toLowerCase() === "pretty" ? "pretty" : "json",
  };
}
