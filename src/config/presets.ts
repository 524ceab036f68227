/**
 * Polling tier presets for health evidence flush cadence.
 *
 * Intervals are in seconds. A bot holding a position flushes more often so
 * operators see divergence sooner.
 */

export const POLLING_TIERS = ["fast_5s", "ultra_15s", "fast_30s", "standard"] as const;

export type PollingTier = (typeof POLLING_TIERS)[number];

export const DEFAULT_TIER: PollingTier = "standard";

export const FLUSH_INTERVALS_OUT_OF_POSITION: Record<PollingTier, number> = {
  fast_5s: 60,
  ultra_15s: 90,
  fast_30s: 120,
  standard: 180,
};

export const FLUSH_INTERVALS_IN_POSITION: Record<PollingTier, number> = {
  fast_5s: 20,
  ultra_15s: 45,
  fast_30s: 75,
  standard: 150,
};

export const ROLLING_WINDOW_SECONDS = 15 * 60;
export const DEBOUNCE_SECONDS = 3;
export const CRITICAL_DELAY_SECONDS = 1;

function isPollingTier(value: string): value is PollingTier {
  return POLLING_TIERS.some((tier) => tier === value);
}

/**
 * Map a raw tier name to a known tier, falling back to "standard"
 */
export function normalizeTier(tier: string | null | undefined): PollingTier {
  if (!tier) return DEFAULT_TIER;
  const normalized = tier.trim().toLowerCase();
  return isPollingTier(normalized) ? normalized : DEFAULT_TIER;
}

/**
 * Flush interval in seconds for a tier and position state
 */
export function getFlushIntervalSeconds(
  tier: string | null | undefined,
  inPosition: boolean,
): number {
  const table = inPosition
    ? FLUSH_INTERVALS_IN_POSITION
    : FLUSH_INTERVALS_OUT_OF_POSITION;
  return table[normalizeTier(tier)];
}

/**
 * Explicit flush-timing configuration handed to the health reporter.
 * All durations are milliseconds.
 */
export interface FlushPolicy {
  tier: PollingTier;
  inPosition: boolean;
  windowMs: number;
  debounceMs: number;
  criticalDelayMs: number;
  /** Overrides the tier table when set (tests, custom deployments) */
  intervalOverrideMs?: number;
}

export function createFlushPolicy(
  options: Partial<Omit<FlushPolicy, "tier">> & { tier?: string | null } = {},
): FlushPolicy {
  return {
    tier: normalizeTier(options.tier),
    inPosition: options.inPosition ?? false,
    windowMs: options.windowMs ?? ROLLING_WINDOW_SECONDS * 1000,
    debounceMs: options.debounceMs ?? DEBOUNCE_SECONDS * 1000,
    criticalDelayMs: options.criticalDelayMs ?? CRITICAL_DELAY_SECONDS * 1000,
    intervalOverrideMs: options.intervalOverrideMs,
  };
}

/**
 * Effective tier interval for a policy in milliseconds
 */
export function resolveFlushIntervalMs(policy: FlushPolicy): number {
  return (
    policy.intervalOverrideMs ??
    getFlushIntervalSeconds(policy.tier, policy.inPosition) * 1000
  );
}

/**
 * Reconciliation cadence for a candle timeframe: twice the timeframe capped
 * at ten minutes, or five minutes for sub-five-minute timeframes.
 */
export function getReconcileIntervalMs(timeframe: string | null | undefined): number {
  const seconds = timeframeToSeconds(timeframe);
  if (seconds >= 300) {
    return Math.min(seconds * 2, 600) * 1000;
  }
  return 300 * 1000;
}

const TIMEFRAME_UNITS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
};

/**
 * Parse "15m", "1h", "4h", "1d" into seconds. Unknown formats yield 0.
 */
export function timeframeToSeconds(timeframe: string | null | undefined): number {
  if (!timeframe) return 0;
  const match = /^(\d+)([smhdw])$/.exec(timeframe.trim().toLowerCase());
  if (!match) return 0;
  return Number(match[1]) * TIMEFRAME_UNITS[match[2]];
}

/** Tick poll interval per tier, in seconds */
export const POLL_INTERVALS: Record<PollingTier, number> = {
  fast_5s: 5,
  ultra_15s: 15,
  fast_30s: 30,
  standard: 60,
};

export function getPollIntervalMs(tier: string | null | undefined): number {
  return POLL_INTERVALS[normalizeTier(tier)] * 1000;
}
