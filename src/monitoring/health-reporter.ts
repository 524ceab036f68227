/**
 * HealthReporter - aggregates health facts and pushes evidence patches
 *
 * One instance per runtime process, constructed at startup and handed to the
 * components that observe health facts. The reporter owns a HealthWindow and
 * a pending patch of "last known" fields, and decides when to flush:
 *
 * - maybeFlush(): tier cadence. Flushes once max(tier interval, debounce)
 *   has elapsed since the last successful flush, or when a deferred flush
 *   is due.
 * - flushNow(reason): critical facts. Skips the tier interval but honours
 *   the debounce; when called too soon the flush is deferred to
 *   max(lastFlush + debounce, now + criticalDelay) and picked up by the next
 *   maybeFlush(). `urgent` skips the debounce as well and waits for an
 *   in-flight flush rather than deferring.
 *
 * Flush failures are counted as `health_flush_failed`, the pending patch is
 * kept for the next attempt, and nothing is thrown to the caller.
 */

import {
  createFlushPolicy,
  normalizeTier,
  resolveFlushIntervalMs,
  type FlushPolicy,
} from "../config/presets";
import { toErrorMessage } from "../errors/app.errors";
import type { Logger } from "../infra/logging";
import { createNullLogger } from "../infra/logging";
import { systemClock, type Clock } from "../models/common";
import type { HealthEvidencePatch, RemoteStateGateway } from "../services/interfaces";
import { HealthWindow, type HealthSampleValue } from "./health-window";
import { normalizeReasonCode } from "./reason-codes";

/** Facts recorded into the window by the core components */
export const HEALTH_FACTS = {
  positionSyncOk: "position_sync_ok",
  positionMissing: "position_missing",
  positionMismatch: "position_mismatch",
  positionClosed: "position_closed",
  positionOrphan: "position_orphan",
  dbReadFailed: "db_read_failed",
  dbWriteFailed: "db_write_failed",
  exchangeReadFailed: "exchange_read_failed",
  healthFlushFailed: "health_flush_failed",
  rateLimitHit: "rate_limit_hit",
  streamDisconnect: "stream_disconnect",
  candleGap: "candle_gap",
  indicatorError: "indicator_error",
  decision: "decision",
  orderReject: "order_reject",
  dbError: "db_error",
} as const;

export type HealthFact = (typeof HEALTH_FACTS)[keyof typeof HEALTH_FACTS];

/**
 * Evidence columns carrying windowed counts. Every column is sent on each
 * flush, zero when nothing was recorded; other facts stay window-only.
 */
export const HEALTH_COUNT_COLUMNS: Readonly<Record<string, string>> = {
  [HEALTH_FACTS.rateLimitHit]: "rate_limit_hits_15m",
  [HEALTH_FACTS.candleGap]: "candle_gap_count_15m",
  [HEALTH_FACTS.streamDisconnect]: "stream_disconnects_15m",
  [HEALTH_FACTS.indicatorError]: "indicator_error_count_15m",
  [HEALTH_FACTS.decision]: "decision_count_15m",
  [HEALTH_FACTS.orderReject]: "order_rejects_15m",
  [HEALTH_FACTS.dbError]: "db_error_count_15m",
};

type FieldValue = HealthEvidencePatch[string];

export interface HealthReporterOptions {
  botId: string;
  gateway: Pick<RemoteStateGateway, "upsertHealthEvidence">;
  policy?: FlushPolicy;
  clock?: Clock;
  logger?: Logger;
}

export interface FlushOptions {
  /** Skip the debounce as well as the tier interval */
  urgent?: boolean;
}

export interface ScheduledFlush {
  dueAt: number;
  reason: string;
}

export class HealthReporter {
  readonly botId: string;
  private readonly gateway: Pick<RemoteStateGateway, "upsertHealthEvidence">;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly window: HealthWindow;

  private policy: FlushPolicy;
  private pending: HealthEvidencePatch = {};
  private lastFlushAt: number | null = null;
  private lastAttemptAt: number | null = null;
  private scheduled: ScheduledFlush | null = null;
  private flushing = false;
  private inFlight: Promise<boolean> | null = null;

  constructor(options: HealthReporterOptions) {
    this.botId = options.botId;
    this.gateway = options.gateway;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createNullLogger();
    this.policy = options.policy ?? createFlushPolicy();
    this.window = new HealthWindow(this.policy.windowMs, this.clock);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Recording
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Record a windowed fact. Never blocks and never performs I/O.
   */
  record(fact: string, value: HealthSampleValue = 1): void {
    this.window.record(fact, value);
  }

  /**
   * Merge "last known" fields into the pending patch. Null and undefined
   * values are dropped.
   */
  updateFields(fields: Record<string, FieldValue | undefined>): void {
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined && value !== null) {
        this.pending[key] = value;
      }
    }
  }

  setTier(tier: string | null | undefined): void {
    this.policy = { ...this.policy, tier: normalizeTier(tier) };
  }

  setInPosition(inPosition: boolean): void {
    this.policy = { ...this.policy, inPosition };
  }

  markAuthOk(): void {
    this.updateFields({ exchange_auth_ok: true, last_auth_ok_at: this.nowIso() });
  }

  async markAuthFail(code?: string | null): Promise<boolean> {
    this.updateFields({
      exchange_auth_ok: false,
      last_auth_fail_at: this.nowIso(),
      last_auth_error_code: normalizeReasonCode(code),
    });
    return this.flushNow("auth_fail");
  }

  recordRateLimitHit(): void {
    this.record(HEALTH_FACTS.rateLimitHit);
  }

  recordCandleLag(lagSeconds: number): void {
    this.updateFields({
      market_data_ok: true,
      candle_lag_seconds: Math.max(0, Math.trunc(lagSeconds)),
    });
  }

  async recordStreamDisconnect(): Promise<boolean> {
    this.record(HEALTH_FACTS.streamDisconnect);
    this.updateFields({ market_data_ok: false });
    if (this.countWindow(HEALTH_FACTS.streamDisconnect) >= 2) {
      return this.flushNow("stream_disconnect");
    }
    return false;
  }

  async recordCandleGap(): Promise<boolean> {
    this.record(HEALTH_FACTS.candleGap);
    this.updateFields({ market_data_ok: false });
    if (this.policy.inPosition) {
      return this.flushNow("candle_gap");
    }
    return false;
  }

  recordStrategyTick(ok: boolean): void {
    this.updateFields({ strategy_ok: ok, last_strategy_tick_at: this.nowIso() });
  }

  async recordIndicatorError(reasonCode?: string | null): Promise<boolean> {
    this.record(HEALTH_FACTS.indicatorError);
    this.updateFields({
      strategy_ok: false,
      last_strategy_tick_at: this.nowIso(),
      last_indicator_error_code: normalizeReasonCode(reasonCode),
    });
    if (this.countWindow(HEALTH_FACTS.indicatorError) >= 3) {
      return this.flushNow("indicator_error_spike");
    }
    return false;
  }

  recordDecision(): void {
    this.record(HEALTH_FACTS.decision);
  }

  async recordOrderSubmit(): Promise<boolean> {
    this.updateFields({ order_flow_ok: true, last_order_submit_at: this.nowIso() });
    return this.flushNow("order_submit");
  }

  async recordOrderAck(latencyMs: number): Promise<boolean> {
    this.updateFields({
      order_flow_ok: true,
      last_order_ack_at: this.nowIso(),
      order_ack_latency_ms: Math.max(0, Math.trunc(latencyMs)),
    });
    return this.flushNow("order_ack");
  }

  async recordOrderReject(reason?: string | null): Promise<boolean> {
    this.record(HEALTH_FACTS.orderReject);
    this.updateFields({
      order_flow_ok: false,
      last_order_reject_reason: normalizeReasonCode(reason),
      last_order_reject_at: this.nowIso(),
    });
    return this.flushNow("order_reject");
  }

  /**
   * Record the absolute quantity difference found by a position sync. A
   * non-zero difference escalates through flushNow().
   */
  async recordPositionSync(diff: number): Promise<boolean> {
    if (this.notePositionSync(diff)) {
      return this.flushNow("position_diff");
    }
    return false;
  }

  /**
   * Same fields as recordPositionSync() without the escalation, for callers
   * that flush once their own write has been attempted. Returns whether the
   * difference warrants an escalation.
   */
  notePositionSync(diff: number): boolean {
    const safeDiff = Number.isFinite(diff) ? Math.max(0, diff) : 0;
    this.updateFields({
      position_ok: safeDiff <= 0,
      last_position_sync_at: this.nowIso(),
      position_sync_diff: safeDiff,
    });
    return safeDiff > 0;
  }

  async recordTrailingUpdate(): Promise<boolean> {
    this.updateFields({ last_trailing_update_at: this.nowIso() });
    return this.flushNow("trailing_update");
  }

  recordDbOk(): void {
    this.updateFields({ db_ok: true, last_db_ok_at: this.nowIso() });
  }

  async recordDbError(fact: HealthFact = HEALTH_FACTS.dbError): Promise<boolean> {
    this.record(fact);
    this.updateFields({ db_ok: false });
    return this.flushNow("db_error");
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Flushing
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Flush on the tier cadence, or run a deferred flush that has come due.
   * Returns true when a patch was delivered.
   */
  async maybeFlush(): Promise<boolean> {
    if (this.flushing) return false;
    const now = this.clock();

    if (this.scheduled) {
      if (now < this.scheduled.dueAt || !this.debounceElapsed(now)) {
        return false;
      }
      const { reason } = this.scheduled;
      this.scheduled = null;
      return this.execute(reason, now);
    }

    const sinceFlush = this.lastFlushAt === null ? Infinity : now - this.lastFlushAt;
    const threshold = Math.max(resolveFlushIntervalMs(this.policy), this.policy.debounceMs);
    if (sinceFlush < threshold || !this.debounceElapsed(now)) {
      return false;
    }
    return this.execute("scheduled", now);
  }

  /**
   * Flush as soon as the debounce allows. When it does not, a deferred flush
   * is scheduled and false is returned. An urgent flush first waits for
   * any flush in flight.
   */
  async flushNow(reason: string, options: FlushOptions = {}): Promise<boolean> {
    // An urgent flush waits out the one in flight instead of deferring
    while (options.urgent && this.inFlight) {
      await this.inFlight;
    }
    const now = this.clock();
    if (!this.flushing && (options.urgent || this.debounceElapsed(now))) {
      this.scheduled = null;
      return this.execute(reason, now);
    }

    const base = this.lastAttemptAt ?? now;
    const dueAt = Math.max(base + this.policy.debounceMs, now + this.policy.criticalDelayMs);
    this.scheduled = {
      dueAt: this.scheduled ? Math.max(this.scheduled.dueAt, dueAt) : dueAt,
      reason,
    };
    this.logger.debug("health flush deferred", {
      category: "HEALTH",
      botId: this.botId,
      reason,
      dueAt: this.scheduled.dueAt,
    });
    return false;
  }

  /**
   * The patch the next flush would send
   */
  buildPatch(now: number = this.clock()): HealthEvidencePatch {
    const patch: HealthEvidencePatch = { ...this.pending };
    const counts = this.window.snapshot(now);
    for (const [fact, column] of Object.entries(HEALTH_COUNT_COLUMNS)) {
      patch[column] = counts[fact] ?? 0;
    }
    patch.tier = this.policy.tier;
    patch.in_position = this.policy.inPosition;
    return patch;
  }

  countWindow(fact: string): number {
    return this.window.countSince(fact, this.policy.windowMs);
  }

  getWindow(): HealthWindow {
    return this.window;
  }

  getPolicy(): FlushPolicy {
    return { ...this.policy };
  }

  getPendingFields(): HealthEvidencePatch {
    return { ...this.pending };
  }

  getLastFlushAt(): number | null {
    return this.lastFlushAt;
  }

  getScheduledFlush(): ScheduledFlush | null {
    return this.scheduled ? { ...this.scheduled } : null;
  }

  isFlushing(): boolean {
    return this.flushing;
  }

  private debounceElapsed(now: number): boolean {
    return this.lastAttemptAt === null || now - this.lastAttemptAt >= this.policy.debounceMs;
  }

  private execute(reason: string, now: number): Promise<boolean> {
    const flight: Promise<boolean> = this.send(reason, now).finally(() => {
      if (this.inFlight === flight) this.inFlight = null;
    });
    this.inFlight = flight;
    return flight;
  }

  private async send(reason: string, now: number): Promise<boolean> {
    this.flushing = true;
    this.lastAttemptAt = now;
    const sent = { ...this.pending };
    const patch = this.buildPatch(now);
    const startedAt = this.clock();

    try {
      await this.gateway.upsertHealthEvidence(this.botId, patch);

      // Fields updated while the call was in flight stay pending
      for (const [key, value] of Object.entries(sent)) {
        if (this.pending[key] === value) delete this.pending[key];
      }
      this.lastFlushAt = now;
      this.logger.info("health flush", {
        category: "HEALTH",
        botId: this.botId,
        tier: this.policy.tier,
        inPosition: this.policy.inPosition,
        reason,
        keys: Object.keys(patch).length,
        rpcMs: this.clock() - startedAt,
      });
      return true;
    } catch (err) {
      this.window.record(HEALTH_FACTS.healthFlushFailed);
      this.logger.warn("health flush failed", {
        category: "HEALTH",
        botId: this.botId,
        reason,
        error: toErrorMessage(err),
      });
      return false;
    } finally {
      this.flushing = false;
    }
  }

  private nowIso(): string {
    return new Date(this.clock()).toISOString();
  }
}

export interface HealthFlushLoopOptions {
  intervalMs?: number;
  logger?: Logger;
}

export const DEFAULT_FLUSH_LOOP_INTERVAL_MS = 5_000;

/**
 * Background timer that drives HealthReporter.maybeFlush() between ticks.
 * The timer is unref'd so it never keeps the process alive.
 */
export class HealthFlushLoop {
  private timer: NodeJS.Timeout | null = null;
  private readonly intervalMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly reporter: HealthReporter,
    options: HealthFlushLoopOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_FLUSH_LOOP_INTERVAL_MS;
    this.logger = options.logger ?? createNullLogger();
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.logger.warn("health flush loop error", {
          category: "HEALTH",
          error: toErrorMessage(err),
        });
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  async tick(): Promise<boolean> {
    return this.reporter.maybeFlush();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
