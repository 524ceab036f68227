import assert from "node:assert/strict";
import { beforeEach, describe, test } from "node:test";
import { createFlushPolicy } from "../../../src/config";
import { TransientTransportError } from "../../../src/errors/app.errors";
import { HealthFlushLoop, HealthReporter } from "../../../src/monitoring";
import type { HealthEvidencePatch } from "../../../src/services/interfaces";
import { InMemoryGateway } from "../../helpers/in-memory-gateway";
import { ManualClock } from "../../helpers/manual-clock";

const T0 = Date.parse("2026-01-01T00:00:00.000Z");

const NO_COUNTS = {
  rate_limit_hits_15m: 0,
  candle_gap_count_15m: 0,
  stream_disconnects_15m: 0,
  indicator_error_count_15m: 0,
  decision_count_15m: 0,
  order_rejects_15m: 0,
  db_error_count_15m: 0,
};

/** Gateway whose health upsert stays in flight until released */
class GatedHealthGateway {
  readonly patches: HealthEvidencePatch[] = [];
  private release: (() => void) | null = null;

  async upsertHealthEvidence(_botId: string, patch: HealthEvidencePatch): Promise<void> {
    this.patches.push(patch);
    await new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  finish(): void {
    this.release?.();
    this.release = null;
  }
}

describe("HealthReporter", () => {
  let time: ManualClock;
  let gateway: InMemoryGateway;
  let reporter: HealthReporter;

  beforeEach(() => {
    time = new ManualClock(T0);
    gateway = new InMemoryGateway();
    reporter = new HealthReporter({
      botId: "bot-1",
      gateway,
      policy: createFlushPolicy({ tier: "standard" }),
      clock: time.clock,
    });
  });

  describe("maybeFlush", () => {
    test("flushes on the tier interval only", async () => {
      assert.equal(await reporter.maybeFlush(), true);
      assert.equal(await reporter.maybeFlush(), false);

      time.advance(179_999);
      assert.equal(await reporter.maybeFlush(), false);
      time.advance(1);
      assert.equal(await reporter.maybeFlush(), true);
      assert.equal(gateway.healthPatches.length, 2);
    });

    test("uses the in-position interval after setInPosition", async () => {
      reporter.setInPosition(true);
      assert.equal(await reporter.maybeFlush(), true);
      time.advance(149_999);
      assert.equal(await reporter.maybeFlush(), false);
      time.advance(1);
      assert.equal(await reporter.maybeFlush(), true);
    });

    test("sends pending fields, windowed counts and identity fields", async () => {
      reporter.record("order_reject");
      reporter.record("order_reject");
      reporter.updateFields({ db_ok: true, ignored: null });

      await reporter.maybeFlush();

      assert.deepEqual(gateway.healthPatches[0], {
        botId: "bot-1",
        patch: {
          db_ok: true,
          ...NO_COUNTS,
          order_rejects_15m: 2,
          tier: "standard",
          in_position: false,
        },
      });
      assert.deepEqual(reporter.getPendingFields(), {});
      assert.equal(reporter.getLastFlushAt(), T0);
    });

    test("always sends every count column and keeps other facts window-only", async () => {
      reporter.recordRateLimitHit();
      reporter.recordDecision();
      reporter.recordDecision();
      reporter.record("position_mismatch");

      assert.deepEqual(reporter.buildPatch(), {
        ...NO_COUNTS,
        rate_limit_hits_15m: 1,
        decision_count_15m: 2,
        tier: "standard",
        in_position: false,
      });
      assert.equal(reporter.countWindow("position_mismatch"), 1);
    });

    test("counts older than the window drop back to zero", async () => {
      reporter.recordRateLimitHit();
      time.advance(15 * 60_000 + 1);
      assert.equal(reporter.buildPatch().rate_limit_hits_15m, 0);
    });
  });

  describe("flushNow", () => {
    test("defers a flush requested inside the debounce", async () => {
      assert.equal(await reporter.flushNow("order_submit"), true);

      time.advance(1000);
      assert.equal(await reporter.flushNow("order_ack"), false);
      assert.deepEqual(reporter.getScheduledFlush(), { dueAt: T0 + 3000, reason: "order_ack" });

      assert.equal(await reporter.maybeFlush(), false);
      time.advance(2000);
      assert.equal(await reporter.maybeFlush(), true);
      assert.equal(reporter.getScheduledFlush(), null);
      assert.equal(gateway.healthPatches.length, 2);
    });

    test("schedules at least the critical delay ahead", async () => {
      await reporter.flushNow("first");
      time.advance(2500);
      await reporter.flushNow("second");
      // max(T0 + 3000, T0 + 2500 + 1000)
      assert.equal(reporter.getScheduledFlush()?.dueAt, T0 + 3500);
    });

    test("urgent bypasses the debounce", async () => {
      await reporter.flushNow("first");
      time.advance(500);
      assert.equal(await reporter.flushNow("shutdown", { urgent: true }), true);
      assert.equal(gateway.healthPatches.length, 2);
    });

    test("never flushes more often than the debounce allows", async () => {
      for (let i = 0; i < 600; i++) {
        await reporter.flushNow("burst");
        time.advance(100);
      }
      // flushes at 0s, 3s, ... 57s
      assert.equal(gateway.healthPatches.length, 20);
    });
  });

  describe("failures", () => {
    test("keeps the pending patch and retries after the debounce", async () => {
      gateway.failNext("upsertHealthEvidence", new TransientTransportError("backend down"));
      reporter.updateFields({ db_ok: false });

      assert.equal(await reporter.flushNow("db_error"), false);
      assert.deepEqual(reporter.getPendingFields(), { db_ok: false });
      assert.equal(reporter.getLastFlushAt(), null);
      assert.equal(reporter.countWindow("health_flush_failed"), 1);

      assert.equal(await reporter.flushNow("db_error"), false);
      assert.equal(await reporter.maybeFlush(), false);

      time.advance(3000);
      assert.equal(await reporter.maybeFlush(), true);
      assert.deepEqual(gateway.healthPatches[0].patch, {
        db_ok: false,
        ...NO_COUNTS,
        tier: "standard",
        in_position: false,
      });
    });
  });

  describe("in-flight flush", () => {
    test("calls during a flush return false and later fields stay pending", async () => {
      const gated = new GatedHealthGateway();
      const gatedReporter = new HealthReporter({
        botId: "bot-1",
        gateway: gated,
        clock: time.clock,
      });
      gatedReporter.updateFields({ strategy_ok: true, db_ok: true });

      const first = gatedReporter.maybeFlush();
      assert.equal(gatedReporter.isFlushing(), true);
      assert.equal(await gatedReporter.maybeFlush(), false);
      assert.equal(await gatedReporter.flushNow("order_submit"), false);

      gatedReporter.updateFields({ strategy_ok: false });
      gated.finish();

      assert.equal(await first, true);
      assert.equal(gatedReporter.isFlushing(), false);
      assert.deepEqual(gatedReporter.getPendingFields(), { strategy_ok: false });
      assert.equal(gated.patches.length, 1);
    });

    test("an urgent flush waits for the one in flight and then sends", async () => {
      const gated = new GatedHealthGateway();
      const gatedReporter = new HealthReporter({
        botId: "bot-1",
        gateway: gated,
        clock: time.clock,
      });

      const first = gatedReporter.maybeFlush();
      gatedReporter.updateFields({ db_ok: false });
      const urgent = gatedReporter.flushNow("shutdown", { urgent: true });
      assert.equal(gated.patches.length, 1);

      gated.finish();
      assert.equal(await first, true);
      await new Promise<void>((resolve) => setImmediate(resolve));
      assert.equal(gated.patches.length, 2);
      assert.equal(gated.patches[1].db_ok, false);

      gated.finish();
      assert.equal(await urgent, true);
      assert.equal(gatedReporter.getScheduledFlush(), null);
    });
  });

  describe("semantic helpers", () => {
    test("escalates on the second stream disconnect", async () => {
      assert.equal(await reporter.recordStreamDisconnect(), false);
      assert.equal(gateway.healthPatches.length, 0);

      assert.equal(await reporter.recordStreamDisconnect(), true);
      assert.equal(gateway.healthPatches[0].patch.stream_disconnects_15m, 2);
      assert.equal(gateway.healthPatches[0].patch.market_data_ok, false);
    });

    test("a candle gap escalates only while in position", async () => {
      assert.equal(await reporter.recordCandleGap(), false);
      reporter.setInPosition(true);
      assert.equal(await reporter.recordCandleGap(), true);
      assert.equal(gateway.healthPatches[0].patch.in_position, true);
      assert.equal(gateway.healthPatches[0].patch.candle_gap_count_15m, 2);
    });

    test("escalates on the third indicator error", async () => {
      assert.equal(await reporter.recordIndicatorError("indicator_error"), false);
      assert.equal(await reporter.recordIndicatorError(null), false);
      assert.equal(await reporter.recordIndicatorError(null), true);
      assert.equal(gateway.healthPatches[0].patch.last_indicator_error_code, "UNKNOWN_ERROR");
    });

    test("order reject normalises the reason and flushes", async () => {
      assert.equal(await reporter.recordOrderReject(" min_notional "), true);
      const patch = gateway.healthPatches[0].patch;
      assert.equal(patch.order_flow_ok, false);
      assert.equal(patch.last_order_reject_reason, "MIN_NOTIONAL");
      assert.equal(patch.last_order_reject_at, "2026-01-01T00:00:00.000Z");
      assert.equal(patch.order_rejects_15m, 1);
    });

    test("order ack clamps the latency", async () => {
      await reporter.recordOrderAck(-20);
      assert.equal(gateway.healthPatches[0].patch.order_ack_latency_ms, 0);
    });

    test("position sync flushes only on a difference", async () => {
      assert.equal(await reporter.recordPositionSync(0), false);
      assert.deepEqual(reporter.getPendingFields(), {
        position_ok: true,
        last_position_sync_at: "2026-01-01T00:00:00.000Z",
        position_sync_diff: 0,
      });
      assert.equal(await reporter.recordPositionSync(0.25), true);
      assert.equal(gateway.healthPatches[0].patch.position_ok, false);
      assert.equal(gateway.healthPatches[0].patch.position_sync_diff, 0.25);
    });

    test("noting a position sync never flushes", () => {
      assert.equal(reporter.notePositionSync(0.25), true);
      assert.equal(reporter.notePositionSync(Number.NaN), false);
      assert.equal(reporter.getPendingFields().position_sync_diff, 0);
      assert.equal(gateway.healthPatches.length, 0);
    });

    test("a trailing stop update is stamped and flushed", async () => {
      assert.equal(await reporter.recordTrailingUpdate(), true);
      assert.equal(
        gateway.healthPatches[0].patch.last_trailing_update_at,
        "2026-01-01T00:00:00.000Z",
      );
    });

    test("auth failure records the code and flushes", async () => {
      reporter.markAuthOk();
      assert.equal(await reporter.markAuthFail("invalid_api_key"), true);
      const patch = gateway.healthPatches[0].patch;
      assert.equal(patch.exchange_auth_ok, false);
      assert.equal(patch.last_auth_error_code, "INVALID_API_KEY");
      assert.equal(patch.last_auth_ok_at, "2026-01-01T00:00:00.000Z");
    });

    test("setTier falls back to standard for unknown tiers", () => {
      reporter.setTier("fast_5s");
      assert.equal(reporter.getPolicy().tier, "fast_5s");
      reporter.setTier("warp");
      assert.equal(reporter.getPolicy().tier, "standard");
    });
  });
});

describe("HealthFlushLoop", () => {
  test("drives maybeFlush and stops cleanly", async () => {
    const time = new ManualClock(T0);
    const gateway = new InMemoryGateway();
    const reporter = new HealthReporter({ botId: "bot-1", gateway, clock: time.clock });
    const loop = new HealthFlushLoop(reporter, { intervalMs: 60_000 });

    loop.start();
    assert.equal(loop.isRunning(), true);
    assert.equal(await loop.tick(), true);
    assert.equal(await loop.tick(), false);
    loop.stop();
    assert.equal(loop.isRunning(), false);
    assert.equal(gateway.healthPatches.length, 1);
  });
});
