import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { ValidationError } from "../../../src/errors/app.errors";
import { HealthWindow } from "../../../src/monitoring";
import { ManualClock } from "../../helpers/manual-clock";

const MINUTE = 60_000;

describe("HealthWindow", () => {
  test("counts samples inside the requested duration", () => {
    const time = new ManualClock(1_000_000);
    const window = new HealthWindow(15 * MINUTE, time.clock);

    window.record("order_reject");
    time.advance(2 * MINUTE);
    window.record("order_reject");
    time.advance(2 * MINUTE);
    window.record("order_reject");

    assert.equal(window.countSince("order_reject", 15 * MINUTE), 3);
    assert.equal(window.countSince("order_reject", 3 * MINUTE), 2);
    assert.equal(window.countSince("order_reject", MINUTE), 1);
    assert.equal(window.countSince("unknown", MINUTE), 0);
  });

  test("evicts samples older than the window on read", () => {
    const time = new ManualClock(1_000_000);
    const window = new HealthWindow(15 * MINUTE, time.clock);

    window.record("db_error");
    time.advance(10 * MINUTE);
    window.record("db_error");
    assert.equal(window.size(), 2);

    time.advance(6 * MINUTE);
    assert.equal(window.countSince("db_error", 15 * MINUTE), 1);
    assert.equal(window.size(), 1);

    time.advance(10 * MINUTE);
    assert.deepEqual(window.snapshot(), { db_error: 0 });
    assert.equal(window.size(), 0);
  });

  test("a sample exactly at the window edge is kept", () => {
    const time = new ManualClock(5_000_000);
    const window = new HealthWindow(15 * MINUTE, time.clock);
    window.record("decision");
    time.advance(15 * MINUTE);
    assert.equal(window.countSince("decision", 15 * MINUTE), 1);
    time.advance(1);
    assert.equal(window.countSince("decision", 15 * MINUTE), 0);
  });

  test("rejects a query longer than the window", () => {
    const window = new HealthWindow(15 * MINUTE, () => 0);
    assert.throws(() => window.countSince("x", 16 * MINUTE), ValidationError);
    assert.throws(() => window.countSince("x", 0), ValidationError);
  });

  test("rateSince divides the count by seconds", () => {
    const time = new ManualClock(1_000_000);
    const window = new HealthWindow(15 * MINUTE, time.clock);
    for (let i = 0; i < 6; i++) window.record("rate_limit_hit");
    assert.equal(window.rateSince("rate_limit_hit", MINUTE), 0.1);
  });

  test("lastValue returns the newest retained value", () => {
    const time = new ManualClock(1_000_000);
    const window = new HealthWindow(15 * MINUTE, time.clock);
    window.record("candle_lag", 4);
    time.advance(1000);
    window.record("candle_lag", 9);
    // late sample lands in timestamp order
    window.record("candle_lag", 7, time.now - 500);

    assert.equal(window.lastValue("candle_lag"), 9);
    time.advance(16 * MINUTE);
    assert.equal(window.lastValue("candle_lag"), undefined);
  });

  test("memory stays bounded under a steady arrival rate", () => {
    const time = new ManualClock(0);
    const window = new HealthWindow(MINUTE, time.clock);
    for (let i = 0; i < 600; i++) {
      window.record("tick");
      time.advance(1000);
      window.countSince("tick", MINUTE);
    }
    assert.ok(window.size() <= 61);
  });

  test("rejects a non-positive duration", () => {
    assert.throws(() => new HealthWindow(0), ValidationError);
  });
});
