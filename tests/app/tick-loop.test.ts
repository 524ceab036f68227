import assert from "node:assert/strict";
import { beforeEach, describe, test } from "node:test";
import { TickLoop, type TickLoopOptions } from "../../src/app/tick-loop";
import { PositionReconciler } from "../../src/core";
import { ConflictError, TransientTransportError } from "../../src/errors/app.errors";
import type { LogContext, Logger } from "../../src/infra/logging";
import { HealthReporter } from "../../src/monitoring";
import { FakeExchange } from "../helpers/fake-exchange";
import { BOT_CONTEXT, openPosition } from "../helpers/fixtures";
import { InMemoryGateway } from "../helpers/in-memory-gateway";
import { ManualClock } from "../helpers/manual-clock";

interface Entry {
  level: string;
  message: string;
  context: LogContext;
}

class RecordingLogger implements Logger {
  readonly entries: Entry[] = [];
  info(message: string, context: LogContext = {}): void {
    this.entries.push({ level: "info", message, context });
  }
  warn(message: string, context: LogContext = {}): void {
    this.entries.push({ level: "warn", message, context });
  }
  error(message: string, context: LogContext = {}): void {
    this.entries.push({ level: "error", message, context });
  }
  debug(message: string, context: LogContext = {}): void {
    this.entries.push({ level: "debug", message, context });
  }
  named(message: string): Entry[] {
    return this.entries.filter((e) => e.message === message);
  }
}

describe("TickLoop", () => {
  let time: ManualClock;
  let gateway: InMemoryGateway;
  let exchange: FakeExchange;
  let reporter: HealthReporter;
  let reconciler: PositionReconciler;
  let logger: RecordingLogger;
  let waits: number[];

  const createLoop = (overrides: Partial<TickLoopOptions> = {}): TickLoop =>
    new TickLoop({
      botId: "bot-1",
      reconciler,
      reporter,
      pollIntervalMs: 60_000,
      reconcileIntervalMs: 300_000,
      errorBackoffMs: 100,
      logger,
      clock: time.clock,
      sleep: async (ms) => {
        waits.push(ms);
        time.advance(ms);
      },
      ...overrides,
    });

  beforeEach(() => {
    time = new ManualClock();
    gateway = new InMemoryGateway();
    exchange = new FakeExchange();
    reporter = new HealthReporter({ botId: "bot-1", gateway, clock: time.clock });
    reconciler = new PositionReconciler({
      context: BOT_CONTEXT,
      gateway,
      exchange,
      reporter,
      clock: time.clock,
    });
    logger = new RecordingLogger();
    waits = [];
  });

  describe("runOnce", () => {
    test("reconciles on the first tick and then on its own cadence", async () => {
      const loop = createLoop();

      const first = await loop.runOnce();
      assert.equal(first.tick, 1);
      assert.equal(first.reconciliation?.kind, "flat");
      assert.equal(first.flushed, true);

      time.advance(60_000);
      const second = await loop.runOnce();
      assert.equal(second.reconciliation, null);
      assert.equal(second.flushed, false);

      time.advance(240_000);
      const third = await loop.runOnce();
      assert.equal(third.reconciliation?.kind, "flat");
      assert.equal(exchange.calls.length, 2);
    });

    test("logs a BotLoop event per tick", async () => {
      await createLoop().runOnce();
      const [event] = logger.named("BotLoop");
      assert.deepEqual(event.context, {
        category: "RUNTIME",
        eventType: "BotLoop",
        botId: "bot-1",
        tick: 1,
        loopMs: 0,
        reconcile: "flat",
        flushed: true,
        inPosition: false,
      });
    });

    test("runs the tick handler between reconcile and flush", async () => {
      const seen: number[] = [];
      const loop = createLoop({
        onTick: async (tick) => {
          seen.push(tick);
          assert.deepEqual(gateway.calls, ["getCanonicalPosition", "getCanonicalPosition"]);
        },
      });
      await loop.runOnce();
      assert.deepEqual(seen, [1]);
      assert.deepEqual(gateway.calls, [
        "getCanonicalPosition",
        "getCanonicalPosition",
        "upsertHealthEvidence",
      ]);
    });
  });

  describe("run", () => {
    test("sleeps the poll interval between ticks until stopped", async () => {
      const loop: TickLoop = createLoop({
        onTick: async (tick) => {
          if (tick === 3) loop.stop();
        },
      });

      const exit = await loop.run();

      assert.deepEqual(exit, { reason: "stopped", ticks: 3 });
      assert.deepEqual(waits, [60_000, 60_000]);
      assert.equal(loop.isRunning(), false);
    });

    test("backs off after a failed tick and recovers", async () => {
      const loop: TickLoop = createLoop({
        onTick: async (tick) => {
          if (tick === 1) throw new TransientTransportError("exchange timeout");
          loop.stop();
        },
      });

      const exit = await loop.run();

      assert.deepEqual(exit, { reason: "stopped", ticks: 2 });
      assert.deepEqual(waits, [100]);
      assert.equal(loop.getConsecutiveErrors(), 0);
      const [event] = logger.named("BotError");
      assert.deepEqual(event.context, {
        category: "RUNTIME",
        eventType: "BotError",
        botId: "bot-1",
        errorClass: "TransientTransportError",
        errorCode: "TRANSIENT_TRANSPORT",
        errorStage: "tick",
        retryAttempt: 1,
        backoffMs: 100,
        isFatal: false,
        errorMessage: "exchange timeout",
      });
    });

    test("a conflict ends the loop at once", async () => {
      gateway.seedPosition({
        botId: "bot-1",
        positionId: "pos-1",
        status: "open",
        symbol: "BTC/USDT",
        side: "long",
        quantity: 0.5,
        entryPrice: 40_000,
        entryClientOrderId: "c-entry",
        entryExchangeOrderId: "x-entry",
      });
      exchange.hold("BTC/USDT", "long", 0.5);
      gateway.failNext("upsertPosition", new ConflictError("runtime token not owner"));

      const exit = await createLoop().run();

      assert.equal(exit.reason, "fatal_error");
      assert.equal(exit.ticks, 1);
      assert.ok(exit.error instanceof ConflictError);
      assert.deepEqual(waits, []);
      const [event] = logger.named("BotError");
      assert.equal(event.context.errorStage, "reconcile");
      assert.equal(event.context.isFatal, true);
    });

    test("a canonical row without a side keeps the loop running", async () => {
      gateway.seedPosition({ ...openPosition(), side: null });
      const loop: TickLoop = createLoop({
        onTick: async () => loop.stop(),
      });

      const exit = await loop.run();

      assert.deepEqual(exit, { reason: "stopped", ticks: 1 });
      assert.deepEqual(logger.named("BotError"), []);
      assert.equal(logger.named("BotLoop")[0].context.reconcile, "mismatch");
    });

    test("gives up after too many consecutive failures", async () => {
      const loop = createLoop({
        maxConsecutiveErrors: 3,
        onTick: async () => {
          throw new Error("indicator blew up");
        },
      });

      const exit = await loop.run();

      assert.equal(exit.reason, "too_many_errors");
      assert.equal(exit.ticks, 3);
      assert.equal(exit.error?.message, "indicator blew up");
      assert.deepEqual(waits, [100, 100]);
    });

    test("stop() interrupts the pause between ticks", async () => {
      let paused: () => void = () => {};
      const pausedOnce = new Promise<void>((resolve) => {
        paused = resolve;
      });
      const loop = createLoop({
        sleep: () => {
          paused();
          return new Promise<void>(() => {});
        },
      });

      const done = loop.run();
      await pausedOnce;
      loop.stop();

      assert.deepEqual(await done, { reason: "stopped", ticks: 1 });
    });
  });
});
