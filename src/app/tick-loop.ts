/**
 * Tick Loop
 *
 * Cooperative runtime loop for one bot. Each tick:
 *   1. reconciles the canonical position when its cadence is due
 *      (always on the first tick),
 *   2. runs the optional per-tick handler (strategy, order flow),
 *   3. gives the health reporter a chance to flush.
 *
 * stop() takes effect between ticks; an in-flight tick always completes.
 */

import { AppError, ConflictError, ValidationError, toError } from "../errors/app.errors";
import type { Logger } from "../infra/logging";
import { createNullLogger } from "../infra/logging";
import { systemClock, type Clock } from "../models";
import type { HealthReporter } from "../monitoring";
import type { PositionReconciler, ReconciliationOutcome } from "../core";
import { sleep as defaultSleep } from "../utils/retry";

export const DEFAULT_MAX_CONSECUTIVE_ERRORS = 5;
export const DEFAULT_ERROR_BACKOFF_MS = 10_000;

export type TickStage = "reconcile" | "tick" | "flush";

export interface TickResult {
  tick: number;
  durationMs: number;
  reconciliation: ReconciliationOutcome | null;
  flushed: boolean;
}

export interface TickLoopExit {
  reason: "stopped" | "fatal_error" | "too_many_errors";
  ticks: number;
  error?: Error;
}

export interface TickLoopOptions {
  botId: string;
  reconciler: PositionReconciler;
  reporter: HealthReporter;
  pollIntervalMs: number;
  reconcileIntervalMs: number;
  onTick?: (tick: number) => Promise<void>;
  maxConsecutiveErrors?: number;
  errorBackoffMs?: number;
  logger?: Logger;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/** Tags errors with the stage of the tick that raised them */
class TickStageError extends AppError {
  constructor(
    readonly stage: TickStage,
    readonly original: Error,
  ) {
    super(original.message, "TICK_STAGE", original);
  }
}

function isFatal(error: Error): boolean {
  return error instanceof ConflictError || error instanceof ValidationError;
}

export class TickLoop {
  private running = false;
  private tickCount = 0;
  private consecutiveErrors = 0;
  private nextReconcileAt: number | null = null;
  private wake: (() => void) | null = null;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxConsecutiveErrors: number;
  private readonly errorBackoffMs: number;

  constructor(private readonly options: TickLoopOptions) {
    this.logger = options.logger ?? createNullLogger();
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxConsecutiveErrors = options.maxConsecutiveErrors ?? DEFAULT_MAX_CONSECUTIVE_ERRORS;
    this.errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
  }

  /**
   * Run a single tick. Errors are tagged with their stage and rethrown.
   */
  async runOnce(): Promise<TickResult> {
    const tick = ++this.tickCount;
    const startedAt = this.clock();

    let reconciliation: ReconciliationOutcome | null = null;
    if (this.nextReconcileAt === null || startedAt >= this.nextReconcileAt) {
      this.nextReconcileAt = startedAt + this.options.reconcileIntervalMs;
      reconciliation = await this.stage("reconcile", () =>
        this.options.reconciler.reconcile(this.options.botId),
      );
    }

    const onTick = this.options.onTick;
    if (onTick) {
      await this.stage("tick", () => onTick(tick));
    }

    const flushed = await this.stage("flush", () => this.options.reporter.maybeFlush());
    const durationMs = this.clock() - startedAt;

    this.logger.info("BotLoop", {
      category: "RUNTIME",
      eventType: "BotLoop",
      botId: this.options.botId,
      tick,
      loopMs: durationMs,
      reconcile: reconciliation?.kind ?? null,
      flushed,
      inPosition: this.options.reporter.getPolicy().inPosition,
    });

    return { tick, durationMs, reconciliation, flushed };
  }

  /**
   * Loop until stop() is called, a fatal error occurs, or too many
   * consecutive ticks fail.
   */
  async run(): Promise<TickLoopExit> {
    this.running = true;
    let exit: TickLoopExit = { reason: "stopped", ticks: 0 };
    this.logger.info("tick loop started", {
      category: "RUNTIME",
      botId: this.options.botId,
      pollIntervalMs: this.options.pollIntervalMs,
      reconcileIntervalMs: this.options.reconcileIntervalMs,
    });

    while (this.running) {
      try {
        await this.runOnce();
        this.consecutiveErrors = 0;
      } catch (err) {
        this.consecutiveErrors++;
        const stage = err instanceof TickStageError ? err.stage : "tick";
        const error = err instanceof TickStageError ? err.original : toError(err);
        const exhausted = this.consecutiveErrors >= this.maxConsecutiveErrors;
        const fatal = isFatal(error) || exhausted;

        this.logger.error("BotError", {
          category: "RUNTIME",
          eventType: "BotError",
          botId: this.options.botId,
          errorClass: error.name,
          errorCode: error instanceof AppError ? error.code ?? null : null,
          errorStage: stage,
          retryAttempt: this.consecutiveErrors,
          backoffMs: fatal ? 0 : this.errorBackoffMs,
          isFatal: fatal,
          errorMessage: error.message,
        });

        if (fatal) {
          this.running = false;
          exit = {
            reason: isFatal(error) ? "fatal_error" : "too_many_errors",
            ticks: 0,
            error,
          };
          break;
        }
        await this.pause(this.errorBackoffMs);
        continue;
      }

      if (this.running) {
        await this.pause(this.options.pollIntervalMs);
      }
    }

    this.logger.info("tick loop stopped", {
      category: "RUNTIME",
      botId: this.options.botId,
      ticks: this.tickCount,
      reason: exit.reason,
    });
    return { ...exit, ticks: this.tickCount };
  }

  stop(): void {
    this.running = false;
    this.wake?.();
  }

  isRunning(): boolean {
    return this.running;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  getConsecutiveErrors(): number {
    return this.consecutiveErrors;
  }

  /** Sleep between ticks; stop() cuts it short */
  private async pause(ms: number): Promise<void> {
    const woken = new Promise<void>((resolve) => {
      this.wake = resolve;
    });
    try {
      await Promise.race([this.sleep(ms), woken]);
    } finally {
      this.wake = null;
    }
  }

  private async stage<T>(stage: TickStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new TickStageError(stage, toError(err));
    }
  }
}
