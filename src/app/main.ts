import dotenv from "dotenv";
import { loadRuntimeEnv, createFlushPolicy, getPollIntervalMs, getReconcileIntervalMs } from "../config";
import type { RuntimeEnv } from "../config";
import {
  PositionReconciler,
  TradeJournal,
  exactExitOrderConfirmation,
  type CloseConfirmationStrategy,
} from "../core";
import { toErrorMessage } from "../errors/app.errors";
import type { Logger } from "../infra/logging";
import type { BotContext } from "../models";
import { HealthFlushLoop, HealthReporter } from "../monitoring";
import type { ExchangeSnapshotProvider, RemoteStateGateway } from "../services/interfaces";
import { RuntimeRpcGateway } from "../services/runtime-rpc";
import { StructuredLogger, generateRunId } from "../utils/structured-logger";
import { TickLoop, type TickLoopExit } from "./tick-loop";

export interface StartRuntimeOptions {
  /** Live venue view; the exchange wire protocol lives with the host */
  exchange: ExchangeSnapshotProvider;
  env?: RuntimeEnv;
  gateway?: RemoteStateGateway;
  confirmation?: CloseConfirmationStrategy;
  logger?: Logger;
  /** Strategy/order-flow work run inside every tick */
  onTick?: (tick: number, runtime: RuntimeHandle) => Promise<void>;
  installSignalHandlers?: boolean;
}

export interface RuntimeHandle {
  env: RuntimeEnv;
  context: BotContext;
  gateway: RemoteStateGateway;
  reporter: HealthReporter;
  journal: TradeJournal;
  reconciler: PositionReconciler;
  loop: TickLoop;
  /** Resolves after the loop exits and the final health flush */
  done: Promise<TickLoopExit>;
  /** Stop the loop and wait for `done` */
  shutdown(signal?: string): Promise<void>;
}

/**
 * Wire the runtime for the bot configured in the environment and start
 * the tick loop. The first reconciliation runs on the first tick.
 */
export function startRuntime(options: StartRuntimeOptions): RuntimeHandle {
  if (!options.env) dotenv.config();
  const env = options.env ?? loadRuntimeEnv();
  const structured = new StructuredLogger({
    format: env.logFormat,
    level: env.logLevel,
    baseContext: { runId: generateRunId(), botId: env.botId },
  });
  const logger = options.logger ?? structured;

  const context: BotContext = {
    botId: env.botId,
    symbol: env.symbol,
    exchange: env.exchange,
  };

  logger.info("runtime starting", {
    category: "STARTUP",
    symbol: env.symbol,
    exchange: env.exchange,
    timeframe: env.timeframe,
    tier: env.tier,
  });

  const gateway =
    options.gateway ??
    new RuntimeRpcGateway({
      rpcBaseUrl: env.rpcBaseUrl,
      serviceRoleKey: env.serviceRoleKey,
      runtimeToken: env.runtimeToken,
      rpcTimeoutMs: env.rpcTimeoutMs,
      logger,
    });

  const reporter = new HealthReporter({
    botId: env.botId,
    gateway,
    policy: createFlushPolicy({ tier: env.tier }),
    logger,
  });

  const journal = new TradeJournal({ context, gateway, reporter, logger });

  const reconciler = new PositionReconciler({
    context,
    gateway,
    exchange: options.exchange,
    confirmation: options.confirmation ?? exactExitOrderConfirmation(),
    reporter,
    logger,
    quantityTolerance: env.quantityTolerance,
  });

  const flushLoop = new HealthFlushLoop(reporter, { logger });

  let handle: RuntimeHandle;
  const onTick = options.onTick;
  const loop = new TickLoop({
    botId: env.botId,
    reconciler,
    reporter,
    pollIntervalMs: getPollIntervalMs(env.tier),
    reconcileIntervalMs: getReconcileIntervalMs(env.timeframe),
    onTick: onTick ? (tick) => onTick(tick, handle) : undefined,
    logger,
  });

  let stopSignal: string | null = null;

  flushLoop.start();
  // The final flush runs once the in-flight tick, and its flush, are done
  const done = loop.run().then(async (exit) => {
    if (exit.error) {
      logger.error("runtime loop exited", {
        category: "RUNTIME",
        reason: exit.reason,
        error: exit.error.message,
      });
    }
    logger.info("runtime stopping", { category: "RUNTIME", signal: stopSignal ?? exit.reason });
    flushLoop.stop();
    await reporter.flushNow("shutdown", { urgent: true });
    structured.shutdown();
    return exit;
  });

  /** Must not be awaited from inside a tick: it waits for the loop to exit */
  const shutdown = async (signal = "shutdown"): Promise<void> => {
    if (stopSignal === null) stopSignal = signal;
    loop.stop();
    await done;
  };

  handle = { env, context, gateway, reporter, journal, reconciler, loop, done, shutdown };

  if (options.installSignalHandlers) {
    installShutdownHandlers(handle, logger);
  }

  return handle;
}

/**
 * Stop the loop on SIGINT/SIGTERM, let the in-flight tick finish and exit
 */
export function installShutdownHandlers(handle: RuntimeHandle, logger: Logger): void {
  const onSignal = (signal: string): void => {
    handle
      .shutdown(signal)
      .then(() => handle.done)
      .then((exit) => process.exit(exit.reason === "stopped" ? 0 : 1))
      .catch((err: unknown) => {
        logger.error("shutdown failed", { category: "RUNTIME", error: toErrorMessage(err) });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  process.on("unhandledRejection", (reason) => {
    logger.error("unhandled promise rejection", {
      category: "RUNTIME",
      error: toErrorMessage(reason),
    });
  });
}
