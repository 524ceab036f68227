/**
 * Trade Journal
 *
 * Turns order lifecycle events into idempotent upserts so that exactly one
 * journal row exists per real-world order, whether the exchange order id is
 * known at submission, learned on acknowledgement, or never learned.
 *
 * Identity is one entry per logical order keyed by the client order id,
 * with a secondary index from exchange order id to client order id. A
 * second exchange id for the same client id, or an exchange id already
 * owned by another client id, is a ConflictError.
 *
 * Once a terminal status (filled, cancelled, rejected) has been written,
 * later events for the order may only enrich the exchange payload.
 */

import {
  ConflictError,
  ValidationError,
  isTransientError,
  toErrorMessage,
} from "../errors/app.errors";
import type { Logger } from "../infra/logging";
import { createNullLogger } from "../infra/logging";
import {
  isOrderStatus,
  isTerminalStatus,
  systemClock,
  type BotContext,
  type Clock,
  type OrderEvent,
  type OrderStatus,
  type TradeFields,
  type TradeKey,
} from "../models";
import { HEALTH_FACTS, mapErrorToReasonCode, type HealthReporter } from "../monitoring";
import type { RemoteStateGateway } from "../services/interfaces";
import { withRetry, type RetryOptions } from "../utils/retry";

export type JournalOutcomeKind = "written" | "enriched" | "ignored_terminal" | "deferred";

export interface JournalOutcome {
  kind: JournalOutcomeKind;
  clientOrderId: string;
  exchangeOrderId: string | null;
  /** Status the journal believes the row holds after this event */
  status: OrderStatus | null;
  attempts: number;
  error?: string;
}

/** Local view of one logical order */
export interface JournalEntry {
  clientOrderId: string;
  exchangeOrderId: string | null;
  status: OrderStatus | null;
}

export interface TradeJournalOptions {
  context: BotContext;
  gateway: Pick<RemoteStateGateway, "upsertTrade" | "getTrade">;
  reporter?: HealthReporter;
  logger?: Logger;
  clock?: Clock;
  retry?: RetryOptions;
}

/**
 * Copy only the trade fields the caller supplied
 */
function pickTradeFields(event: OrderEvent): TradeFields {
  const fields: TradeFields = { status: event.status };
  if (event.side !== undefined) fields.side = event.side;
  if (event.symbol !== undefined) fields.symbol = event.symbol;
  if (event.orderType !== undefined) fields.orderType = event.orderType;
  if (event.reduceOnly !== undefined) fields.reduceOnly = event.reduceOnly;
  if (event.filledQuantity !== undefined) fields.filledQuantity = event.filledQuantity;
  if (event.averageFillPrice !== undefined) fields.averageFillPrice = event.averageFillPrice;
  if (event.positionId !== undefined) fields.positionId = event.positionId;
  if (event.fee !== undefined) fields.fee = event.fee;
  if (event.realizedPnl !== undefined) fields.realizedPnl = event.realizedPnl;
  if (event.executedAt !== undefined) fields.executedAt = event.executedAt;
  if (event.exchangePayload !== undefined) fields.exchangePayload = event.exchangePayload;
  return fields;
}

export class TradeJournal {
  private readonly entries = new Map<string, JournalEntry>();
  private readonly byExchangeId = new Map<string, string>();
  private readonly context: BotContext;
  private readonly gateway: Pick<RemoteStateGateway, "upsertTrade" | "getTrade">;
  private readonly reporter?: HealthReporter;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryOptions;

  constructor(options: TradeJournalOptions) {
    this.context = options.context;
    this.gateway = options.gateway;
    this.reporter = options.reporter;
    this.logger = options.logger ?? createNullLogger();
    this.clock = options.clock ?? systemClock;
    this.retry = options.retry ?? {};
  }

  /**
   * Record one order lifecycle event.
   *
   * Transient failures are retried with backoff; exhaustion yields a
   * "deferred" outcome. Conflict and validation errors propagate.
   */
  async recordOrderEvent(event: OrderEvent): Promise<JournalOutcome> {
    this.validate(event);

    const clientOrderId = event.clientOrderId.trim();
    const incomingExchangeId = event.exchangeOrderId ?? null;
    const entry = await this.resolveEntry(clientOrderId);
    this.assertIdentity(entry, incomingExchangeId);

    const exchangeOrderId = incomingExchangeId ?? entry.exchangeOrderId;

    let kind: JournalOutcomeKind = "written";
    let fields = pickTradeFields(event);
    if (entry.status !== null && isTerminalStatus(entry.status)) {
      if (!event.exchangePayload) {
        this.logger.debug("journal event ignored for terminal order", {
          category: "JOURNAL",
          botId: this.context.botId,
          clientOrderId,
          status: event.status,
          terminalStatus: entry.status,
        });
        return {
          kind: "ignored_terminal",
          clientOrderId,
          exchangeOrderId: entry.exchangeOrderId,
          status: entry.status,
          attempts: 0,
        };
      }
      kind = "enriched";
      fields = { exchangePayload: event.exchangePayload };
    }

    const result = await withRetry(
      () => this.gateway.upsertTrade(this.context.botId, clientOrderId, exchangeOrderId, fields),
      {
        ...this.retry,
        onRetry: (attempt, err, delayMs) => {
          this.logger.warn("journal write retry", {
            category: "JOURNAL",
            botId: this.context.botId,
            clientOrderId,
            attempt,
            delayMs,
            error: err.message,
          });
        },
      },
    );

    if (!result.success || !result.data) {
      this.reporter?.record(HEALTH_FACTS.dbWriteFailed);
      this.logger.warn("journal write deferred", {
        category: "JOURNAL",
        botId: this.context.botId,
        clientOrderId,
        status: event.status,
        attempts: result.attempts,
        error: result.error?.message,
      });
      await this.feedHealth(event);
      return {
        kind: "deferred",
        clientOrderId,
        exchangeOrderId,
        status: entry.status,
        attempts: result.attempts,
        error: result.error?.message,
      };
    }

    const ack = result.data;
    entry.exchangeOrderId = ack.exchangeOrderId ?? exchangeOrderId;
    if (kind === "written") {
      entry.status = event.status;
    }
    if (entry.exchangeOrderId) {
      this.byExchangeId.set(entry.exchangeOrderId, clientOrderId);
    }

    this.logger.info(kind === "enriched" ? "journal enriched" : "journal written", {
      category: "JOURNAL",
      botId: this.context.botId,
      clientOrderId,
      exchangeOrderId: entry.exchangeOrderId,
      status: entry.status,
      attempts: result.attempts,
    });

    if (kind === "written") {
      await this.feedHealth(event);
    }

    return {
      kind,
      clientOrderId,
      exchangeOrderId: entry.exchangeOrderId,
      status: entry.status,
      attempts: result.attempts,
    };
  }

  /**
   * Local index entry for an order, by either key
   */
  lookup(key: TradeKey): JournalEntry | undefined {
    const clientOrderId =
      "clientOrderId" in key ? key.clientOrderId : this.byExchangeId.get(key.exchangeOrderId);
    if (clientOrderId === undefined) return undefined;
    const entry = this.entries.get(clientOrderId);
    return entry ? { ...entry } : undefined;
  }

  size(): number {
    return this.entries.size;
  }

  private validate(event: OrderEvent): void {
    if (event.botId !== this.context.botId) {
      throw new ValidationError(
        `Order event for bot ${event.botId} sent to journal of bot ${this.context.botId}`,
        "botId",
      );
    }
    if (typeof event.clientOrderId !== "string" || !event.clientOrderId.trim()) {
      throw new ValidationError("clientOrderId is required", "clientOrderId");
    }
    if (!isOrderStatus(event.status)) {
      throw new ValidationError(`Unknown order status "${String(event.status)}"`, "status");
    }
    if (
      event.exchangeOrderId !== undefined &&
      event.exchangeOrderId !== null &&
      !event.exchangeOrderId.trim()
    ) {
      throw new ValidationError("exchangeOrderId must not be empty", "exchangeOrderId");
    }
  }

  /**
   * Local entry for the client id, hydrated from the system of record the
   * first time the id is seen. A transient hydration failure is tolerated
   * because the upsert is idempotent.
   */
  private async resolveEntry(clientOrderId: string): Promise<JournalEntry> {
    const known = this.entries.get(clientOrderId);
    if (known) return known;

    const entry: JournalEntry = { clientOrderId, exchangeOrderId: null, status: null };
    try {
      const stored = await this.gateway.getTrade(this.context.botId, { clientOrderId });
      if (stored) {
        entry.exchangeOrderId = stored.exchangeOrderId;
        entry.status = stored.status;
      }
    } catch (err) {
      if (!isTransientError(err)) throw err;
      this.logger.debug("journal hydration skipped", {
        category: "JOURNAL",
        botId: this.context.botId,
        clientOrderId,
        error: toErrorMessage(err),
      });
    }

    if (entry.exchangeOrderId) {
      this.assertExchangeIdFree(entry.exchangeOrderId, clientOrderId);
      this.byExchangeId.set(entry.exchangeOrderId, clientOrderId);
    }
    this.entries.set(clientOrderId, entry);
    return entry;
  }

  private assertIdentity(entry: JournalEntry, exchangeOrderId: string | null): void {
    if (exchangeOrderId === null) return;
    if (entry.exchangeOrderId !== null && entry.exchangeOrderId !== exchangeOrderId) {
      throw new ConflictError(
        `Order ${entry.clientOrderId} already linked to exchange order ${entry.exchangeOrderId}, got ${exchangeOrderId}`,
      );
    }
    this.assertExchangeIdFree(exchangeOrderId, entry.clientOrderId);
  }

  private assertExchangeIdFree(exchangeOrderId: string, clientOrderId: string): void {
    const owner = this.byExchangeId.get(exchangeOrderId);
    if (owner !== undefined && owner !== clientOrderId) {
      throw new ConflictError(
        `Exchange order ${exchangeOrderId} already linked to client order ${owner}`,
      );
    }
  }

  private async feedHealth(event: OrderEvent): Promise<void> {
    if (!this.reporter) return;
    switch (event.status) {
      case "submitted":
        await this.reporter.recordOrderSubmit();
        break;
      case "acknowledged":
      case "partially_filled":
      case "filled": {
        const latencyMs = event.submittedAt !== undefined ? this.clock() - event.submittedAt : 0;
        await this.reporter.recordOrderAck(latencyMs);
        break;
      }
      case "rejected":
        await this.reporter.recordOrderReject(
          event.rejectReason ? mapErrorToReasonCode(event.rejectReason) : null,
        );
        break;
      case "cancelled":
        break;
    }
  }
}
