/**
 * Position Reconciler
 *
 * Compares the canonical open position in the system of record with the
 * live exchange snapshot and writes back the resulting transition:
 *
 *   canonical | snapshot                      | outcome
 *   ----------+-------------------------------+--------------------------
 *   none      | none                          | flat (no write)
 *   none      | present                       | orphan_exchange_position (no write)
 *   open      | same side, quantity in bounds | synced
 *   open      | side or quantity diverges     | mismatch
 *   open      | none, close confirmed         | closed
 *   open      | none, close not confirmed     | missing
 *
 * Without an open row, a row left "missing" by an earlier tick is the
 * canonical belief, so it can still be closed on later evidence or synced
 * back to open when the exposure reappears.
 *
 * The reconciler never creates an open row and never closes one without
 * journal evidence. Transient read/write failures become outcomes and
 * health facts; the next tick is the retry.
 */

import {
  ValidationError,
  isTransientError,
  toErrorMessage,
} from "../errors/app.errors";
import { DEFAULT_QUANTITY_TOLERANCE } from "../config/env";
import type { Logger } from "../infra/logging";
import { createNullLogger } from "../infra/logging";
import {
  systemClock,
  type BotContext,
  type Clock,
  type ExchangePositionSnapshot,
  type Position,
  type PositionPatch,
  type SizedPosition,
  isSizedPosition,
} from "../models";
import { HEALTH_FACTS, type HealthFact, type HealthReporter } from "../monitoring";
import type { ExchangeSnapshotProvider, RemoteStateGateway } from "../services/interfaces";
import {
  exactExitOrderConfirmation,
  quantitiesMatch,
  type CloseConfirmationStrategy,
  type CloseEvidence,
} from "./close-confirmation";

export type ReconciliationKind =
  | "flat"
  | "orphan_exchange_position"
  | "synced"
  | "mismatch"
  | "closed"
  | "missing"
  | "read_failed"
  | "exchange_unavailable"
  | "write_failed";

export interface ReconciliationOutcome {
  kind: ReconciliationKind;
  botId: string;
  positionId: string | null;
  /** ISO-8601 time of the check */
  checkedAt: string;
  /** Transition that could not be persisted, for write_failed */
  intended?: ReconciliationKind;
  reason?: string;
  /** Absolute quantity difference between canonical and exchange */
  quantityDiff?: number;
  evidence?: CloseEvidence;
  error?: string;
}

export interface PositionReconcilerOptions {
  context: BotContext;
  gateway: RemoteStateGateway;
  exchange: ExchangeSnapshotProvider;
  confirmation?: CloseConfirmationStrategy;
  reporter?: HealthReporter;
  logger?: Logger;
  clock?: Clock;
  quantityTolerance?: number;
}

const TRANSITION_FACTS: Partial<Record<ReconciliationKind, HealthFact>> = {
  synced: HEALTH_FACTS.positionSyncOk,
  mismatch: HEALTH_FACTS.positionMismatch,
  closed: HEALTH_FACTS.positionClosed,
  missing: HEALTH_FACTS.positionMissing,
  orphan_exchange_position: HEALTH_FACTS.positionOrphan,
};

interface Transition {
  kind: ReconciliationKind;
  patch: PositionPatch | null;
  reason?: string;
  quantityDiff?: number;
  evidence?: CloseEvidence;
}

export class PositionReconciler {
  private readonly context: BotContext;
  private readonly gateway: RemoteStateGateway;
  private readonly exchange: ExchangeSnapshotProvider;
  private readonly confirmation: CloseConfirmationStrategy;
  private readonly reporter?: HealthReporter;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly quantityTolerance: number;
  private lastKnownGood: ReconciliationOutcome | null = null;

  constructor(options: PositionReconcilerOptions) {
    this.context = options.context;
    this.gateway = options.gateway;
    this.exchange = options.exchange;
    this.confirmation = options.confirmation ?? exactExitOrderConfirmation();
    this.reporter = options.reporter;
    this.logger = options.logger ?? createNullLogger();
    this.clock = options.clock ?? systemClock;
    this.quantityTolerance = options.quantityTolerance ?? DEFAULT_QUANTITY_TOLERANCE;
  }

  /**
   * Last outcome whose resulting state is known to be persisted
   */
  getLastKnownGood(): ReconciliationOutcome | null {
    return this.lastKnownGood;
  }

  async reconcile(botId: string): Promise<ReconciliationOutcome> {
    if (botId !== this.context.botId) {
      throw new ValidationError(
        `Reconciler for bot ${this.context.botId} asked to reconcile bot ${botId}`,
        "botId",
      );
    }
    const checkedAt = new Date(this.clock()).toISOString();

    // 1. Canonical belief; a missing row stays under watch until resolved
    let row: Position | null;
    try {
      row =
        (await this.gateway.getCanonicalPosition(botId, "open")) ??
        (await this.gateway.getCanonicalPosition(botId, "missing"));
    } catch (err) {
      if (!isTransientError(err)) throw err;
      return this.readFailed(checkedAt, null, err);
    }
    this.reporter?.recordDbOk();

    let canonical: SizedPosition | null = null;
    if (row) {
      const missing = this.missingIdentityFields(row);
      if (missing.length > 0 || !isSizedPosition(row)) {
        return this.apply(checkedAt, row, {
          kind: "mismatch",
          reason: `missing identity fields: ${missing.join(", ")}`,
          patch: this.mismatchPatch(row, checkedAt, null),
        }, true);
      }
      canonical = row;
    }

    // 2. Live exchange view
    let snapshot: ExchangePositionSnapshot | null;
    try {
      const fetched = await this.exchange.fetchPosition(this.context.symbol);
      if (fetched && !(Number.isFinite(fetched.quantity) && fetched.quantity >= 0)) {
        throw new ValidationError(`invalid exchange quantity ${fetched.quantity}`, "quantity");
      }
      snapshot = fetched && fetched.quantity > 0 ? fetched : null;
    } catch (err) {
      this.reporter?.record(HEALTH_FACTS.exchangeReadFailed);
      this.logger.warn("exchange snapshot unavailable", {
        category: "RECONCILE",
        botId,
        symbol: this.context.symbol,
        error: toErrorMessage(err),
      });
      return {
        kind: "exchange_unavailable",
        botId,
        positionId: canonical?.positionId ?? null,
        checkedAt,
        error: toErrorMessage(err),
      };
    }

    // 3. Decision table
    if (!canonical) {
      if (!snapshot) {
        return this.apply(checkedAt, null, { kind: "flat", patch: null }, false);
      }
      return this.apply(checkedAt, null, {
        kind: "orphan_exchange_position",
        patch: null,
        reason: `exchange reports ${snapshot.side} ${snapshot.quantity} with no canonical position`,
        quantityDiff: snapshot.quantity,
      }, true);
    }

    if (snapshot) {
      const quantityDiff = Math.abs(snapshot.quantity - canonical.quantity);
      if (snapshot.side !== canonical.side) {
        // Opposite sides: net exposure differs by both legs
        return this.apply(checkedAt, canonical, {
          kind: "mismatch",
          reason: `side ${canonical.side} vs exchange ${snapshot.side}`,
          quantityDiff: snapshot.quantity + canonical.quantity,
          patch: this.mismatchPatch(canonical, checkedAt, snapshot),
        }, true);
      }
      if (!quantitiesMatch(snapshot.quantity, canonical.quantity, this.quantityTolerance)) {
        return this.apply(checkedAt, canonical, {
          kind: "mismatch",
          reason: `quantity ${canonical.quantity} vs exchange ${snapshot.quantity}`,
          quantityDiff,
          patch: this.mismatchPatch(canonical, checkedAt, snapshot),
        }, true);
      }
      return this.apply(checkedAt, canonical, {
        kind: "synced",
        quantityDiff: 0,
        patch: this.withId(canonical, {
          status: "open",
          markPrice: snapshot.markPrice ?? undefined,
          unrealizedPnl: snapshot.unrealizedPnl ?? undefined,
          lastExchangeSyncAt: checkedAt,
          exchangePayload: snapshot.raw,
        }),
      }, true);
    }

    // Exposure gone: only journal evidence may close the position
    let evidence: CloseEvidence | null;
    try {
      evidence = await this.confirmation.confirm(canonical, {
        botId,
        gateway: this.gateway,
        quantityTolerance: this.quantityTolerance,
      });
    } catch (err) {
      if (!isTransientError(err)) throw err;
      return this.readFailed(checkedAt, canonical.positionId, err);
    }

    if (!evidence) {
      return this.apply(checkedAt, canonical, {
        kind: "missing",
        reason: `no exchange exposure and no confirmed exit (${this.confirmation.name})`,
        quantityDiff: canonical.quantity,
        patch: this.withId(canonical, { status: "missing", lastExchangeSyncAt: checkedAt }),
      }, false);
    }

    return this.apply(checkedAt, canonical, {
      kind: "closed",
      quantityDiff: 0,
      evidence,
      patch: this.withId(canonical, {
        status: "closed",
        exitPrice: evidence.exitPrice ?? undefined,
        exitTime: evidence.exitTime ?? checkedAt,
        realizedPnl: evidence.realizedPnl ?? undefined,
        exitClientOrderId: evidence.trade.clientOrderId,
        exitExchangeOrderId: evidence.trade.exchangeOrderId ?? undefined,
        lastExchangeSyncAt: checkedAt,
      }),
    }, false);
  }

  private missingIdentityFields(position: Position): string[] {
    const missing: string[] = [];
    if (!position.positionId) missing.push("positionId");
    if (!position.symbol) missing.push("symbol");
    if (!position.entryClientOrderId) missing.push("entryClientOrderId");
    if (!position.entryExchangeOrderId) missing.push("entryExchangeOrderId");
    if (position.side === null) missing.push("side");
    if (position.quantity === null) missing.push("quantity");
    return missing;
  }

  private mismatchPatch(
    position: Position,
    checkedAt: string,
    snapshot: ExchangePositionSnapshot | null,
  ): PositionPatch | null {
    const fields: Omit<PositionPatch, "positionId"> = {
      status: "mismatch",
      lastExchangeSyncAt: checkedAt,
    };
    if (snapshot) fields.exchangePayload = snapshot.raw;
    return this.withId(position, fields);
  }

  /** Address a patch to the canonical row; rows without an id are never written */
  private withId(
    position: Position,
    fields: Omit<PositionPatch, "positionId">,
  ): PositionPatch | null {
    if (!position.positionId) return null;
    return { ...fields, positionId: position.positionId };
  }

  private async apply(
    checkedAt: string,
    canonical: Position | null,
    transition: Transition,
    exposureOnExchange: boolean,
  ): Promise<ReconciliationOutcome> {
    const botId = this.context.botId;
    const outcome: ReconciliationOutcome = {
      kind: transition.kind,
      botId,
      positionId: canonical?.positionId ?? null,
      checkedAt,
      reason: transition.reason,
      quantityDiff: transition.quantityDiff,
      evidence: transition.evidence,
    };

    // Observations are recorded whether or not the write lands
    const escalate = this.observe(transition, exposureOnExchange);

    if (transition.patch) {
      try {
        await this.gateway.upsertPosition(botId, transition.patch);
      } catch (err) {
        if (!isTransientError(err)) throw err;
        this.reporter?.record(HEALTH_FACTS.dbWriteFailed);
        this.logger.warn("position write failed", {
          category: "RECONCILE",
          botId,
          positionId: outcome.positionId,
          intended: transition.kind,
          error: toErrorMessage(err),
        });
        await this.escalate(escalate);
        return {
          ...outcome,
          kind: "write_failed",
          intended: transition.kind,
          error: toErrorMessage(err),
        };
      }
    }
    await this.escalate(escalate);

    this.lastKnownGood = outcome;
    const level = transition.kind === "flat" || transition.kind === "synced" ? "info" : "warn";
    this.logger[level](`reconcile ${transition.kind}`, {
      category: "RECONCILE",
      botId,
      positionId: outcome.positionId,
      reason: transition.reason,
      quantityDiff: transition.quantityDiff,
    });
    return outcome;
  }

  /** Returns whether the observed difference needs an immediate flush */
  private observe(transition: Transition, exposureOnExchange: boolean): boolean {
    if (!this.reporter) return false;
    this.reporter.setInPosition(exposureOnExchange);
    const fact = TRANSITION_FACTS[transition.kind];
    if (fact) this.reporter.record(fact);
    if (transition.quantityDiff === undefined) return false;
    return this.reporter.notePositionSync(transition.quantityDiff);
  }

  private async escalate(needed: boolean): Promise<void> {
    if (needed && this.reporter) {
      await this.reporter.flushNow("position_diff");
    }
  }

  private readFailed(
    checkedAt: string,
    positionId: string | null,
    err: Error,
  ): ReconciliationOutcome {
    this.reporter?.record(HEALTH_FACTS.dbReadFailed);
    this.logger.warn("canonical read failed", {
      category: "RECONCILE",
      botId: this.context.botId,
      error: err.message,
    });
    return {
      kind: "read_failed",
      botId: this.context.botId,
      positionId,
      checkedAt,
      error: err.message,
    };
  }
}
