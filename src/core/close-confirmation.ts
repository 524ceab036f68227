/**
 * Close Confirmation
 *
 * A canonical open position whose exchange exposure has disappeared is only
 * transitioned to "closed" when the journal holds evidence of the exit
 * order. Strategies decide what counts as evidence; both read the journal
 * through the gateway and never consult the exchange.
 */

import type { OrderSide, PositionSide, SizedPosition, TradeKey, TradeRecord } from "../models";
import type { RemoteStateGateway } from "../services/interfaces";

export interface CloseEvidence {
  trade: TradeRecord;
  matchedBy: "exit_order" | "position_trades";
  exitPrice: number | null;
  exitTime: string | null;
  realizedPnl: number | null;
}

export interface ConfirmationContext {
  botId: string;
  gateway: Pick<RemoteStateGateway, "getTrade" | "listTradesForPosition">;
  /** Relative quantity tolerance */
  quantityTolerance: number;
}

export interface CloseConfirmationStrategy {
  readonly name: string;
  confirm(position: SizedPosition, context: ConfirmationContext): Promise<CloseEvidence | null>;
}

export function closingSide(side: PositionSide): OrderSide {
  return side === "long" ? "sell" : "buy";
}

/**
 * Compare two quantities with a tolerance relative to the larger one
 */
export function quantitiesMatch(a: number, b: number, tolerance: number): boolean {
  const diff = Math.abs(a - b);
  return diff <= tolerance * Math.max(Math.abs(a), Math.abs(b));
}

export function computeRealizedPnl(position: SizedPosition, exitPrice: number): number {
  const sign = position.side === "long" ? 1 : -1;
  return (exitPrice - position.entryPrice) * position.quantity * sign;
}

function isClosingFill(position: SizedPosition, trade: TradeRecord, tolerance: number): boolean {
  if (trade.status !== "filled") return false;
  if (trade.side !== undefined && trade.side !== closingSide(position.side)) return false;
  if (trade.filledQuantity !== undefined) {
    return quantitiesMatch(trade.filledQuantity, position.quantity, tolerance);
  }
  return true;
}

function toEvidence(
  position: SizedPosition,
  trade: TradeRecord,
  matchedBy: CloseEvidence["matchedBy"],
): CloseEvidence {
  const exitPrice = trade.averageFillPrice ?? null;
  let realizedPnl: number | null = trade.realizedPnl ?? null;
  if (realizedPnl === null && exitPrice !== null) {
    realizedPnl = computeRealizedPnl(position, exitPrice);
  }
  return {
    trade,
    matchedBy,
    exitPrice,
    exitTime: trade.executedAt ?? trade.updatedAt ?? null,
    realizedPnl,
  };
}

function exitOrderKey(position: SizedPosition): TradeKey | null {
  if (position.exitClientOrderId) return { clientOrderId: position.exitClientOrderId };
  if (position.exitExchangeOrderId) return { exchangeOrderId: position.exitExchangeOrderId };
  return null;
}

/**
 * Confirms only through the exit order recorded on the position: the
 * journal row must be a filled order on the closing side for the full
 * quantity.
 */
export class ExactExitOrderConfirmation implements CloseConfirmationStrategy {
  readonly name = "exact_exit_order";

  async confirm(position: SizedPosition, context: ConfirmationContext): Promise<CloseEvidence | null> {
    const key = exitOrderKey(position);
    if (!key) return null;

    const trade = await context.gateway.getTrade(context.botId, key);
    if (!trade || !isClosingFill(position, trade, context.quantityTolerance)) {
      return null;
    }
    return toEvidence(position, trade, "exit_order");
  }
}

/**
 * Falls back to the position's journal trail when no exit order is linked:
 * the latest filled closing-side order for the position's quantity executed
 * at or after entry.
 */
export class FuzzyExitOrderConfirmation implements CloseConfirmationStrategy {
  readonly name = "fuzzy_exit_order";
  private readonly exact = new ExactExitOrderConfirmation();

  async confirm(position: SizedPosition, context: ConfirmationContext): Promise<CloseEvidence | null> {
    const linked = await this.exact.confirm(position, context);
    if (linked) return linked;
    if (!position.positionId) return null;

    const trades = await context.gateway.listTradesForPosition(context.botId, position.positionId);
    const entryMs = position.entryTime ? Date.parse(position.entryTime) : NaN;

    const candidates = trades.filter((trade) => {
      if (trade.clientOrderId === position.entryClientOrderId) return false;
      // Quantity is required here; an unsized fill is not evidence
      if (trade.filledQuantity === undefined) return false;
      if (!isClosingFill(position, trade, context.quantityTolerance)) return false;
      if (!Number.isNaN(entryMs) && trade.executedAt) {
        const filledAt = Date.parse(trade.executedAt);
        if (!Number.isNaN(filledAt) && filledAt < entryMs) return false;
      }
      return true;
    });
    if (candidates.length === 0) return null;

    const latest = candidates.reduce((best, trade) =>
      executedMs(trade) > executedMs(best) ? trade : best,
    );
    return toEvidence(position, latest, "position_trades");
  }
}

function executedMs(trade: TradeRecord): number {
  const ms = trade.executedAt ? Date.parse(trade.executedAt) : NaN;
  return Number.isNaN(ms) ? 0 : ms;
}

export function exactExitOrderConfirmation(): CloseConfirmationStrategy {
  return new ExactExitOrderConfirmation();
}

export function fuzzyExitOrderConfirmation(): CloseConfirmationStrategy {
  return new FuzzyExitOrderConfirmation();
}
