/**
 * Service Interfaces
 *
 * Boundaries the core talks through. The core logic stays testable while
 * transport details live in the implementations.
 *
 * - RemoteStateGateway: system of record (positions, trades, health evidence)
 * - ExchangeSnapshotProvider: live venue state
 */

import type {
  OrderStatus,
  Position,
  PositionPatch,
  PositionStatus,
  TradeFields,
  TradeKey,
  TradeRecord,
} from "../models";
import type { ExchangePositionSnapshot } from "../models/exchange";

// ═══════════════════════════════════════════════════════════════════════════
// Remote State Gateway
// ═══════════════════════════════════════════════════════════════════════════

/** Acknowledgement of a position upsert */
export interface PositionAck {
  positionId: string;
}

/** Acknowledgement of a trade upsert */
export interface TradeAck {
  clientOrderId: string;
  exchangeOrderId: string | null;
  status?: OrderStatus;
}

/**
 * Health evidence patch: flat partial field bundle
 */
export type HealthEvidencePatch = Record<string, string | number | boolean | null>;

/**
 * Executes named remote calls against the system of record.
 *
 * Every call is scoped to one bot. Implementations have no retry policy of
 * their own and fail with TransientTransportError, ConflictError or
 * ValidationError.
 */
export interface RemoteStateGateway {
  getCanonicalPosition(
    botId: string,
    status: PositionStatus,
  ): Promise<Position | null>;

  upsertPosition(botId: string, payload: PositionPatch): Promise<PositionAck>;

  /**
   * Upsert keyed by (bot, clientOrderId). A non-null exchangeOrderId is
   * attached in the same write.
   */
  upsertTrade(
    botId: string,
    clientOrderId: string,
    exchangeOrderId: string | null,
    payload: TradeFields,
  ): Promise<TradeAck>;

  getTrade(botId: string, key: TradeKey): Promise<TradeRecord | null>;

  listTradesForPosition(botId: string, positionId: string): Promise<TradeRecord[]>;

  upsertHealthEvidence(botId: string, patch: HealthEvidencePatch): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Exchange
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read-only view of live exchange exposure
 */
export interface ExchangeSnapshotProvider {
  /**
   * Live position for a symbol, or null when the venue reports none.
   * Throws when the venue cannot be reached.
   */
  fetchPosition(symbol: string): Promise<ExchangePositionSnapshot | null>;
}
