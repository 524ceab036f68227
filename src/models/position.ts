/**
 * Position Model - The canonical belief about one bot's market exposure
 *
 * A position row lives in the system of record. At most one row with status
 * "open" exists per (bot, symbol); the runtime updates or transitions that
 * row and never creates a second open one.
 */

/**
 * Lifecycle status of a canonical position.
 * "missing" and "mismatch" are non-destructive and need operator attention.
 */
export type PositionStatus = "open" | "closed" | "missing" | "mismatch";

export type PositionSide = "long" | "short";

export interface Position {
  botId: string;

  /** Null until the row has been persisted once */
  positionId: string | null;

  status: PositionStatus;
  symbol: string;
  exchange?: string;
  /** Null when the row carries no recognisable side or size */
  side: PositionSide | null;
  quantity: number | null;
  entryPrice: number;
  markPrice?: number | null;
  exitPrice?: number | null;
  realizedPnl?: number | null;
  unrealizedPnl?: number | null;

  /** Entry/exit order correlation fields */
  entryClientOrderId?: string | null;
  entryExchangeOrderId?: string | null;
  exitClientOrderId?: string | null;
  exitExchangeOrderId?: string | null;

  /** ISO-8601 timestamps */
  entryTime?: string | null;
  exitTime?: string | null;
  lastExchangeSyncAt?: string | null;

  /** Raw exchange payload kept for audit */
  exchangePayload?: Record<string, unknown> | null;
}

/**
 * A canonical row whose side and size are known, so it can be compared
 * with an exchange snapshot.
 */
export interface SizedPosition extends Position {
  side: PositionSide;
  quantity: number;
}

export function isSizedPosition(position: Position): position is SizedPosition {
  return position.side !== null && position.quantity !== null;
}

/**
 * Partial field set sent to the position upsert. The row is addressed by
 * (bot, positionId); fields left out are preserved by the system of record.
 */
export type PositionPatch = Partial<Omit<Position, "botId" | "positionId">> & {
  positionId: string;
};
