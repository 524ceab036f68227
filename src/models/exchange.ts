/**
 * Exchange Model - What the venue reports about live exposure
 */

import type { PositionSide } from "./position";

export interface ExchangePositionSnapshot {
  symbol: string;
  side: PositionSide;
  /** Absolute contract/base quantity */
  quantity: number;
  entryPrice?: number | null;
  markPrice?: number | null;
  unrealizedPnl?: number | null;
  /** Venue-side identifiers when the exchange exposes them */
  exchangePositionId?: string | null;
  /** Raw payload kept for audit */
  raw: Record<string, unknown>;
}
