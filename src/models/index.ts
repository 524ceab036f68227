/**
 * Models Index - Re-exports all domain model types
 *
 * - Position: canonical position rows
 * - Order: trade journal rows and order lifecycle events
 * - Exchange: venue-reported snapshots
 * - Common: clock and bot context
 */

export type {
  Position,
  PositionPatch,
  PositionSide,
  PositionStatus,
  SizedPosition,
} from "./position";

export { isSizedPosition } from "./position";

export type {
  OrderEvent,
  OrderSide,
  OrderStatus,
  TradeFields,
  TradeKey,
  TradeRecord,
} from "./order";

export {
  ORDER_STATUSES,
  TERMINAL_ORDER_STATUSES,
  isOrderStatus,
  isTerminalStatus,
} from "./order";

export type { ExchangePositionSnapshot } from "./exchange";

export type { BotContext, Clock } from "./common";
export { systemClock } from "./common";
