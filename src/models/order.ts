/**
 * Order Model - One journal row per real-world order lifecycle
 *
 * A row is addressed by (bot, clientOrderId) from submission onwards and,
 * once the exchange acknowledges it, also by (bot, exchangeOrderId).
 */

export type OrderSide = "buy" | "sell";

export type OrderStatus =
  | "submitted"
  | "acknowledged"
  | "partially_filled"
  | "filled"
  | "cancelled"
  | "rejected";

export const TERMINAL_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>([
  "filled",
  "cancelled",
  "rejected",
]);

export const ORDER_STATUSES: readonly OrderStatus[] = [
  "submitted",
  "acknowledged",
  "partially_filled",
  "filled",
  "cancelled",
  "rejected",
];

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.has(status);
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

/**
 * Fields a journal write may carry. Every field is optional so the journal
 * can submit exactly what the caller provided.
 */
export interface TradeFields {
  status?: OrderStatus;
  side?: OrderSide;
  symbol?: string;
  orderType?: string;
  reduceOnly?: boolean;
  filledQuantity?: number;
  averageFillPrice?: number;
  positionId?: string | null;
  fee?: number;
  realizedPnl?: number;
  /** ISO-8601 */
  executedAt?: string;
  exchangePayload?: Record<string, unknown>;
}

/**
 * A persisted journal row
 */
export interface TradeRecord extends TradeFields {
  botId: string;
  clientOrderId: string;
  exchangeOrderId: string | null;
  status: OrderStatus;
  /** ISO-8601 time the row was last written, when the backend reports it */
  updatedAt?: string;
}

/**
 * An order lifecycle event handed to the journal by the runtime
 */
export interface OrderEvent extends TradeFields {
  botId: string;
  clientOrderId: string;
  exchangeOrderId?: string | null;
  status: OrderStatus;
  /** Epoch ms the order was submitted; used for ack latency */
  submittedAt?: number;
  /** Raw reject reason from the exchange */
  rejectReason?: string;
}

/**
 * Lookup key for a journal row
 */
export type TradeKey =
  | { clientOrderId: string }
  | { exchangeOrderId: string };
