/**
 * Row mapping between the system of record's snake_case JSON and the
 * domain models. Rows are validated field by field; a malformed row is a
 * ValidationError rather than a silently defaulted value. The position's
 * side and size are the exception: they parse to null so the reconciler
 * can mark the row as a mismatch.
 */

import { ValidationError } from "../../errors/app.errors";
import {
  isOrderStatus,
  type Position,
  type PositionPatch,
  type PositionSide,
  type PositionStatus,
  type TradeFields,
  type TradeRecord,
} from "../../models";

type Row = Record<string, unknown>;

const POSITION_STATUSES: readonly PositionStatus[] = ["open", "closed", "missing", "mismatch"];

export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(row: Row, key: string): string | null {
  const value = row[key];
  if (value === undefined || value === null || value === "") return null;
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  throw new ValidationError(`Field ${key} must be a string`, key);
}

function requiredString(row: Row, key: string): string {
  const value = optionalString(row, key);
  if (value === null) {
    throw new ValidationError(`Field ${key} is required`, key);
  }
  return value;
}

// Postgres numeric columns arrive as strings
function optionalNumber(row: Row, key: string): number | null {
  const value = row[key];
  if (value === undefined || value === null || value === "") return null;
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Field ${key} must be numeric`, key);
  }
  return parsed;
}

function optionalObject(row: Row, key: string): Record<string, unknown> | null {
  const value = row[key];
  return isRow(value) ? value : null;
}

function parseSide(row: Row): PositionSide | null {
  const raw = row.position_side || row.direction;
  if (typeof raw !== "string") return null;
  const side = raw.toLowerCase();
  if (side === "long" || side === "buy") return "long";
  if (side === "short" || side === "sell") return "short";
  return null;
}

function parseQuantity(row: Row): number | null {
  const value = row.qty;
  if (value === undefined || value === null || value === "") return null;
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parsePositionStatus(row: Row): PositionStatus {
  const raw = requiredString(row, "status");
  const match = POSITION_STATUSES.find((status) => status === raw);
  if (!match) {
    throw new ValidationError(`Unknown position status "${raw}"`, "status");
  }
  return match;
}

export function parsePositionRow(botId: string, row: unknown): Position {
  if (!isRow(row)) {
    throw new ValidationError("Position row must be an object");
  }
  return {
    botId,
    positionId: optionalString(row, "id") ?? optionalString(row, "position_id"),
    status: parsePositionStatus(row),
    symbol: optionalString(row, "symbol") ?? "",
    exchange: optionalString(row, "exchange") ?? undefined,
    side: parseSide(row),
    quantity: parseQuantity(row),
    entryPrice: optionalNumber(row, "entry_price") ?? 0,
    markPrice: optionalNumber(row, "mark_price"),
    exitPrice: optionalNumber(row, "exit_price"),
    realizedPnl: optionalNumber(row, "realized_pnl"),
    unrealizedPnl: optionalNumber(row, "unrealized_pnl"),
    entryClientOrderId: optionalString(row, "entry_client_order_id"),
    entryExchangeOrderId: optionalString(row, "entry_exchange_order_id"),
    exitClientOrderId: optionalString(row, "exit_client_order_id"),
    exitExchangeOrderId: optionalString(row, "exit_exchange_order_id"),
    entryTime: optionalString(row, "entry_time"),
    exitTime: optionalString(row, "exit_time"),
    lastExchangeSyncAt: optionalString(row, "last_exchange_sync_at"),
    exchangePayload: optionalObject(row, "exchange_payload"),
  };
}

export function parseTradeRow(botId: string, row: unknown): TradeRecord {
  if (!isRow(row)) {
    throw new ValidationError("Trade row must be an object");
  }
  const status = row.order_status ?? row.status;
  if (!isOrderStatus(status)) {
    throw new ValidationError(`Unknown order status "${String(status)}"`, "order_status");
  }
  const side = optionalString(row, "side");
  return {
    botId,
    clientOrderId: requiredString(row, "client_order_id"),
    exchangeOrderId: optionalString(row, "exchange_order_id"),
    status,
    side: side === "buy" || side === "sell" ? side : undefined,
    symbol: optionalString(row, "symbol") ?? undefined,
    orderType: optionalString(row, "order_type") ?? undefined,
    reduceOnly: typeof row.reduce_only === "boolean" ? row.reduce_only : undefined,
    filledQuantity: optionalNumber(row, "filled_qty") ?? undefined,
    averageFillPrice: optionalNumber(row, "avg_fill_price") ?? undefined,
    positionId: optionalString(row, "position_id"),
    fee: optionalNumber(row, "fee") ?? undefined,
    realizedPnl: optionalNumber(row, "pnl") ?? undefined,
    executedAt: optionalString(row, "executed_at") ?? undefined,
    exchangePayload: optionalObject(row, "exchange_payload") ?? undefined,
    updatedAt: optionalString(row, "updated_at") ?? undefined,
  };
}

/**
 * Drop undefined entries so only caller-supplied fields are sent
 */
function compact(payload: Row): Row {
  const out: Row = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function positionPatchToPayload(patch: PositionPatch): Row {
  return compact({
    position_id: patch.positionId,
    status: patch.status,
    symbol: patch.symbol,
    exchange: patch.exchange,
    position_side: patch.side,
    qty: patch.quantity,
    entry_price: patch.entryPrice,
    mark_price: patch.markPrice,
    exit_price: patch.exitPrice,
    realized_pnl: patch.realizedPnl,
    unrealized_pnl: patch.unrealizedPnl,
    entry_client_order_id: patch.entryClientOrderId,
    entry_exchange_order_id: patch.entryExchangeOrderId,
    exit_client_order_id: patch.exitClientOrderId,
    exit_exchange_order_id: patch.exitExchangeOrderId,
    entry_time: patch.entryTime,
    exit_time: patch.exitTime,
    last_exchange_sync_at: patch.lastExchangeSyncAt,
    exchange_payload: patch.exchangePayload,
  });
}

export function tradeFieldsToPayload(fields: TradeFields): Row {
  return compact({
    order_status: fields.status,
    side: fields.side,
    symbol: fields.symbol,
    order_type: fields.orderType,
    reduce_only: fields.reduceOnly,
    filled_qty: fields.filledQuantity,
    avg_fill_price: fields.averageFillPrice,
    position_id: fields.positionId,
    fee: fields.fee,
    pnl: fields.realizedPnl,
    executed_at: fields.executedAt,
    exchange_payload: fields.exchangePayload,
  });
}
