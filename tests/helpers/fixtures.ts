import type { BotContext, SizedPosition, TradeRecord } from "../../src/models";

export const BOT_CONTEXT: BotContext = { botId: "bot-1", symbol: "BTC/USDT", exchange: "binance" };

export function openPosition(overrides: Partial<SizedPosition> = {}): SizedPosition {
  return {
    botId: "bot-1",
    positionId: "pos-1",
    status: "open",
    symbol: "BTC/USDT",
    exchange: "binance",
    side: "long",
    quantity: 0.5,
    entryPrice: 40_000,
    entryClientOrderId: "c-entry",
    entryExchangeOrderId: "x-entry",
    entryTime: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function filledTrade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    botId: "bot-1",
    clientOrderId: "c-exit",
    exchangeOrderId: "x-exit",
    status: "filled",
    side: "sell",
    symbol: "BTC/USDT",
    filledQuantity: 0.5,
    averageFillPrice: 41_000,
    positionId: "pos-1",
    executedAt: "2026-01-01T01:00:00.000Z",
    ...overrides,
  };
}
