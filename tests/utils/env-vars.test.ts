import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { loadRuntimeEnv } from "../../src/config";
import { ConfigurationError } from "../../src/errors/app.errors";

const REQUIRED = {
  SUPABASE_URL: "http://rpc.test/",
  SUPABASE_SERVICE_ROLE_KEY: "test-secret",
  RUNTIME_TOKEN: "test-token",
  BOT_ID: "bot-1",
  BOT_SYMBOL: "BTC/USDT",
};

describe("loadRuntimeEnv", () => {
  test("applies defaults around the required settings", () => {
    assert.deepEqual(loadRuntimeEnv(REQUIRED), {
      rpcBaseUrl: "http://rpc.test",
      serviceRoleKey: "test-secret",
      runtimeToken: "test-token",
      rpcTimeoutMs: 15_000,
      botId: "bot-1",
      symbol: "BTC/USDT",
      exchange: "binance",
      timeframe: "15m",
      tier: "standard",
      quantityTolerance: 0.000001,
      logLevel: "info",
      logFormat: "json",
    });
  });

  test("reads optional overrides", () => {
    const env = loadRuntimeEnv({
      ...REQUIRED,
      BOT_EXCHANGE: "bybit",
      BOT_TIMEFRAME: "1h",
      POLLING_TIER: " FAST_5S ",
      RPC_TIMEOUT_MS: "5000",
      QTY_TOLERANCE: "0.001",
      LOG_LEVEL: "DEBUG",
      LOG_FORMAT: "pretty",
    });
    assert.equal(env.exchange, "bybit");
    assert.equal(env.timeframe, "1h");
    assert.equal(env.tier, "fast_5s");
    assert.equal(env.rpcTimeoutMs, 5000);
    assert.equal(env.quantityTolerance, 0.001);
    assert.equal(env.logLevel, "debug");
    assert.equal(env.logFormat, "pretty");
  });

  test("accepts lower-case variable names", () => {
    const env = loadRuntimeEnv({
      supabase_url: "http://rpc.test",
      supabase_service_role_key: "test-secret",
      runtime_token: "test-token",
      bot_id: "bot-2",
      bot_symbol: "ETH/USDT",
    });
    assert.equal(env.botId, "bot-2");
    assert.equal(env.symbol, "ETH/USDT");
  });

  test("falls back on unknown tiers and unusable numbers", () => {
    const env = loadRuntimeEnv({
      ...REQUIRED,
      POLLING_TIER: "warp",
      RPC_TIMEOUT_MS: "soon",
      QTY_TOLERANCE: "-1",
    });
    assert.equal(env.tier, "standard");
    assert.equal(env.rpcTimeoutMs, 15_000);
    assert.equal(env.quantityTolerance, 0.000001);
  });

  test("names the first missing required variable", () => {
    assert.throws(
      () => loadRuntimeEnv({ ...REQUIRED, BOT_ID: "  " }),
      (err: unknown) =>
        err instanceof ConfigurationError && err.message === "Missing required env var: BOT_ID",
    );
  });
});
