import assert from "node:assert/strict";
import { describe, test } from "node:test";
import {
  ReasonCode,
  isRateLimitMessage,
  mapErrorToReasonCode,
  normalizeReasonCode,
} from "../../../src/monitoring";

describe("mapErrorToReasonCode", () => {
  test("maps exchange messages by pattern", () => {
    assert.equal(mapErrorToReasonCode(new Error("Invalid API-key, IP, or permissions")), ReasonCode.INVALID_KEY);
    assert.equal(mapErrorToReasonCode("Account has insufficient balance for requested action"), ReasonCode.INSUFFICIENT_BALANCE);
    assert.equal(mapErrorToReasonCode("Filter failure: MIN_NOTIONAL"), ReasonCode.MIN_NOTIONAL);
    assert.equal(mapErrorToReasonCode(new Error("DDoS protection triggered")), ReasonCode.RATE_LIMIT);
    assert.equal(mapErrorToReasonCode("socket timeout after 30s"), ReasonCode.WEBSOCKET);
  });

  test("falls back to UNKNOWN_ERROR", () => {
    assert.equal(mapErrorToReasonCode(new Error("something odd")), ReasonCode.UNKNOWN);
    assert.equal(mapErrorToReasonCode(null), ReasonCode.UNKNOWN);
    assert.equal(mapErrorToReasonCode(undefined), ReasonCode.UNKNOWN);
  });

  test("detects rate limit messages", () => {
    assert.equal(isRateLimitMessage("Rate limit exceeded"), true);
    assert.equal(isRateLimitMessage("order filled"), false);
  });
});

describe("normalizeReasonCode", () => {
  test("upper-cases and trims", () => {
    assert.equal(normalizeReasonCode(" db_timeout "), "DB_TIMEOUT");
  });

  test("empty values become UNKNOWN_ERROR", () => {
    assert.equal(normalizeReasonCode(""), "UNKNOWN_ERROR");
    assert.equal(normalizeReasonCode("   "), "UNKNOWN_ERROR");
    assert.equal(normalizeReasonCode(null), "UNKNOWN_ERROR");
  });
});
