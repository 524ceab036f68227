/**
 * Reason codes attached to health evidence fields such as
 * last_order_reject_reason and last_auth_error_code.
 */

export enum ReasonCode {
  UNKNOWN = "UNKNOWN_ERROR",
  INVALID_KEY = "INVALID_API_KEY",
  INSUFFICIENT_BALANCE = "INSUFFICIENT_BALANCE",
  MIN_NOTIONAL = "MIN_NOTIONAL",
  RATE_LIMIT = "RATE_LIMIT",
  WEBSOCKET = "WEBSOCKET_TIMEOUT",
  POSITION_MISMATCH = "POSITION_MISMATCH",
  DB_TIMEOUT = "DB_TIMEOUT",
  INDICATOR = "INDICATOR_ERROR",
}

// First match wins
const REASON_PATTERNS: ReadonlyArray<[string, ReasonCode]> = [
  ["invalid api", ReasonCode.INVALID_KEY],
  ["invalid key", ReasonCode.INVALID_KEY],
  ["insufficient balance", ReasonCode.INSUFFICIENT_BALANCE],
  ["insufficient funds", ReasonCode.INSUFFICIENT_BALANCE],
  ["min notional", ReasonCode.MIN_NOTIONAL],
  ["min_notional", ReasonCode.MIN_NOTIONAL],
  ["rate limit", ReasonCode.RATE_LIMIT],
  ["ratelimit", ReasonCode.RATE_LIMIT],
  ["ddos", ReasonCode.RATE_LIMIT],
  ["timeout", ReasonCode.WEBSOCKET],
  ["websocket", ReasonCode.WEBSOCKET],
  ["position mismatch", ReasonCode.POSITION_MISMATCH],
  ["db timeout", ReasonCode.DB_TIMEOUT],
  ["db_timeout", ReasonCode.DB_TIMEOUT],
  ["indicator", ReasonCode.INDICATOR],
];

function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Map an exception or raw exchange message to a reason code
 */
export function mapErrorToReasonCode(error: unknown): ReasonCode {
  if (error === null || error === undefined) return ReasonCode.UNKNOWN;
  const text = describe(error).toLowerCase();
  for (const [pattern, code] of REASON_PATTERNS) {
    if (text.includes(pattern)) return code;
  }
  return ReasonCode.UNKNOWN;
}

/**
 * Upper-case a caller supplied code; empty becomes UNKNOWN_ERROR
 */
export function normalizeReasonCode(code: string | null | undefined): string {
  if (!code || !code.trim()) return ReasonCode.UNKNOWN;
  return code.trim().toUpperCase();
}

export function isRateLimitMessage(error: unknown): boolean {
  return mapErrorToReasonCode(error) === ReasonCode.RATE_LIMIT;
}
