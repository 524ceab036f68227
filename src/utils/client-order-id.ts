import { randomBytes } from "node:crypto";
import { ValidationError } from "../errors/app.errors";

/**
 * Generate a client order id: `{botId}-{10 hex chars}[-{suffix}]`.
 * The id is chosen before submission and reused on every retry of the
 * same order.
 */
export function newClientOrderId(botId: string, suffix?: string): string {
  if (!botId || !botId.trim()) {
    throw new ValidationError("botId is required", "botId");
  }
  const base = `${botId}-${randomBytes(5).toString("hex")}`;
  return suffix ? `${base}-${suffix}` : base;
}
