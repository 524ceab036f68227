/**
 * Common Models - Shared types used across the application
 */

/**
 * Source of the current time in epoch milliseconds. Injected so timing
 * logic can be driven by a manual clock in tests.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * The bot identity and market context a runtime process works for
 */
export interface BotContext {
  botId: string;
  symbol: string;
  exchange: string;
}
