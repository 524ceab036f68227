/**
 * Core Module Index
 *
 * Runtime consistency: canonical position reconciliation, dual-key trade
 * journaling and the journal-based close confirmation strategies.
 */

export {
  PositionReconciler,
  type PositionReconcilerOptions,
  type ReconciliationKind,
  type ReconciliationOutcome,
} from "./position-reconciler";

export {
  TradeJournal,
  type TradeJournalOptions,
  type JournalEntry,
  type JournalOutcome,
  type JournalOutcomeKind,
} from "./trade-journal";

export {
  ExactExitOrderConfirmation,
  FuzzyExitOrderConfirmation,
  exactExitOrderConfirmation,
  fuzzyExitOrderConfirmation,
  closingSide,
  quantitiesMatch,
  computeRealizedPnl,
  type CloseConfirmationStrategy,
  type CloseEvidence,
  type ConfirmationContext,
} from "./close-confirmation";
