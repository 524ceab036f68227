/**
 * Health Evidence Module
 *
 * Sliding-window health facts, the flush-policy driven reporter and the
 * reason codes attached to evidence fields.
 */

export { HealthWindow, type HealthSample, type HealthSampleValue } from "./health-window";

export {
  HealthReporter,
  HealthFlushLoop,
  HEALTH_FACTS,
  HEALTH_COUNT_COLUMNS,
  DEFAULT_FLUSH_LOOP_INTERVAL_MS,
  type HealthFact,
  type HealthReporterOptions,
  type HealthFlushLoopOptions,
  type FlushOptions,
  type ScheduledFlush,
} from "./health-reporter";

export {
  ReasonCode,
  mapErrorToReasonCode,
  normalizeReasonCode,
  isRateLimitMessage,
} from "./reason-codes";
