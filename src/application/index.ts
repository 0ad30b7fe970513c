export { EventBuffer, DEFAULT_MAX_EVENTS } from './event-buffer.js';
export {
  CfbdSubscriptionManager,
  SubscriptionHandle,
  SCOREBOARD_OPERATION,
  SCOREBOARD_QUERY,
  SUBSCRIPTION_CLIENT,
  DEFAULT_EVENT_LIMIT,
} from './subscription-manager.js';
export type { SubscriptionManagerOptions, FeedStatus } from './subscription-manager.js';
export { parseTelemetryLine } from './telemetry-schema.js';
export type { TelemetryLine } from './telemetry-schema.js';
export {
  createExporterMetrics,
  recordTelemetryLine,
  LATENCY_BUCKETS_MS,
  HEARTBEAT_OUTCOME,
} from './telemetry-metrics.js';
export type { ExporterMetrics } from './telemetry-metrics.js';
