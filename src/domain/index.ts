export { SCOREBOARD_KEY } from './event-record.js';
export type { RawRecord, EventRecord } from './event-record.js';
export { epochSeconds } from './telemetry.js';
export type { TelemetryRecord, TelemetryHook, TelemetryOutcome } from './telemetry.js';
export type { Logger } from './logger.js';
export { isSubscriptionTransport } from './transport.js';
export type {
  SubscriptionRequest,
  EventCallback,
  ErrorCallback,
  TransportSubscription,
  SubscriptionTransport,
} from './transport.js';
export { ConfigurationError } from './errors.js';
