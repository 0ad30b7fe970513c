/** Structured record forwarded to a telemetry hook. */
export interface TelemetryRecord {
  timestamp: number; // Unix epoch seconds
  client: string;
  operation: string;
  outcome: string;
  detail: string;
}

export type TelemetryHook = (record: TelemetryRecord) => void;

export type TelemetryOutcome = 'subscription_event' | 'subscription_error';

/** Wall clock in Unix epoch seconds. */
export function epochSeconds(): number {
  return Date.now() / 1000;
}
