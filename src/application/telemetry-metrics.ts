import { Counter, Gauge, Histogram } from 'prom-client';
import type { Registry } from 'prom-client';
import { parseTelemetryLine } from './telemetry-schema.js';
import { epochSeconds } from '../domain/index.js';

export const LATENCY_BUCKETS_MS = [10, 25, 50, 100, 250, 500, 1000, 2000, 4000];

export const HEARTBEAT_OUTCOME = 'subscription_event';

export interface ExporterMetrics {
  requests: Counter<'client' | 'outcome'>;
  latency: Histogram;
  retries: Counter<'client'>;
  heartbeat: Gauge;
}

/**
 * Registers the exporter's metrics on the given registry.
 *
 * The registry is passed in rather than using prom-client's global one, so
 * each exporter (and each test) owns its metrics.
 */
export function createExporterMetrics(registry: Registry): ExporterMetrics {
  return {
    requests: new Counter({
      name: 'cfbd_client_requests_total',
      help: 'CFBD client requests by client and outcome',
      labelNames: ['client', 'outcome'] as const,
      registers: [registry],
    }),
    latency: new Histogram({
      name: 'cfbd_client_latency_ms',
      help: 'CFBD client request latency in milliseconds',
      buckets: LATENCY_BUCKETS_MS,
      registers: [registry],
    }),
    retries: new Counter({
      name: 'cfbd_client_retries_total',
      help: 'CFBD client retries by client',
      labelNames: ['client'] as const,
      registers: [registry],
    }),
    heartbeat: new Gauge({
      name: 'cfbd_subscription_last_heartbeat',
      help: 'Unix timestamp of the last subscription event seen in the log',
      registers: [registry],
    }),
  };
}

/**
 * Applies one telemetry log line to the metrics.
 *
 * @returns `false` when the line was skipped as malformed.
 */
export function recordTelemetryLine(
  metrics: ExporterMetrics,
  line: string,
  now: () => number = epochSeconds,
): boolean {
  const entry = parseTelemetryLine(line);
  if (entry === null) return false;

  metrics.requests.inc({ client: entry.client, outcome: entry.outcome });

  if (entry.latency_ms !== undefined) {
    metrics.latency.observe(entry.latency_ms);
  }

  if (entry.retry_count !== undefined && entry.retry_count > 0) {
    metrics.retries.inc({ client: entry.client }, entry.retry_count);
  }

  if (entry.outcome === HEARTBEAT_OUTCOME) {
    metrics.heartbeat.set(now());
  }

  return true;
}
