#!/usr/bin/env node
import Fastify from 'fastify';
import pino from 'pino';
import { Registry, collectDefaultMetrics } from 'prom-client';

import { createExporterMetrics, recordTelemetryLine } from './application/index.js';
import { tailLogFile } from './infrastructure/index.js';
import { metricsRoutes } from './interfaces/http/index.js';
import { parseExporterOptions } from './interfaces/cli/exporter-options.js';

/**
 * Telemetry exporter process.
 *
 * Tails the JSON-lines telemetry log written by the feed service and
 * serves the derived metrics on /metrics. Runs until SIGINT/SIGTERM.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  const options = parseExporterOptions(process.argv.slice(2));

  const registry = new Registry();
  collectDefaultMetrics({ register: registry });
  const metrics = createExporterMetrics(registry);

  const fastify = Fastify({ logger: { level: log.level } });
  await fastify.register(metricsRoutes, { registry });

  // Bind failures reject here and exit non-zero.
  await fastify.listen({ host: '0.0.0.0', port: options.port });

  let skipped = 0;
  await tailLogFile({
    path: options.logFile,
    pollMs: options.pollSeconds * 1000,
    signal: ac.signal,
    log,
    onLine: (line) => {
      if (!recordTelemetryLine(metrics, line)) {
        skipped++;
        log.debug({ skipped }, 'Skipped malformed telemetry line');
      }
    },
  });

  await fastify.close();
}

function shutdown(): void {
  log.info('Shutting down exporter...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Exporter crashed');
  process.exit(1);
});
