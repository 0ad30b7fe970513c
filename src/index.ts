import Fastify from 'fastify';
import pino from 'pino';

import { CfbdSubscriptionManager } from './application/index.js';
import {
  loadFeedConfig,
  feedPlugin,
  resolveGraphQLTransport,
  createJsonlTelemetrySink,
} from './infrastructure/index.js';
import { feedRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the live feed service.
 *
 * Order:
 * 1) Config + logger
 * 2) Transport, telemetry sink, subscription manager
 * 3) Fastify plugins and routes
 * 4) Register signal handlers
 * 5) listen(), then open the subscription
 */
async function main(): Promise<void> {
  const config = loadFeedConfig();
  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Feed
  // --------------------------------------------------

  const transport = resolveGraphQLTransport(config, log);
  const telemetryHook = createJsonlTelemetrySink(config.telemetryLogFile, log);

  const manager = new CfbdSubscriptionManager({
    transport,
    telemetryHook,
    maxEvents: config.maxEvents,
    log,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = Fastify({ logger: { level: config.logLevel } });

  await fastify.register(feedPlugin, {
    manager,
    closeTransport: async () => {
      await transport?.close();
    },
  });
  await fastify.register(feedRoutes);

  const shutdown = (): void => {
    log.info('Shutting down feed service...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({ host: config.host, port: config.port });

  manager.startFeed();
  log.info(
    { maxEvents: config.maxEvents, telemetryLogFile: config.telemetryLogFile },
    'Scoreboard feed service ready',
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start feed service', err);
  process.exit(1);
});
