import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { Registry } from 'prom-client';

export interface MetricsRoutesOptions {
  registry: Registry;
}

/**
 * Prometheus scrape route.
 *
 * GET /metrics: text exposition of the exporter's registry.
 */
async function metricsRoutes(fastify: FastifyInstance, options: MetricsRoutesOptions): Promise<void> {

  fastify.get('/metrics', async (_request, reply: FastifyReply) => {
    const body = await options.registry.metrics();

    fastify.log.debug('Metrics endpoint hit');

    return reply
      .status(200)
      .header('Content-Type', options.registry.contentType)
      .send(body);
  });
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  fastify: '5.x',
});
