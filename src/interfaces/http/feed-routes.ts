import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { DEFAULT_EVENT_LIMIT } from '../../application/index.js';

const MAX_LIMIT = 1000;

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for non-integers.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Live scoreboard feed routes.
 *
 * GET  /api/v1/feed/events  most recent buffered records
 * GET  /api/v1/feed/status  subscription state and buffer fill
 * POST /api/v1/feed/start   open the subscription (idempotent)
 * POST /api/v1/feed/stop    close the subscription (idempotent)
 */
async function feedRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/feed/events',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);

      if (limit !== undefined && (Number.isNaN(limit) || limit < 1 || limit > MAX_LIMIT)) {
        return reply
          .status(400)
          .send({ error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
      }

      const events = fastify.feed.latestEvents(limit ?? DEFAULT_EVENT_LIMIT);
      return reply.status(200).send({ count: events.length, events });
    },
  );

  fastify.get('/api/v1/feed/status', async (_request, reply) => {
    return reply.status(200).send(fastify.feed.status());
  });

  fastify.post('/api/v1/feed/start', async (_request, reply) => {
    fastify.feed.startFeed();
    return reply.status(202).send({ active: fastify.feed.active });
  });

  fastify.post('/api/v1/feed/stop', async (_request, reply) => {
    fastify.feed.stop();
    return reply.status(202).send({ active: fastify.feed.active });
  });
}

export default fp(feedRoutes, {
  name: 'feed-routes',
  dependencies: ['feed'],
  fastify: '5.x',
});
