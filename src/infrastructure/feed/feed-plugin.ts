import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { CfbdSubscriptionManager } from '../../application/index.js';

export interface FeedPluginOptions {
  manager: CfbdSubscriptionManager;
  /** Releases the transport once the subscription is stopped. */
  closeTransport?: (() => Promise<void>) | undefined;
}

/**
 * Fastify plugin that owns the subscription manager's lifecycle.
 *
 * - Decorates `fastify.feed` for use by the feed routes.
 * - On server close, stops the subscription and only then closes the
 *   transport underneath it.
 */
async function feedPlugin(fastify: FastifyInstance, options: FeedPluginOptions): Promise<void> {
  fastify.decorate('feed', options.manager);

  fastify.addHook('onClose', async () => {
    options.manager.stop();
    await options.closeTransport?.();
    fastify.log.info('Scoreboard feed closed');
  });
}

export default fp(feedPlugin, {
  name: 'feed',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.feed` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    feed: CfbdSubscriptionManager;
  }
}
