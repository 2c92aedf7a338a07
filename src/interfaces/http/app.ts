import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { AudienceStore, FanoutPort } from '../../application/index.js';
import fanoutPlugin from './fanout-plugin.js';
import streamRoutes from './stream-routes.js';
import audienceRoutes from './audience-routes.js';

export interface AppOptions {
  fanout: FanoutPort;
  audience: AudienceStore;
  logger?: FastifyServerOptions['logger'];
}

/**
 * Builds the request-handling HTTP app without starting it.
 *
 * Order:
 * 1) Fan-out port + audience store decorators
 * 2) Routes
 */
export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: opts.logger ?? false,
    // event streams never finish on their own
    forceCloseConnections: true,
  });

  fastify.addHook('onRequest', async (request) => {
    const forwarded = request.headers['x-forwarded-for'];
    request.log.debug(
      { method: request.method, url: request.url, client: forwarded ?? request.ip },
      'Request received',
    );
  });

  await fastify.register(fanoutPlugin, { fanout: opts.fanout, audience: opts.audience });
  await fastify.register(streamRoutes);
  await fastify.register(audienceRoutes);

  return fastify;
}
