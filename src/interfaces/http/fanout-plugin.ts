import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AudienceStore, FanoutPort } from '../../application/index.js';

export interface FanoutPluginOptions {
  fanout: FanoutPort;
  audience: AudienceStore;
}

/**
 * Fastify plugin that hands the fan-out port and the audience store to the
 * route plugins.
 *
 * - Decorates `fastify.fanout` and `fastify.audience`.
 * - Owns neither: the process entry point creates and tears them down.
 */
async function fanoutPlugin(fastify: FastifyInstance, opts: FanoutPluginOptions): Promise<void> {
  fastify.decorate('fanout', opts.fanout);
  fastify.decorate('audience', opts.audience);
}

export default fp(fanoutPlugin, {
  name: 'fanout',
  fastify: '5.x',
});

/** Extend Fastify's type system so the decorations are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    fanout: FanoutPort;
    audience: AudienceStore;
  }
}
