import Fastify from 'fastify';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest, FastifyServerOptions } from 'fastify';
import { parseEnvelope } from '../../application/index.js';
import type { FanoutEngine } from '../../application/index.js';
import { EngineClosedError, EnvelopeValidationError, SubscriptionLimitError } from '../../domain/index.js';
import type { Subscription } from '../../application/index.js';
import { pipeEnvelopes } from '../sse/stream-response.js';
import { isAuthorized, isLoopbackHost } from './credential.js';

export interface BoundaryRoutesOptions {
  engine: FanoutEngine;
  secret: string;
}

/**
 * The three operations the engine exposes to a request-handling process.
 *
 * GET  /v1/subscribe : event stream of a fresh subscription
 * POST /v1/publish   : fan out one JSON envelope
 * GET  /v1/listeners : current listener count
 *
 * Every request must present the shared secret. Subscription ids never
 * leave this process; the remote side ends its subscription by dropping
 * the connection.
 */
async function boundaryRoutes(
  fastify: FastifyInstance,
  opts: BoundaryRoutesOptions,
): Promise<void> {
  const { engine, secret } = opts;

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    if (!isAuthorized(request.headers.authorization, secret)) {
      request.log.warn({ url: request.url }, 'Boundary request with invalid credential');
      return reply.status(401).send({ error: 'Invalid boundary credential' });
    }
  });

  fastify.get('/v1/subscribe', async (request: FastifyRequest, reply: FastifyReply) => {
    let subscription: Subscription;
    try {
      subscription = engine.subscribe();
    } catch (err: unknown) {
      if (err instanceof SubscriptionLimitError || err instanceof EngineClosedError) {
        return reply.status(503).send({ error: err.message });
      }
      throw err;
    }

    request.log.debug({ subscriptionId: subscription.id }, 'Remote subscriber attached');
    await pipeEnvelopes(subscription, reply);
    request.log.debug({ subscriptionId: subscription.id }, 'Remote subscriber detached');
  });

  fastify.post('/v1/publish', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const result = engine.publish(parseEnvelope(request.body));
      return reply.status(200).send(result);
    } catch (err: unknown) {
      if (err instanceof EnvelopeValidationError) {
        return reply.status(400).send({ error: 'Validation failed', issues: err.issues });
      }
      throw err;
    }
  });

  fastify.get('/v1/listeners', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ listener_count: engine.listenerCount() });
  });
}

export const boundaryRoutesPlugin = fp(boundaryRoutes, {
  name: 'boundary-routes',
  fastify: '5.x',
});

export interface BoundaryServerOptions extends BoundaryRoutesOptions {
  logger?: FastifyServerOptions['logger'];
}

/** Builds (but does not start) the boundary server. Refuses an empty secret. */
export async function buildBoundaryServer(opts: BoundaryServerOptions): Promise<FastifyInstance> {
  if (opts.secret === '') {
    throw new Error('Boundary server needs a non-empty shared secret');
  }

  const app = Fastify({
    logger: opts.logger ?? false,
    // open event streams must not hold up close()
    forceCloseConnections: true,
  });

  await app.register(boundaryRoutesPlugin, { engine: opts.engine, secret: opts.secret });
  return app;
}

/**
 * Starts listening on a loopback address only.
 * @returns the address the server is bound to
 */
export async function listenOnLoopback(
  app: FastifyInstance,
  host: string,
  port: number,
): Promise<string> {
  if (!isLoopbackHost(host)) {
    throw new Error(`Boundary server must bind to a loopback address, got ${host}`);
  }
  return app.listen({ host, port });
}
