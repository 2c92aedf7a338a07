import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  BoundaryConnectionError,
  EngineClosedError,
  PING_CATEGORY,
  SubscriptionLimitError,
  createEnvelope,
} from '../../domain/index.js';
import type { EnvelopeStream } from '../../domain/index.js';
import { pipeEnvelopes } from '../../infrastructure/sse/stream-response.js';

export const SERVICE_VERSION = '0.1.0';

/** Errors that mean "the engine cannot serve this right now". */
export function isUnavailable(
  err: unknown,
): err is BoundaryConnectionError | SubscriptionLimitError | EngineClosedError {
  return (
    err instanceof BoundaryConnectionError ||
    err instanceof SubscriptionLimitError ||
    err instanceof EngineClosedError
  );
}

/**
 * Registers the event stream and its operational routes.
 *
 * GET /events  : text/event-stream of a new subscription
 * GET /ping    : publish a manual PING
 * GET /counts  : current listener count
 * GET /health  : liveness of this process
 */
async function streamRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'healthy', version: SERVICE_VERSION });
  });

  /**
   * Long-lived stream. Starts with the START block, then every envelope
   * published while the connection stays open. Ends when the client leaves
   * or the subscription is evicted.
   */
  fastify.get('/events', async (request: FastifyRequest, reply: FastifyReply) => {
    let stream: EnvelopeStream;
    try {
      stream = await fastify.fanout.subscribe();
    } catch (err: unknown) {
      if (isUnavailable(err)) {
        request.log.warn({ err }, 'Subscribe failed');
        return reply.status(503).send({ error: 'Event stream unavailable' });
      }
      throw err;
    }

    await pipeEnvelopes(stream, reply);
  });

  fastify.get('/ping', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      await fastify.fanout.publish(createEnvelope('Pinged', PING_CATEGORY));
    } catch (err: unknown) {
      if (isUnavailable(err)) {
        request.log.error({ err }, 'Ping publish failed');
        return reply.status(503).send({ error: 'Engine unavailable' });
      }
      throw err;
    }
    return reply.type('text/plain').send('Pinged\n');
  });

  fastify.get('/counts', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const listenerCount = await fastify.fanout.listenerCount();
      return reply.status(200).send({ listener_count: listenerCount });
    } catch (err: unknown) {
      if (!isUnavailable(err)) throw err;
      request.log.error({ err }, 'Failed to get listener count');
      return reply.status(503).send({ error: err.message });
    }
  });
}

export default fp(streamRoutes, {
  name: 'stream-routes',
  dependencies: ['fanout'],
  fastify: '5.x',
});
