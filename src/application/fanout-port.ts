import type { Envelope, EnvelopeStream, PublishResult } from '../domain/index.js';
import type { FanoutEngine } from './fanout-engine.js';

/**
 * What the request-handling layer needs from the engine, whether it runs
 * in the same process or behind the loopback boundary.
 *
 * Subscription ids stay with the engine: a caller only gets a stream and
 * ends it with `close()`.
 */
export interface FanoutPort {
  subscribe(): Promise<EnvelopeStream>;
  publish(envelope: Envelope): Promise<PublishResult>;
  listenerCount(): Promise<number>;
}

/** Adapts an engine living in this process to the async port. */
export function createLocalFanoutPort(engine: FanoutEngine): FanoutPort {
  return {
    subscribe: async () => engine.subscribe(),
    publish: async (envelope) => engine.publish(envelope),
    listenerCount: async () => engine.listenerCount(),
  };
}
