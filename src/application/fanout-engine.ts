import type { Logger } from 'pino';
import { EngineClosedError } from '../domain/index.js';
import type { Envelope, PublishResult } from '../domain/index.js';
import { parseEnvelope } from './envelope-schema.js';
import { SubscriptionRegistry } from './registry.js';
import type { RegistryOptions } from './registry.js';
import type { Subscription } from './subscription.js';

export type FanoutEngineOptions = RegistryOptions;

/**
 * Fan-out engine. Delivers every published envelope to every subscriber
 * registered at publish time.
 *
 * Backpressure policy: delivery is a non-blocking inbox insert. A subscriber
 * whose inbox is full is evicted after the sweep instead of slowing down the
 * publisher or its peers.
 *
 * One instance per process, constructed at start-up and injected into the
 * keep-alive driver, the boundary server and the HTTP layer.
 */
export class FanoutEngine {
  private readonly registry: SubscriptionRegistry;
  private readonly log: Logger;
  private closed = false;

  constructor(log: Logger, options: FanoutEngineOptions = {}) {
    this.log = log;
    this.registry = new SubscriptionRegistry(options);
  }

  /* ------------------------------------------------------------------ */
  /*  Subscribers                                                       */
  /* ------------------------------------------------------------------ */

  subscribe(): Subscription {
    if (this.closed) throw new EngineClosedError();

    const subscription = this.registry.register();
    this.log.debug(
      { subscriptionId: subscription.id, listenerCount: this.registry.count() },
      'Subscriber registered',
    );
    return subscription;
  }

  unsubscribe(id: string): void {
    if (this.registry.remove(id)) {
      this.log.debug(
        { subscriptionId: id, listenerCount: this.registry.count() },
        'Subscriber removed',
      );
    }
  }

  listenerCount(): number {
    return this.registry.count();
  }

  /* ------------------------------------------------------------------ */
  /*  Publish                                                           */
  /* ------------------------------------------------------------------ */

  /**
   * Validates first, so a malformed envelope reaches nobody.
   * Throws EnvelopeValidationError.
   */
  publish(input: Envelope): PublishResult {
    const envelope = parseEnvelope(input);
    const targets = this.registry.snapshot();
    const overflowed: string[] = [];
    let delivered = 0;

    for (const subscription of targets) {
      if (subscription.closed) continue;

      if (subscription.offer(envelope)) {
        delivered++;
      } else {
        overflowed.push(subscription.id);
      }
    }

    for (const id of overflowed) {
      this.registry.remove(id);
    }

    if (overflowed.length > 0) {
      this.log.info(
        {
          category: envelope.category,
          evicted: overflowed.length,
          listenerCount: this.registry.count(),
        },
        'Evicted subscribers with full inboxes',
      );
    }

    return { delivered, evicted: overflowed.length };
  }

  /* ------------------------------------------------------------------ */
  /*  Lifecycle                                                         */
  /* ------------------------------------------------------------------ */

  /** Ends every subscription; later subscribe calls throw EngineClosedError. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const count = this.registry.count();
    this.registry.clear();
    this.log.info({ closedSubscriptions: count }, 'Fan-out engine closed');
  }
}
