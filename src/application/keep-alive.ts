import type { Logger } from 'pino';
import { KEEPALIVE_PAYLOAD, PING_CATEGORY, createEnvelope } from '../domain/index.js';
import type { PublishResult } from '../domain/index.js';
import type { FanoutEngine } from './fanout-engine.js';

export const DEFAULT_KEEPALIVE_INTERVAL_MS = 1_000;

const KEEPALIVE_ENVELOPE = createEnvelope(KEEPALIVE_PAYLOAD, PING_CATEGORY);

/**
 * Periodically publishes a PING envelope so proxies and load balancers keep
 * idle subscriber connections open.
 *
 * Goes through the ordinary publish path, so a subscriber that stopped
 * reading is evicted by keep-alive traffic alone.
 */
export class KeepAliveDriver {
  private readonly engine: Pick<FanoutEngine, 'publish'>;
  private readonly log: Logger;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    engine: Pick<FanoutEngine, 'publish'>,
    log: Logger,
    intervalMs: number = DEFAULT_KEEPALIVE_INTERVAL_MS,
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Keep-alive interval must be positive, got ${intervalMs}`);
    }
    this.engine = engine;
    this.log = log;
    this.intervalMs = intervalMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    this.timer.unref();

    this.log.info({ intervalMs: this.intervalMs }, 'Keep-alive driver started');
  }

  /** One keep-alive publish. Failures are logged; the timer keeps running. */
  tick(): PublishResult | null {
    try {
      const result = this.engine.publish(KEEPALIVE_ENVELOPE);
      this.log.debug({ ...result }, 'Keep-alive sent');
      return result;
    } catch (err: unknown) {
      this.log.warn({ err }, 'Keep-alive publish failed');
      return null;
    }
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info('Keep-alive driver stopped');
  }
}
