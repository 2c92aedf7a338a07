import type { Envelope, EnvelopeStream } from '../domain/index.js';
import type { Inbox } from './inbox.js';

/**
 * One subscriber: an opaque id plus its private inbox.
 *
 * The id is only a registry key. `close()` asks the owner to drop the
 * subscription; the owner then calls `end()`, which closes the inbox so a
 * waiting reader finishes.
 */
export class Subscription implements EnvelopeStream {
  readonly id: string;
  private readonly inbox: Inbox;
  private readonly release: (id: string) => void;

  constructor(id: string, inbox: Inbox, release: (id: string) => void) {
    this.id = id;
    this.inbox = inbox;
    this.release = release;
  }

  get closed(): boolean {
    return this.inbox.isClosed;
  }

  /** Settles when the subscription is removed, by eviction or by `close()`. */
  get ended(): Promise<void> {
    return this.inbox.closedSignal;
  }

  /** Envelopes waiting to be read. */
  get pending(): number {
    return this.inbox.size;
  }

  offer(envelope: Envelope): boolean {
    return this.inbox.offer(envelope);
  }

  next(): Promise<IteratorResult<Envelope>> {
    return this.inbox.next();
  }

  /** Unsubscribe. Safe to call any number of times. */
  close(): void {
    this.release(this.id);
  }

  /** Called by the registry once the entry is gone. */
  end(): void {
    this.inbox.close();
  }

  /** Leaving a `for await` loop early unsubscribes. */
  [Symbol.asyncIterator](): AsyncIterator<Envelope> {
    return {
      next: () => this.inbox.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
