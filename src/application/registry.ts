import { randomUUID } from 'node:crypto';
import { START_ENVELOPE, SubscriptionLimitError } from '../domain/index.js';
import { DEFAULT_INBOX_CAPACITY, Inbox } from './inbox.js';
import { Subscription } from './subscription.js';

export const DEFAULT_MAX_SUBSCRIBERS = 1000;

export interface RegistryOptions {
  inboxCapacity?: number;
  maxSubscribers?: number;
}

/**
 * The set of live subscriptions, keyed by id.
 *
 * `snapshot()` copies the current members, so registrations and removals
 * made while a publish walks the array never disturb that walk, and a
 * subscriber registered mid-sweep does not receive the in-flight envelope.
 */
export class SubscriptionRegistry {
  private readonly entries: Map<string, Subscription> = new Map();
  private readonly inboxCapacity: number;
  private readonly maxSubscribers: number;

  constructor(options: RegistryOptions = {}) {
    this.inboxCapacity = options.inboxCapacity ?? DEFAULT_INBOX_CAPACITY;
    this.maxSubscribers = options.maxSubscribers ?? DEFAULT_MAX_SUBSCRIBERS;
  }

  /**
   * Creates a subscription whose inbox already holds START, then makes it
   * visible. Throws SubscriptionLimitError when the registry is full.
   */
  register(): Subscription {
    if (this.entries.size >= this.maxSubscribers) {
      throw new SubscriptionLimitError(this.maxSubscribers);
    }

    const inbox = new Inbox(this.inboxCapacity);
    inbox.offer(START_ENVELOPE);

    let id = randomUUID();
    while (this.entries.has(id)) id = randomUUID();

    const subscription = new Subscription(id, inbox, (key) => {
      this.remove(key);
    });
    this.entries.set(id, subscription);
    return subscription;
  }

  /** Idempotent. Returns true only when an entry was actually removed. */
  remove(id: string): boolean {
    const subscription = this.entries.get(id);
    if (!subscription) return false;

    this.entries.delete(id);
    subscription.end();
    return true;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  snapshot(): readonly Subscription[] {
    return Array.from(this.entries.values());
  }

  count(): number {
    return this.entries.size;
  }

  /** Ends every subscription. */
  clear(): void {
    for (const id of Array.from(this.entries.keys())) {
      this.remove(id);
    }
  }
}
