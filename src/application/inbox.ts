import type { Envelope } from '../domain/index.js';

export const DEFAULT_INBOX_CAPACITY = 5;

/**
 * Bounded single-reader FIFO of envelopes.
 *
 * The engine is the only writer (`offer`), the subscriber's reader loop the
 * only reader (`next`). Writes never wait: an envelope is either handed
 * straight to a parked reader, queued, or refused when the queue is full.
 *
 * Because the event loop runs `offer` and `next` to completion one at a time,
 * the queue and the parked-reader slot never need a lock.
 */
export class Inbox implements AsyncIterable<Envelope> {
  readonly capacity: number;
  private readonly queue: Envelope[] = [];
  private pending: ((result: IteratorResult<Envelope>) => void) | null = null;
  private closed = false;
  private markClosed: () => void = () => {};

  /** Settles on `close()`, while queued envelopes may still be waiting. */
  readonly closedSignal: Promise<void>;

  constructor(capacity: number = DEFAULT_INBOX_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Inbox capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.closedSignal = new Promise<void>((resolve) => {
      this.markClosed = resolve;
    });
  }

  /** Envelopes queued and not yet read. */
  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Non-blocking insert. Returns false when the inbox is full or closed. */
  offer(envelope: Envelope): boolean {
    if (this.closed) return false;

    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve({ value: envelope, done: false });
      return true;
    }

    if (this.queue.length >= this.capacity) return false;

    this.queue.push(envelope);
    return true;
  }

  /**
   * Resolves with the next envelope. Queued envelopes are still handed out
   * after `close()`; once drained the result is `done`.
   */
  next(): Promise<IteratorResult<Envelope>> {
    const value = this.queue.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    if (this.pending) {
      return Promise.reject(new Error('Inbox already has a pending reader'));
    }

    return new Promise<IteratorResult<Envelope>>((resolve) => {
      this.pending = resolve;
    });
  }

  /** Idempotent. Wakes a parked reader with `done`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.markClosed();

    if (this.pending) {
      const resolve = this.pending;
      this.pending = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<Envelope> {
    return {
      next: () => this.next(),
    };
  }
}
