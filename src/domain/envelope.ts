/**
 * Core domain types for the fan-out event model.
 *
 * An envelope is the unit of delivery: one payload plus an optional
 * category that becomes the `event:` line of the text event stream.
 * These types carry no framework dependencies.
 */

export interface Envelope {
  readonly payload: string;
  readonly category?: string;
}

/** Sent once to every new subscription, ahead of anything published. */
export const START_CATEGORY = 'START';
export const START_PAYLOAD = 'connected';

/** Keep-alive category shared by the periodic driver and the manual ping route. */
export const PING_CATEGORY = 'PING';
export const KEEPALIVE_PAYLOAD = 'keep-alive';

/** Builds a frozen envelope; the same instance is shared by every inbox. */
export function createEnvelope(payload: string, category?: string): Envelope {
  return Object.freeze(category === undefined ? { payload } : { payload, category });
}

export const START_ENVELOPE: Envelope = createEnvelope(START_PAYLOAD, START_CATEGORY);

/**
 * Anything a reader can pull envelopes from until it ends.
 *
 * `close()` releases the underlying subscription; it is idempotent and
 * makes a pending iteration finish instead of waiting forever.
 * `ended` settles once the stream is closed or dropped by its source;
 * envelopes that were already queued may still be read after that.
 */
export interface EnvelopeStream extends AsyncIterable<Envelope> {
  readonly ended: Promise<void>;
  close(): void;
}

/** Outcome of one fan-out sweep. */
export interface PublishResult {
  readonly delivered: number;
  readonly evicted: number;
}
