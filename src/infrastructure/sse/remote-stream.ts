import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import { BoundaryConnectionError } from '../../domain/index.js';
import type { Envelope, EnvelopeStream } from '../../domain/index.js';
import { SseDecoder } from './framing.js';

/**
 * Reads framed envelopes from an HTTP response body.
 *
 * `close()` aborts the request; a read interrupted that way ends the
 * iteration normally. A server that ends the stream (the remote subscription
 * was evicted or the engine shut down) also ends it normally. Any other
 * transport failure surfaces as BoundaryConnectionError.
 */
export class RemoteEnvelopeStream implements EnvelopeStream {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly controller: AbortController;
  private readonly decoder = new SseDecoder();
  private readonly text = new TextDecoder();
  private readonly ready: Envelope[] = [];
  private done = false;
  private markEnded: () => void = () => {};

  readonly ended: Promise<void>;

  constructor(body: ReadableStream<Uint8Array>, controller: AbortController) {
    this.reader = body.getReader();
    this.controller = controller;
    this.ended = new Promise<void>((resolve) => {
      this.markEnded = resolve;
    });
  }

  async next(): Promise<IteratorResult<Envelope>> {
    for (;;) {
      const queued = this.ready.shift();
      if (queued) return { value: queued, done: false };
      if (this.done) return { value: undefined, done: true };

      let chunk: { done: boolean; value?: Uint8Array };
      try {
        chunk = await this.reader.read();
      } catch (err: unknown) {
        this.finish();
        if (this.controller.signal.aborted) continue;
        throw new BoundaryConnectionError('Event stream interrupted', { cause: err });
      }

      if (chunk.done || !chunk.value) {
        this.finish();
        continue;
      }

      this.ready.push(...this.decoder.push(this.text.decode(chunk.value, { stream: true })));
    }
  }

  close(): void {
    this.finish();
    this.ready.length = 0;
    if (!this.controller.signal.aborted) this.controller.abort();
  }

  private finish(): void {
    this.done = true;
    this.markEnded();
  }

  [Symbol.asyncIterator](): AsyncIterator<Envelope> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
