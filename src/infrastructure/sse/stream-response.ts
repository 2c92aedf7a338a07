import type { ServerResponse } from 'node:http';
import type { FastifyReply } from 'fastify';
import type { EnvelopeStream } from '../../domain/index.js';
import { formatEnvelope } from './framing.js';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  // nginx would otherwise buffer the stream
  'X-Accel-Buffering': 'no',
} as const;

/**
 * Streams envelopes to a long-lived HTTP response until either side ends.
 *
 * Takes the response over from Fastify (`hijack`), so nothing must be sent
 * through `reply` afterwards. The stream is closed when the client goes away;
 * when the stream ends first (eviction, shutdown) the response is ended.
 *
 * Nothing is pulled from the stream while the socket buffer is full, so a
 * client that stops reading lets its inbox fill up and gets evicted. A
 * connection evicted in that state is destroyed instead of flushed.
 */
export async function pipeEnvelopes(stream: EnvelopeStream, reply: FastifyReply): Promise<void> {
  reply.hijack();
  const res = reply.raw;

  res.writeHead(200, SSE_HEADERS);
  res.on('close', () => {
    stream.close();
  });

  let stalled = false;
  try {
    for await (const envelope of stream) {
      if (res.destroyed) break;
      if (!res.write(formatEnvelope(envelope)) && !(await drained(res, stream.ended))) {
        stalled = true;
        break;
      }
    }
  } finally {
    stream.close();
    if (stalled) res.destroy();
    else if (!res.writableEnded) res.end();
  }
}

/** Resolves true on 'drain', false if the response closes or the stream ends first. */
function drained(res: ServerResponse, ended: Promise<void>): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const settle = (value: boolean): void => {
      res.off('drain', onDrain);
      res.off('close', onStop);
      resolve(value);
    };
    const onDrain = (): void => settle(true);
    const onStop = (): void => settle(false);

    res.on('drain', onDrain);
    res.on('close', onStop);
    void ended.then(onStop);
  });
}
