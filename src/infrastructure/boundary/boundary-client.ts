import { z } from 'zod';
import type { FanoutPort } from '../../application/index.js';
import { BoundaryConnectionError, EnvelopeValidationError } from '../../domain/index.js';
import type { Envelope, EnvelopeStream, PublishResult } from '../../domain/index.js';
import { RemoteEnvelopeStream } from '../sse/remote-stream.js';
import { bearerHeader } from './credential.js';

const publishResultSchema = z.object({
  delivered: z.number().int().nonnegative(),
  evicted: z.number().int().nonnegative(),
});

const listenerCountSchema = z.object({
  listener_count: z.number().int().nonnegative(),
});

interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

const validationFailureSchema = z.object({
  issues: z.array(z.string()),
});

export interface BoundaryClientOptions {
  /** e.g. http://127.0.0.1:2437 */
  baseUrl: string;
  secret: string;
  /** Applies to publish and listener-count calls, not to open streams. */
  timeoutMs?: number;
}

/**
 * FanoutPort backed by an engine in another process.
 *
 * Anything that goes wrong with the channel itself (refused connection,
 * timeout, rejected credential, unexpected answer) is a
 * BoundaryConnectionError. A rejected envelope is an EnvelopeValidationError,
 * exactly as with a local engine.
 */
export class BoundaryClient implements FanoutPort {
  private readonly baseUrl: string;
  private readonly secret: string;
  private readonly timeoutMs: number;

  constructor(opts: BoundaryClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.secret = opts.secret;
    this.timeoutMs = opts.timeoutMs ?? 5_000;
  }

  async subscribe(): Promise<EnvelopeStream> {
    const controller = new AbortController();
    const response = await this.request('/v1/subscribe', { signal: controller.signal });

    if (!response.body) {
      controller.abort();
      throw new BoundaryConnectionError('Boundary returned an empty event stream');
    }

    return new RemoteEnvelopeStream(response.body, controller);
  }

  async publish(envelope: Envelope): Promise<PublishResult> {
    const response = await this.request('/v1/publish', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(envelope),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 400) {
      const failure = validationFailureSchema.safeParse(await readJson(response));
      throw new EnvelopeValidationError(
        failure.success ? failure.data.issues : ['rejected by the engine'],
      );
    }

    return this.decode(response, publishResultSchema);
  }

  async listenerCount(): Promise<number> {
    const response = await this.request('/v1/listeners', {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const body = await this.decode(response, listenerCountSchema);
    return body.listener_count;
  }

  /**
   * Polls the listener count until the engine answers, for start-up
   * ordering between the two processes. Rethrows the last failure.
   */
  async waitUntilReady(attempts = 20, delayMs = 250): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.listenerCount();
        return;
      } catch (err: unknown) {
        lastError = err;
        if (attempt < attempts) {
          await new Promise((resolve) => setTimeout(resolve, delayMs));
        }
      }
    }
    throw lastError;
  }

  /* ------------------------------------------------------------------ */
  /*  Private                                                           */
  /* ------------------------------------------------------------------ */

  private async request(path: string, init: RequestOptions): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;

    try {
      response = await fetch(url, {
        ...init,
        headers: { ...init.headers, authorization: bearerHeader(this.secret) },
      });
    } catch (err: unknown) {
      throw new BoundaryConnectionError(`Boundary unreachable at ${url}`, { cause: err });
    }

    if (response.status === 401) {
      await response.body?.cancel();
      throw new BoundaryConnectionError('Boundary rejected the shared secret');
    }

    if (!response.ok && response.status !== 400) {
      await response.body?.cancel();
      throw new BoundaryConnectionError(`Boundary answered ${response.status} for ${path}`);
    }

    return response;
  }

  private async decode<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
    const parsed = schema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new BoundaryConnectionError('Boundary sent an unexpected response body');
    }
    return parsed.data;
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (err: unknown) {
    throw new BoundaryConnectionError('Boundary sent malformed JSON', { cause: err });
  }
}
