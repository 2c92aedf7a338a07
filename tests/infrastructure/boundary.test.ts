import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { FanoutEngine } from '../../src/application/fanout-engine.js';
import {
  buildBoundaryServer,
  listenOnLoopback,
} from '../../src/infrastructure/boundary/boundary-server.js';
import { BoundaryClient } from '../../src/infrastructure/boundary/boundary-client.js';
import { bearerHeader, isAuthorized } from '../../src/infrastructure/boundary/credential.js';
import {
  BoundaryConnectionError,
  EnvelopeValidationError,
  createEnvelope,
} from '../../src/domain/index.js';
import { readQueued, silentLogger } from '../helpers.js';

const SECRET = 'test-secret';

describe('isAuthorized', () => {
  it('accepts only the exact bearer secret', () => {
    expect(isAuthorized(bearerHeader(SECRET), SECRET)).toBe(true);
    expect(isAuthorized(bearerHeader('other'), SECRET)).toBe(false);
    expect(isAuthorized(SECRET, SECRET)).toBe(false);
    expect(isAuthorized(undefined, SECRET)).toBe(false);
  });

  it('authorizes nothing with an empty secret', () => {
    expect(isAuthorized(bearerHeader(''), '')).toBe(false);
    expect(isAuthorized('Bearer ', '')).toBe(false);
  });
});

describe('boundary server', () => {
  let engine: FanoutEngine;
  let server: FastifyInstance;

  beforeEach(async () => {
    engine = new FanoutEngine(silentLogger());
    server = await buildBoundaryServer({ engine, secret: SECRET });
  });

  afterEach(async () => {
    engine.close();
    await server.close();
  });

  it('answers 401 without the shared secret', async () => {
    const res = await server.inject({ method: 'GET', url: '/v1/listeners' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: 'Invalid boundary credential' });
  });

  it('exposes the listener count', async () => {
    engine.subscribe();

    const res = await server.inject({
      method: 'GET',
      url: '/v1/listeners',
      headers: { authorization: bearerHeader(SECRET) },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ listener_count: 1 });
  });

  it('answers 400 with the issues for a malformed envelope', async () => {
    const res = await server.inject({
      method: 'POST',
      url: '/v1/publish',
      headers: { authorization: bearerHeader(SECRET) },
      payload: { payload: 'x', category: 'bad\u0000' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'Validation failed',
      issues: ['category: category must not contain control characters'],
    });
  });

  it('exposes nothing beyond the three operations', async () => {
    const res = await server.inject({
      method: 'DELETE',
      url: '/v1/listeners',
      headers: { authorization: bearerHeader(SECRET) },
    });

    expect(res.statusCode).toBe(404);
  });

  it('refuses to build without a shared secret', async () => {
    await expect(buildBoundaryServer({ engine, secret: '' })).rejects.toThrow(
      'Boundary server needs a non-empty shared secret',
    );
  });

  it('refuses to listen on a non-loopback address', async () => {
    await expect(listenOnLoopback(server, '0.0.0.0', 0)).rejects.toThrow(
      'Boundary server must bind to a loopback address, got 0.0.0.0',
    );
  });
});

describe('BoundaryClient', () => {
  let engine: FanoutEngine;
  let server: FastifyInstance;
  let client: BoundaryClient;
  let baseUrl: string;

  beforeEach(async () => {
    engine = new FanoutEngine(silentLogger());
    server = await buildBoundaryServer({ engine, secret: SECRET });
    baseUrl = await listenOnLoopback(server, '127.0.0.1', 0);
    client = new BoundaryClient({ baseUrl, secret: SECRET });
  });

  afterEach(async () => {
    engine.close();
    await server.close();
  });

  it('publishes into the remote engine', async () => {
    const local = engine.subscribe();

    const result = await client.publish(createEnvelope('{"x":1}', 'A-q1'));

    expect(result).toEqual({ delivered: 1, evicted: 0 });
    const received = await readQueued(local);
    expect(received[1]).toEqual({ payload: '{"x":1}', category: 'A-q1' });
  });

  it('reads the remote listener count', async () => {
    engine.subscribe();
    engine.subscribe();

    expect(await client.listenerCount()).toBe(2);
  });

  it('turns a rejected envelope into EnvelopeValidationError', async () => {
    const error = await client.publish({ payload: 'a\nb' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EnvelopeValidationError);
    expect(error).toMatchObject({ issues: ['payload: payload must not contain line breaks'] });
  });

  it('reports a wrong secret as a connectivity error', async () => {
    const intruder = new BoundaryClient({ baseUrl, secret: 'wrong-secret' });

    await expect(intruder.listenerCount()).rejects.toThrow(BoundaryConnectionError);
    await expect(intruder.publish(createEnvelope('x'))).rejects.toThrow(
      'Boundary rejected the shared secret',
    );
    await expect(intruder.subscribe()).rejects.toThrow(BoundaryConnectionError);
    expect(engine.listenerCount()).toBe(0);
  });

  it('reports an unreachable engine as a connectivity error', async () => {
    const orphan = new BoundaryClient({ baseUrl: 'http://127.0.0.1:1', secret: SECRET });

    await expect(orphan.listenerCount()).rejects.toThrow(BoundaryConnectionError);
    await expect(orphan.waitUntilReady(2, 10)).rejects.toThrow(BoundaryConnectionError);
  });

  it('waitUntilReady() resolves once the engine answers', async () => {
    await expect(client.waitUntilReady(1, 10)).resolves.toBeUndefined();
  });

  it('streams START and later publishes, and unsubscribes on close', async () => {
    const stream = await client.subscribe();
    const events = stream[Symbol.asyncIterator]();

    expect(await events.next()).toEqual({
      value: { payload: 'connected', category: 'START' },
      done: false,
    });
    expect(engine.listenerCount()).toBe(1);

    await client.publish(createEnvelope('{"nicknames":["Hund"]}', 'NICKNAME'));
    expect(await events.next()).toEqual({
      value: { payload: '{"nicknames":["Hund"]}', category: 'NICKNAME' },
      done: false,
    });

    stream.close();
    expect(await events.next()).toEqual({ value: undefined, done: true });
    await vi.waitFor(() => {
      expect(engine.listenerCount()).toBe(0);
    });
  });

  it('ends the stream normally when the engine drops the subscription', async () => {
    const stream = await client.subscribe();
    const events = stream[Symbol.asyncIterator]();
    await events.next();

    engine.close();

    expect(await events.next()).toEqual({ value: undefined, done: true });
    stream.close();
  });
});
