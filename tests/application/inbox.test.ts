import { describe, it, expect } from 'vitest';
import { Inbox } from '../../src/application/inbox.js';
import { createEnvelope } from '../../src/domain/index.js';

const a = createEnvelope('a');
const b = createEnvelope('b');
const c = createEnvelope('c');

describe('Inbox', () => {
  it('rejects a non-positive or fractional capacity', () => {
    expect(() => new Inbox(0)).toThrow(RangeError);
    expect(() => new Inbox(1.5)).toThrow(RangeError);
  });

  it('defaults to five slots', () => {
    expect(new Inbox().capacity).toBe(5);
  });

  it('refuses offers once full without blocking', () => {
    const inbox = new Inbox(2);
    expect(inbox.offer(a)).toBe(true);
    expect(inbox.offer(b)).toBe(true);
    expect(inbox.offer(c)).toBe(false);
    expect(inbox.size).toBe(2);
  });

  it('hands envelopes out in FIFO order', async () => {
    const inbox = new Inbox(3);
    inbox.offer(a);
    inbox.offer(b);
    inbox.offer(c);

    expect((await inbox.next()).value).toBe(a);
    expect((await inbox.next()).value).toBe(b);
    expect((await inbox.next()).value).toBe(c);
  });

  it('gives an offer straight to a parked reader', async () => {
    const inbox = new Inbox(1);
    const waiting = inbox.next();

    expect(inbox.offer(a)).toBe(true);
    expect(inbox.size).toBe(0);
    expect(await waiting).toEqual({ value: a, done: false });
  });

  it('frees the slot once read', async () => {
    const inbox = new Inbox(1);
    inbox.offer(a);
    expect(inbox.offer(b)).toBe(false);

    await inbox.next();
    expect(inbox.offer(b)).toBe(true);
  });

  it('wakes a parked reader with done on close', async () => {
    const inbox = new Inbox(1);
    const waiting = inbox.next();

    inbox.close();

    expect(await waiting).toEqual({ value: undefined, done: true });
  });

  it('still hands out queued envelopes after close, then ends', async () => {
    const inbox = new Inbox(2);
    inbox.offer(a);
    inbox.close();

    expect(await inbox.next()).toEqual({ value: a, done: false });
    expect(await inbox.next()).toEqual({ value: undefined, done: true });
  });

  it('refuses offers after close', () => {
    const inbox = new Inbox(2);
    inbox.close();
    inbox.close();

    expect(inbox.isClosed).toBe(true);
    expect(inbox.offer(a)).toBe(false);
  });

  it('allows only one parked reader', async () => {
    const inbox = new Inbox(1);
    const first = inbox.next();

    await expect(inbox.next()).rejects.toThrow('Inbox already has a pending reader');

    inbox.close();
    await first;
  });

  it('is async iterable until closed', async () => {
    const inbox = new Inbox(3);
    inbox.offer(a);
    inbox.offer(b);
    inbox.close();

    const seen: string[] = [];
    for await (const envelope of inbox) {
      seen.push(envelope.payload);
    }
    expect(seen).toEqual(['a', 'b']);
  });

  it('settles closedSignal on close, before queued envelopes are read', async () => {
    const inbox = new Inbox(2);
    inbox.offer(a);
    let settled = false;
    void inbox.closedSignal.then(() => {
      settled = true;
    });

    await Promise.resolve();
    expect(settled).toBe(false);

    inbox.close();
    await inbox.closedSignal;
    expect(settled).toBe(true);
    expect((await inbox.next()).value).toBe(a);
  });
});
