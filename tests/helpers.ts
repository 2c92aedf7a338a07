import { vi } from 'vitest';
import pino from 'pino';
import type { Logger } from 'pino';
import type { Envelope } from '../src/domain/index.js';
import type { Subscription } from '../src/application/index.js';

/** Real logger that writes nothing. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Minimal fake logger for asserting on log calls. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger & typeof log;
}

/** Reads everything currently queued in a subscription's inbox without waiting. */
export async function readQueued(subscription: Subscription): Promise<Envelope[]> {
  const out: Envelope[] = [];
  while (subscription.pending > 0) {
    const result = await subscription.next();
    if (!result.done) out.push(result.value);
  }
  return out;
}

/** Lets every pending promise callback and I/O callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
