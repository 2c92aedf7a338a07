import { createHash, timingSafeEqual } from 'node:crypto';

const BEARER = 'Bearer ';

export function bearerHeader(secret: string): string {
  return `${BEARER}${secret}`;
}

/**
 * Constant-time check of an `Authorization: Bearer <secret>` header.
 * Both sides are hashed first so their lengths always match. An empty
 * secret authorizes nothing.
 */
export function isAuthorized(header: string | undefined, secret: string): boolean {
  if (secret === '' || !header || !header.startsWith(BEARER)) return false;

  const presented = createHash('sha256').update(header.slice(BEARER.length)).digest();
  const expected = createHash('sha256').update(secret).digest();
  return timingSafeEqual(presented, expected);
}

const LOOPBACK_HOSTS = new Set(['127.0.0.1', '::1', 'localhost']);

export function isLoopbackHost(host: string): boolean {
  return LOOPBACK_HOSTS.has(host) || /^127\.\d{1,3}\.\d{1,3}\.\d{1,3}$/.test(host);
}
