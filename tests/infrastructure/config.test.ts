import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_CONFIG,
  loadConfig,
  requireBoundarySecret,
} from '../../src/infrastructure/config.js';

function issuesOf(env: NodeJS.ProcessEnv): readonly string[] {
  try {
    loadConfig(env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every variable', () => {
    const config = loadConfig({
      HOST: '127.0.0.1',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      FANOUT_MODE: 'remote',
      BOUNDARY_HOST: '::1',
      BOUNDARY_PORT: '9000',
      BOUNDARY_SECRET: 'test-secret',
      KEEPALIVE_ENABLED: 'false',
      KEEPALIVE_INTERVAL_MS: '250',
      INBOX_CAPACITY: '3',
      MAX_SUBSCRIBERS: '10',
    });

    expect(config).toEqual({
      http: { host: '127.0.0.1', port: 8080 },
      logLevel: 'debug',
      mode: 'remote',
      boundary: { host: '::1', port: 9000, secret: 'test-secret' },
      keepAlive: { enabled: false, intervalMs: 250 },
      inboxCapacity: 3,
      maxSubscribers: 10,
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ PORT: '', LOG_LEVEL: '', BOUNDARY_SECRET: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an unknown log level', () => {
    expect(issuesOf({ LOG_LEVEL: 'verbose' })).toHaveLength(1);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ PATH: '/usr/bin', HOME: '/root' })).toEqual(DEFAULT_CONFIG);
  });

  it('refuses a boundary host that is not loopback', () => {
    expect(issuesOf({ BOUNDARY_HOST: '0.0.0.0' })).toEqual([
      'BOUNDARY_HOST: must be a loopback address',
    ]);
  });

  it('requires the shared secret in remote mode', () => {
    expect(issuesOf({ FANOUT_MODE: 'remote' })).toEqual([
      'BOUNDARY_SECRET: required when FANOUT_MODE=remote',
    ]);
  });

  it('rejects a zero inbox capacity', () => {
    expect(issuesOf({ INBOX_CAPACITY: '0' })).toHaveLength(1);
  });

  it('rejects an unknown mode and a non-numeric port', () => {
    const issues = issuesOf({ FANOUT_MODE: 'cluster', PORT: 'http' });
    expect(issues).toHaveLength(2);
    expect(issues.some((issue) => issue.startsWith('PORT:'))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('FANOUT_MODE:'))).toBe(true);
  });
});

describe('requireBoundarySecret', () => {
  it('returns the configured secret', () => {
    const config = loadConfig({ BOUNDARY_SECRET: 'test-secret' });
    expect(requireBoundarySecret(config)).toBe('test-secret');
  });

  it('throws without one', () => {
    expect(() => requireBoundarySecret(DEFAULT_CONFIG)).toThrow(ConfigError);
  });
});
