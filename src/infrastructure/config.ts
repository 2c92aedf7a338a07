import { z } from 'zod';
import { isLoopbackHost } from './boundary/credential.js';

export type FanoutMode = 'in-process' | 'remote';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Runtime configuration, read from environment variables.
 */
export interface AppConfig {
  http: { host: string; port: number };
  logLevel: LogLevel;
  mode: FanoutMode;
  boundary: { host: string; port: number; secret: string };
  keepAlive: { enabled: boolean; intervalMs: number };
  inboxCapacity: number;
  maxSubscribers: number;
}

/**
 * Defaults: the engine runs in-process with a one-second keep-alive and
 * five envelopes per inbox.
 */
export const DEFAULT_CONFIG: AppConfig = {
  http: { host: '0.0.0.0', port: 5050 },
  logLevel: 'info',
  mode: 'in-process',
  boundary: { host: '127.0.0.1', port: 2437, secret: '' },
  keepAlive: { enabled: true, intervalMs: 1_000 },
  inboxCapacity: 5,
  maxSubscribers: 1_000,
};

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const port = z.coerce.number().int().min(0).max(65_535);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z
  .object({
    HOST: z.string().min(1).default(DEFAULT_CONFIG.http.host),
    PORT: port.default(DEFAULT_CONFIG.http.port),
    LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
    FANOUT_MODE: z.enum(['in-process', 'remote']).default(DEFAULT_CONFIG.mode),
    BOUNDARY_HOST: z
      .string()
      .refine(isLoopbackHost, { message: 'must be a loopback address' })
      .default(DEFAULT_CONFIG.boundary.host),
    BOUNDARY_PORT: port.default(DEFAULT_CONFIG.boundary.port),
    BOUNDARY_SECRET: z.string().default(DEFAULT_CONFIG.boundary.secret),
    KEEPALIVE_ENABLED: flag.default('true'),
    KEEPALIVE_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_CONFIG.keepAlive.intervalMs),
    INBOX_CAPACITY: z.coerce.number().int().min(1).max(1_000).default(DEFAULT_CONFIG.inboxCapacity),
    MAX_SUBSCRIBERS: z.coerce.number().int().positive().default(DEFAULT_CONFIG.maxSubscribers),
  })
  .superRefine((env, ctx) => {
    if (env.FANOUT_MODE === 'remote' && env.BOUNDARY_SECRET === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BOUNDARY_SECRET'],
        message: 'required when FANOUT_MODE=remote',
      });
    }
  });

/**
 * Parses the environment into an AppConfig.
 *
 * Unset or empty variables fall back to DEFAULT_CONFIG; anything set but
 * invalid throws ConfigError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    http: { host: e.HOST, port: e.PORT },
    logLevel: e.LOG_LEVEL,
    mode: e.FANOUT_MODE,
    boundary: { host: e.BOUNDARY_HOST, port: e.BOUNDARY_PORT, secret: e.BOUNDARY_SECRET },
    keepAlive: { enabled: e.KEEPALIVE_ENABLED, intervalMs: e.KEEPALIVE_INTERVAL_MS },
    inboxCapacity: e.INBOX_CAPACITY,
    maxSubscribers: e.MAX_SUBSCRIBERS,
  };
}

/** The engine process always needs the shared secret, whatever the mode. */
export function requireBoundarySecret(config: AppConfig): string {
  if (config.boundary.secret === '') {
    throw new ConfigError(['BOUNDARY_SECRET: required to start the engine process']);
  }
  return config.boundary.secret;
}
