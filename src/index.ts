import pino from 'pino';
import {
  AudienceStore,
  FanoutEngine,
  KeepAliveDriver,
  createLocalFanoutPort,
} from './application/index.js';
import type { FanoutPort } from './application/index.js';
import { BoundaryClient, loadConfig } from './infrastructure/index.js';
import { buildApp } from './interfaces/http/index.js';

/**
 * Bootstrap the request-handling process.
 *
 * Order:
 * 1) Config
 * 2) Fan-out port: local engine + keep-alive, or the remote boundary client
 * 3) HTTP app + shutdown hook
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Fan-out port
  // --------------------------------------------------

  let fanout: FanoutPort;
  let engine: FanoutEngine | null = null;
  let keepAlive: KeepAliveDriver | null = null;

  if (config.mode === 'remote') {
    const client = new BoundaryClient({
      baseUrl: `http://${config.boundary.host}:${config.boundary.port}`,
      secret: config.boundary.secret,
    });
    await client.waitUntilReady();
    log.info({ boundary: config.boundary.host, port: config.boundary.port }, 'Connected to fan-out engine');
    fanout = client;
  } else {
    engine = new FanoutEngine(log.child({ component: 'engine' }), {
      inboxCapacity: config.inboxCapacity,
      maxSubscribers: config.maxSubscribers,
    });
    if (config.keepAlive.enabled) {
      keepAlive = new KeepAliveDriver(engine, log.child({ component: 'keep-alive' }), config.keepAlive.intervalMs);
      keepAlive.start();
    }
    fanout = createLocalFanoutPort(engine);
    log.info('Fan-out engine running in-process');
  }

  // --------------------------------------------------
  // HTTP
  // --------------------------------------------------

  const fastify = await buildApp({
    fanout,
    audience: new AudienceStore(),
    logger: { level: config.logLevel },
  });

  fastify.addHook('onClose', async () => {
    keepAlive?.stop();
    engine?.close();
  });

  await fastify.listen({ host: config.http.host, port: config.http.port });

  const shutdown = (): void => {
    log.info('Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
