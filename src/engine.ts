import pino from 'pino';
import { FanoutEngine, KeepAliveDriver } from './application/index.js';
import {
  buildBoundaryServer,
  listenOnLoopback,
  loadConfig,
  requireBoundarySecret,
} from './infrastructure/index.js';

/**
 * Standalone engine process.
 *
 * Hosts the fan-out engine and its keep-alive driver, and exposes them to
 * the request-handling process (FANOUT_MODE=remote) through the boundary
 * server on the loopback interface. Holds no state beyond the currently
 * open subscriptions.
 */
const config = loadConfig();
const log = pino({ level: config.logLevel });

const engine = new FanoutEngine(log.child({ component: 'engine' }), {
  inboxCapacity: config.inboxCapacity,
  maxSubscribers: config.maxSubscribers,
});

const keepAlive = new KeepAliveDriver(
  engine,
  log.child({ component: 'keep-alive' }),
  config.keepAlive.intervalMs,
);

async function main(): Promise<void> {
  const server = await buildBoundaryServer({
    engine,
    secret: requireBoundarySecret(config),
    logger: { level: config.logLevel },
  });

  server.addHook('onClose', async () => {
    keepAlive.stop();
    engine.close();
  });

  if (config.keepAlive.enabled) keepAlive.start();

  const address = await listenOnLoopback(server, config.boundary.host, config.boundary.port);
  log.info({ address }, 'Fan-out engine serving boundary');

  const shutdown = (): void => {
    log.info('Shutting down engine...');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during engine shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Engine crashed');
  process.exit(1);
});
