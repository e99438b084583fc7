import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { connectNotifier, connectStorage, createServices } from './bootstrap.js';

// Load configuration
const config = loadConfig();
const logger = createLogger({ level: config.logging.level, bindings: { service: 'authgate' } });

const storage = connectStorage(config, logger);
const notifier = await connectNotifier(config, logger);
const services = createServices({ config, storage, notifier, logger });

const app = createAuthServer({
  ...services,
  logger,
  requestTimeoutMs: config.server.requestTimeoutMs,
  enableLogging: config.server.nodeEnv !== 'test',
  production: config.server.nodeEnv === 'production',
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('authgate listening', {
      address: info.address,
      port: info.port,
      publicUrl: config.server.publicUrl,
    });
  }
);

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal });
  server.close();
  await storage.close();
  await notifier.close?.();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      }
    );
  });
}
