import { loadConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { connectNotifier, connectStorage, createServices } from './bootstrap.js';

/**
 * One-shot maintenance job: purge magic links that expired past the grace
 * period. Meant to be run by an external scheduler such as cron.
 */
const config = loadConfig();
const logger = createLogger({ level: config.logging.level, bindings: { service: 'authgate-cleanup' } });

const storage = connectStorage(config, logger);
const notifier = await connectNotifier(config, logger);
const { twoFactor } = createServices({ config, storage, notifier, logger });

try {
  const deleted = await twoFactor.cleanupExpired({
    signal: AbortSignal.timeout(config.server.requestTimeoutMs * 10),
  });
  logger.info('Cleanup finished', { deleted });
} catch (error) {
  logger.error('Cleanup failed', { error });
  process.exitCode = 1;
} finally {
  await storage.close();
  await notifier.close?.();
}
