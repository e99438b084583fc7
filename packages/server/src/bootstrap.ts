import type { Config } from './config/index.js';
import type { Clock } from './types/index.js';
import { systemClock } from './types/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { Notifier } from './notifier/notifier.js';
import type { Logger } from './logging/logger.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createPostgresStorage } from './storage/postgres/index.js';
import { createRedisEphemeralStore } from './storage/redis/index.js';
import { AmqpNotifier } from './notifier/amqp-notifier.js';
import { MemoryNotifier } from './notifier/memory-notifier.js';
import { TokenCodec } from './crypto/token-codec.js';
import { generateRandomHex } from './crypto/random.js';
import { AuthService } from './services/auth-service.js';
import { EmailVerificationService } from './services/email-verification-service.js';
import { TwoFactorService } from './services/two-factor-service.js';

export interface Services {
  codec: TokenCodec;
  auth: AuthService;
  emailVerification: EmailVerificationService;
  twoFactor: TwoFactorService;
}

export interface ServiceDependencies {
  config: Config;
  storage: IStorage;
  notifier: Notifier;
  logger: Logger;
  clock?: Clock;
}

/**
 * Wire the core services from config and their collaborators
 */
export function createServices(deps: ServiceDependencies): Services {
  const { config, storage, notifier, logger, clock = systemClock } = deps;

  const codec = new TokenCodec(
    {
      email_verification: config.secrets.verificationToken,
      '2fa': config.secrets.twoFactorToken,
    },
    clock
  );

  const auth = new AuthService({
    credentials: storage.credentials,
    codec,
    logger,
    clock,
    accessTokenTtl: config.tokens.accessTokenTtl,
    refreshTokenTtl: config.tokens.refreshTokenTtl,
    scryptCost: config.tokens.scryptCost,
  });

  const emailVerification = new EmailVerificationService({
    codec,
    notifier,
    verificationLookup: auth,
    logger,
    publicUrl: config.server.publicUrl,
    ttl: config.tokens.verificationTokenTtl,
    clock,
  });

  const twoFactor = new TwoFactorService({
    magicLinks: storage.magicLinks,
    ephemeral: storage.ephemeral,
    codec,
    notifier,
    logger,
    redirectUrl: config.magicLinks.redirectUrl,
    clock,
    ttl: config.magicLinks.ttl,
    maxActive: config.magicLinks.maxActive,
    cleanupGrace: config.magicLinks.cleanupGrace,
  });

  return { codec, auth, emailVerification, twoFactor };
}

/**
 * PostgreSQL (+ Redis when configured) if DATABASE_URL is set, memory otherwise
 */
export function connectStorage(config: Config, logger: Logger): IStorage {
  const ephemeral = config.redis.url ? createRedisEphemeralStore(config.redis.url, logger) : undefined;

  if (config.database.url) {
    logger.info('Using PostgreSQL storage', { redis: Boolean(ephemeral) });
    return createPostgresStorage({ databaseUrl: config.database.url, logger, ephemeral });
  }

  logger.warn('Using in-memory storage (no DATABASE_URL configured); data is lost on restart');
  const storage = createMemoryStorage({
    apps: [{ id: 1, name: 'default_app', secret: generateRandomHex(32) }],
  });
  if (!ephemeral) {
    return storage;
  }
  return {
    ...storage,
    ephemeral,
    close: async () => {
      await ephemeral.close();
    },
  };
}

export type ClosableNotifier = Notifier & { close?(): Promise<void> };

/**
 * AMQP publisher if AMQP_URL is set, an in-memory recorder otherwise
 */
export async function connectNotifier(config: Config, logger: Logger): Promise<ClosableNotifier> {
  if (config.amqp.url) {
    logger.info('Publishing emails over AMQP', { queue: config.amqp.queue });
    return AmqpNotifier.connect({ url: config.amqp.url, queue: config.amqp.queue, logger });
  }

  logger.warn('No AMQP_URL configured; emails are kept in memory');
  return new MemoryNotifier(logger);
}
