import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';
import { generateRandomHex } from '../crypto/random.js';

type Env = Record<string, string | undefined>;

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(env: Env, envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      throw new Error(`Could not read ${envVar} from ${filePath}`, { cause: error });
    }
  }

  // Fall back to direct environment variable
  return env[envVar] || undefined;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env['LOG_LEVEL'] ?? 'info';
  if (!isLogLevel(raw)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, silent; got "${raw}"`);
  }
  return raw;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    publicUrl: string;
    requestTimeoutMs: number;
  };
  database: {
    url: string | undefined;
  };
  redis: {
    url: string | undefined;
  };
  amqp: {
    url: string | undefined;
    queue: string;
  };
  secrets: {
    verificationToken: string;
    twoFactorToken: string;
  };
  logging: {
    level: LogLevel;
  };
  tokens: {
    accessTokenTtl: number;
    refreshTokenTtl: number;
    verificationTokenTtl: number;
    scryptCost: number;
  };
  magicLinks: {
    ttl: number;
    redirectUrl: string;
    maxActive: number;
    cleanupGrace: number;
  };
}

/**
 * Signing secret for a purpose namespace. Production refuses to start without
 * it; other environments get a random per-process value.
 */
function requireSecret(env: Env, envVar: string, nodeEnv: string): string {
  const secret = readSecret(env, envVar);
  if (secret) {
    return secret;
  }
  if (nodeEnv === 'production') {
    throw new Error(`${envVar} (or ${envVar}_FILE) must be set in production`);
  }
  return generateRandomHex(32);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const port = readInt(env, 'PORT', 3000);
  const host = env['HOST'] ?? '0.0.0.0';
  const nodeEnv = env['NODE_ENV'] ?? 'development';
  const publicUrl = trimTrailingSlash(
    env['PUBLIC_URL'] ?? `http://${host === '0.0.0.0' ? 'localhost' : host}:${port}`
  );

  return {
    server: {
      port,
      host,
      nodeEnv,
      publicUrl,
      requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', constants.DEFAULT_REQUEST_TIMEOUT_MS),
    },
    database: {
      url: env['DATABASE_URL'] || undefined,
    },
    redis: {
      url: env['REDIS_URL'] || undefined,
    },
    amqp: {
      url: readSecret(env, 'AMQP_URL'),
      queue: env['EMAIL_QUEUE'] ?? constants.DEFAULT_EMAIL_QUEUE,
    },
    secrets: {
      verificationToken: requireSecret(env, 'VERIFICATION_TOKEN_SECRET', nodeEnv),
      twoFactorToken: requireSecret(env, 'TWO_FACTOR_TOKEN_SECRET', nodeEnv),
    },
    logging: {
      level: readLogLevel(env),
    },
    tokens: {
      accessTokenTtl: readInt(env, 'ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt(env, 'REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      verificationTokenTtl: readInt(
        env,
        'VERIFICATION_TOKEN_TTL',
        constants.DEFAULT_VERIFICATION_TOKEN_TTL
      ),
      scryptCost: readInt(env, 'SCRYPT_COST', constants.DEFAULT_SCRYPT_COST),
    },
    magicLinks: {
      ttl: readInt(env, 'MAGIC_LINK_TTL', constants.DEFAULT_MAGIC_LINK_TTL),
      redirectUrl: trimTrailingSlash(env['MAGIC_LINK_REDIRECT_URL'] ?? publicUrl),
      maxActive: readInt(env, 'MAGIC_LINK_MAX_ACTIVE', constants.DEFAULT_MAX_ACTIVE_MAGIC_LINKS),
      cleanupGrace: readInt(
        env,
        'MAGIC_LINK_CLEANUP_GRACE',
        constants.DEFAULT_MAGIC_LINK_CLEANUP_GRACE
      ),
    },
  };
}

// Re-export constants
export { constants };
