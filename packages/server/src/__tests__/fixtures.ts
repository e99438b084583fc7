import type { Clock } from '../types/index.js';
import type { App } from '../types/app.js';
import { createLogger, type Logger, type LogLevel } from '../logging/logger.js';
import { TokenCodec } from '../crypto/token-codec.js';

/**
 * Shared test fixtures
 */

export const T0 = new Date('2026-01-01T00:00:00.000Z');
export const T0_SECONDS = 1767225600;

export const TEST_SECRETS = {
  verification: 'test-verification-secret',
  twoFactor: 'test-2fa-secret',
  app: 'test-app-secret',
};

export const TEST_APP: App = { id: 1, name: 'test_app', secret: TEST_SECRETS.app };

// Cheapest scrypt cost that is still a power of two above 1
export const TEST_SCRYPT_COST = 1024;

export interface FakeClock {
  now: Clock;
  advance(seconds: number): void;
  set(date: Date): void;
}

export function createFakeClock(start: Date = T0): FakeClock {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    advance: (seconds) => {
      current = new Date(current.getTime() + seconds * 1000);
    },
    set: (date) => {
      current = new Date(date);
    },
  };
}

export function createTestCodec(clock: Clock): TokenCodec {
  return new TokenCodec(
    {
      email_verification: TEST_SECRETS.verification,
      '2fa': TEST_SECRETS.twoFactor,
    },
    clock
  );
}

export interface LogLine {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  [field: string]: unknown;
}

/**
 * Logger that keeps every line for assertions
 */
export function createRecordingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level: 'debug',
    sink: (level, line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
        lines.push({ ...parsed, level, message: parsed.message });
      }
    },
  });
  return { logger, lines };
}

/**
 * Pull the token query parameter out of an emailed link
 */
export function tokenFromLink(link: string): string {
  const token = new URL(link).searchParams.get('token');
  if (!token) {
    throw new Error(`No token in link: ${link}`);
  }
  return token;
}

export function abortedSignal(): AbortSignal {
  const controller = new AbortController();
  controller.abort();
  return controller.signal;
}
