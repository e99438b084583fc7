import { randomBytes } from 'node:crypto';
import { REFRESH_TOKEN_LENGTH, SESSION_ID_SUFFIX_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function generateRandomHex(length: number): string {
  return randomBytes(length).toString('hex');
}

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate an opaque refresh token
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Wall-clock time in nanoseconds
 */
function epochNanos(now: Date): bigint {
  return BigInt(now.getTime()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n);
}

/**
 * Generate a magic link session ID
 * Format: sess_<epoch ns>_<user id>_<random hex>
 */
export function generateSessionId(userId: number, now: Date = new Date()): string {
  return `sess_${epochNanos(now)}_${userId}_${generateRandomHex(SESSION_ID_SUFFIX_LENGTH)}`;
}
