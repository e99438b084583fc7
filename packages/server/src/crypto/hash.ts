import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';
import {
  DEFAULT_SCRYPT_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELIZATION,
  SCRYPT_KEY_LENGTH,
} from '../config/constants.js';

interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

/**
 * Promisified scrypt function
 */
function scryptAsync(
  secret: string,
  salt: Buffer,
  keyLength: number,
  params: ScryptParams
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    // Default maxmem (32 MiB) is too small for N >= 32768
    const maxmem = 256 * params.N * params.r;
    scryptCallback(secret, salt, keyLength, { ...params, maxmem }, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256 (hex)
 * Used as the lookup key for high-entropy, short-lived magic link tokens
 */
export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Hash a secret (password or refresh token) using salted scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashSecret(secret: string, cost: number = DEFAULT_SCRYPT_COST): Promise<string> {
  const salt = randomBytes(16);
  const params: ScryptParams = { N: cost, r: SCRYPT_BLOCK_SIZE, p: SCRYPT_PARALLELIZATION };

  const hash = await scryptAsync(secret, salt, SCRYPT_KEY_LENGTH, params);

  return `$scrypt$${params.N}$${params.r}$${params.p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

/**
 * Parse the parameters out of a stored scrypt hash
 */
function parseScryptHash(hash: string): { params: ScryptParams; salt: Buffer; derived: Buffer } | null {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, scheme, n, r, p, salt, derived] = hash.split('$');

  if (empty !== '' || scheme !== 'scrypt' || !n || !r || !p || !salt || !derived) {
    return null;
  }

  const params = { N: parseInt(n, 10), r: parseInt(r, 10), p: parseInt(p, 10) };
  if (!Number.isInteger(params.N) || !Number.isInteger(params.r) || !Number.isInteger(params.p)) {
    return null;
  }

  return {
    params,
    salt: Buffer.from(salt, 'base64'),
    derived: Buffer.from(derived, 'base64'),
  };
}

/**
 * Verify a secret against its scrypt hash
 */
export async function verifySecret(secret: string, hash: string): Promise<boolean> {
  const parsed = parseScryptHash(hash);
  if (!parsed || parsed.derived.length === 0) {
    return false;
  }

  const derivedHash = await scryptAsync(secret, parsed.salt, parsed.derived.length, parsed.params);

  return timingSafeEqual(parsed.derived, derivedHash);
}
