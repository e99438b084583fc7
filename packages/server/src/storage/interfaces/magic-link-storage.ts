import type { MagicLink, CreateMagicLinkInput, OperationOptions } from '../../types/index.js';

/**
 * Durable storage for magic link challenges
 */
export interface MagicLinkStorage {
  /**
   * Insert a link, first evicting the user's oldest active links so that at
   * most `maxActive` remain active afterwards. Eviction and insert are atomic
   * per user.
   */
  create(
    input: CreateMagicLinkInput,
    limits: { maxActive: number; now: Date },
    options?: OperationOptions
  ): Promise<MagicLink>;

  getByTokenHash(tokenHash: string, options?: OperationOptions): Promise<MagicLink | null>;

  /**
   * Flip `used` on an unused link
   * Resolves false when the link was already used (or no longer exists)
   */
  markUsed(id: number, usedAt: Date, options?: OperationOptions): Promise<boolean>;

  listActiveByUser(userId: number, now: Date, options?: OperationOptions): Promise<MagicLink[]>;

  /**
   * Mark every unused link of the user as used
   * Returns the token hashes that were flipped
   */
  invalidateByUser(userId: number, now: Date, options?: OperationOptions): Promise<string[]>;

  /**
   * Mark the unused links with these hashes as used
   * Returns the token hashes that were flipped
   */
  invalidateByHashes(tokenHashes: string[], now: Date, options?: OperationOptions): Promise<string[]>;

  /**
   * Delete unused links that expired before `expiredBefore`
   */
  cleanupExpired(expiredBefore: Date, options?: OperationOptions): Promise<number>;
}
