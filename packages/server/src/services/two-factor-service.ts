import type {
  Clock,
  ConsumedMagicLink,
  MagicLink,
  MagicLinkClaims,
  OperationOptions,
} from '../types/index.js';
import { systemClock, isMagicLinkExpired } from '../types/index.js';
import type { MagicLinkStorage } from '../storage/interfaces/magic-link-storage.js';
import type { EphemeralStore } from '../storage/interfaces/ephemeral-store.js';
import type { TokenCodec } from '../crypto/token-codec.js';
import type { Notifier } from '../notifier/notifier.js';
import type { Logger } from '../logging/logger.js';
import { sha256 } from '../crypto/hash.js';
import { generateSessionId } from '../crypto/random.js';
import { AuthError } from '../errors/auth-error.js';
import {
  DEFAULT_MAGIC_LINK_CLEANUP_GRACE,
  DEFAULT_MAGIC_LINK_TTL,
  DEFAULT_MAX_ACTIVE_MAGIC_LINKS,
  MAGIC_LINK_MARKER_INVALIDATED,
  MAGIC_LINK_MARKER_USED,
  MAGIC_LINK_PENDING_PREFIX,
  MAGIC_LINK_USED_PREFIX,
  MAGIC_LINK_VERIFY_PATH,
  PURPOSE_TWO_FACTOR,
  SUBJECT_TWO_FACTOR,
} from '../config/constants.js';
import { withDeadline } from './deadline.js';

export interface TwoFactorServiceOptions {
  magicLinks: MagicLinkStorage;
  /**
   * Fast marker store. Optional: without it the durable conditional update
   * is the only single-use guard.
   */
  ephemeral?: EphemeralStore;
  codec: TokenCodec;
  notifier: Notifier;
  logger: Logger;
  /**
   * Base URL the magic link points at
   */
  redirectUrl: string;
  clock?: Clock;
  ttl?: number; // seconds
  maxActive?: number;
  cleanupGrace?: number; // seconds past expiry
}

export interface SendMagicLinkInput {
  userId: number;
  appId: number;
  email: string;
  ipAddress?: string;
  userAgent?: string;
}

export interface MagicLinkIssued {
  sessionId: string;
  expiresAt: Date;
}

type UsedMarkerOutcome = 'claimed' | 'used' | 'invalidated' | 'unavailable';

const pendingKey = (tokenHash: string): string => `${MAGIC_LINK_PENDING_PREFIX}${tokenHash}`;
const usedKey = (tokenHash: string): string => `${MAGIC_LINK_USED_PREFIX}${tokenHash}`;

/**
 * Magic link (second factor) issuance and single-use consumption
 */
export class TwoFactorService {
  private readonly magicLinks: MagicLinkStorage;
  private readonly ephemeral?: EphemeralStore;
  private readonly codec: TokenCodec;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly redirectUrl: string;
  private readonly clock: Clock;
  private readonly ttl: number;
  private readonly maxActive: number;
  private readonly cleanupGrace: number;

  constructor(options: TwoFactorServiceOptions) {
    this.magicLinks = options.magicLinks;
    this.ephemeral = options.ephemeral;
    this.codec = options.codec;
    this.notifier = options.notifier;
    this.logger = options.logger.child({ component: 'two-factor' });
    this.redirectUrl = options.redirectUrl;
    this.clock = options.clock ?? systemClock;
    this.ttl = options.ttl ?? DEFAULT_MAGIC_LINK_TTL;
    this.maxActive = options.maxActive ?? DEFAULT_MAX_ACTIVE_MAGIC_LINKS;
    this.cleanupGrace = options.cleanupGrace ?? DEFAULT_MAGIC_LINK_CLEANUP_GRACE;
  }

  /**
   * Create a magic link and queue it for delivery
   */
  async sendMagicLink(input: SendMagicLinkInput, options: OperationOptions = {}): Promise<MagicLinkIssued> {
    const op = 'TwoFactorService.sendMagicLink';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      const now = this.clock();
      const sessionId = generateSessionId(input.userId, now);
      const token = await this.codec.mint(PURPOSE_TWO_FACTOR, {
        subject: input.userId,
        ttl: this.ttl,
        claims: { app_id: input.appId, session_id: sessionId },
      });
      const tokenHash = sha256(token);
      const expiresAt = new Date(now.getTime() + this.ttl * 1000);

      commit();
      await this.magicLinks.create(
        {
          userId: input.userId,
          appId: input.appId,
          tokenHash,
          sessionId,
          ipAddress: input.ipAddress,
          userAgent: input.userAgent,
          expiresAt,
        },
        { maxActive: this.maxActive, now }
      );

      if (this.ephemeral) {
        try {
          await this.ephemeral.set(pendingKey(tokenHash), `${input.userId}:${input.appId}`, this.ttl * 1000);
        } catch (error) {
          this.logger.warn('Failed to record pending magic link', { op, userId: input.userId, error });
        }
      }

      const link = `${this.redirectUrl}${MAGIC_LINK_VERIFY_PATH}?token=${encodeURIComponent(token)}`;

      try {
        await this.notifier.publish({
          to: input.email,
          link,
          subject: SUBJECT_TWO_FACTOR,
          purpose: PURPOSE_TWO_FACTOR,
        });
      } catch (error) {
        this.logger.error('Failed to queue magic link email', { op, userId: input.userId, error });
        throw AuthError.wrap(op, error);
      }

      this.logger.info('Magic link sent', {
        op,
        userId: input.userId,
        appId: input.appId,
        sessionId,
      });

      return { sessionId, expiresAt };
    });
  }

  /**
   * Verify a magic link token and return its claims
   */
  async parseToken(token: string): Promise<MagicLinkClaims> {
    const claims = await this.codec.verify(token, PURPOSE_TWO_FACTOR);
    return { userId: claims.sub, appId: claims.app_id, sessionId: claims.session_id };
  }

  /**
   * Redeem a magic link; succeeds for exactly one caller per link
   */
  async consumeMagicLink(token: string, options: OperationOptions = {}): Promise<ConsumedMagicLink> {
    const op = 'TwoFactorService.consumeMagicLink';

    return withDeadline(options.signal, op, async (signal, commit) => {
      const claims = await this.parseToken(token);
      const tokenHash = sha256(token);

      const link = await this.magicLinks.getByTokenHash(tokenHash, { signal });
      if (!link) {
        throw AuthError.notFound('Magic link not found.');
      }

      if (link.used) {
        throw AuthError.invalidCredentials('Magic link has already been used.');
      }

      const now = this.clock();
      if (isMagicLinkExpired(link, now)) {
        throw AuthError.invalidToken('Magic link has expired.');
      }

      if (
        link.userId !== claims.userId ||
        link.appId !== claims.appId ||
        link.sessionId !== claims.sessionId
      ) {
        this.logger.warn('Magic link claims do not match record', { op, magicLinkId: link.id });
        throw AuthError.invalidToken('Magic link does not match its token.');
      }

      // From the marker on the link is being burned; see it through
      commit();
      const remainingMs = link.expiresAt.getTime() - now.getTime();
      const marker = await this.claimUsedMarker(tokenHash, remainingMs);
      if (marker === 'invalidated') {
        throw AuthError.invalidCredentials('Magic link has been invalidated.');
      }
      if (marker === 'used') {
        throw AuthError.invalidCredentials('Magic link has already been used.');
      }

      // Durable backstop: only one conditional update can flip `used`
      const marked = await this.magicLinks.markUsed(link.id, now);
      if (!marked) {
        throw AuthError.invalidCredentials('Magic link has already been used.');
      }

      await this.dropPending([tokenHash]);

      this.logger.info('Magic link consumed', {
        op,
        userId: link.userId,
        appId: link.appId,
        sessionId: link.sessionId,
      });

      return {
        userId: link.userId,
        appId: link.appId,
        sessionId: link.sessionId,
        magicLinkId: link.id,
      };
    });
  }

  /**
   * Revoke every outstanding link of a user; returns how many were revoked
   */
  async invalidateMagicLinksByUserId(userId: number, options: OperationOptions = {}): Promise<number> {
    const op = 'TwoFactorService.invalidateMagicLinksByUserId';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      commit();
      const hashes = await this.magicLinks.invalidateByUser(userId, this.clock());
      await this.markInvalidated(hashes);

      this.logger.info('Magic links invalidated', { op, userId, count: hashes.length });
      return hashes.length;
    });
  }

  /**
   * Revoke the outstanding links with these token hashes
   */
  async invalidateMagicLinksByHashes(tokenHashes: string[], options: OperationOptions = {}): Promise<number> {
    const op = 'TwoFactorService.invalidateMagicLinksByHashes';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      commit();
      const hashes = await this.magicLinks.invalidateByHashes(tokenHashes, this.clock());
      await this.markInvalidated(hashes);

      this.logger.info('Magic links invalidated', { op, count: hashes.length });
      return hashes.length;
    });
  }

  async listActiveMagicLinks(userId: number, options: OperationOptions = {}): Promise<MagicLink[]> {
    const op = 'TwoFactorService.listActiveMagicLinks';

    return withDeadline(options.signal, op, (signal) =>
      this.magicLinks.listActiveByUser(userId, this.clock(), { signal })
    );
  }

  /**
   * Delete unused links that expired more than the grace period ago
   */
  async cleanupExpired(options: OperationOptions = {}): Promise<number> {
    const op = 'TwoFactorService.cleanupExpired';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      const expiredBefore = new Date(this.clock().getTime() - this.cleanupGrace * 1000);

      commit();
      const deleted = await this.magicLinks.cleanupExpired(expiredBefore);

      this.logger.info('Expired magic links cleaned up', { op, deleted });
      return deleted;
    });
  }

  /**
   * Try to be the first to set the used marker
   *
   * 'unavailable' means there is no fast store or it failed; the durable
   * update then decides alone.
   */
  private async claimUsedMarker(tokenHash: string, ttlMs: number): Promise<UsedMarkerOutcome> {
    if (!this.ephemeral) {
      return 'unavailable';
    }

    const key = usedKey(tokenHash);
    try {
      if (await this.ephemeral.setIfAbsent(key, MAGIC_LINK_MARKER_USED, ttlMs)) {
        return 'claimed';
      }
    } catch (error) {
      this.logger.warn('Fast store unavailable, relying on durable guard', {
        op: 'TwoFactorService.claimUsedMarker',
        error,
      });
      return 'unavailable';
    }

    try {
      const existing = await this.ephemeral.get(key);
      return existing === MAGIC_LINK_MARKER_INVALIDATED ? 'invalidated' : 'used';
    } catch (error) {
      this.logger.warn('Failed to read used marker', { op: 'TwoFactorService.claimUsedMarker', error });
      return 'used';
    }
  }

  /**
   * Best effort: write invalidated markers so racing consumers see the revocation
   */
  private async markInvalidated(tokenHashes: string[]): Promise<void> {
    if (!this.ephemeral) {
      return;
    }

    for (const tokenHash of tokenHashes) {
      try {
        await this.ephemeral.set(usedKey(tokenHash), MAGIC_LINK_MARKER_INVALIDATED, this.ttl * 1000);
      } catch (error) {
        this.logger.warn('Failed to write invalidated marker', {
          op: 'TwoFactorService.markInvalidated',
          error,
        });
      }
    }

    await this.dropPending(tokenHashes);
  }

  private async dropPending(tokenHashes: string[]): Promise<void> {
    if (!this.ephemeral) {
      return;
    }

    for (const tokenHash of tokenHashes) {
      try {
        await this.ephemeral.delete(pendingKey(tokenHash));
      } catch (error) {
        this.logger.warn('Failed to drop pending marker', { op: 'TwoFactorService.dropPending', error });
      }
    }
  }
}
