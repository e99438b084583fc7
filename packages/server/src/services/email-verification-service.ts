import type { Clock, OperationOptions, UserVerificationState } from '../types/index.js';
import { systemClock } from '../types/index.js';
import type { TokenCodec } from '../crypto/token-codec.js';
import type { Notifier } from '../notifier/notifier.js';
import type { Logger } from '../logging/logger.js';
import type { AuthService } from './auth-service.js';
import { normalizeEmail } from './auth-service.js';
import { AuthError } from '../errors/auth-error.js';
import { ERROR_NOT_FOUND } from '../errors/error-codes.js';
import {
  DEFAULT_VERIFICATION_TOKEN_TTL,
  EMAIL_VERIFY_PATH,
  PURPOSE_EMAIL_VERIFICATION,
  SUBJECT_EMAIL_VERIFICATION,
} from '../config/constants.js';
import { withDeadline } from './deadline.js';

export interface EmailVerificationServiceOptions {
  codec: TokenCodec;
  notifier: Notifier;
  verificationLookup: Pick<AuthService, 'checkUserVerification'>;
  logger: Logger;
  /**
   * Base URL the verification link points at
   */
  publicUrl: string;
  ttl?: number; // seconds
  clock?: Clock;
}

/**
 * Issues email verification links
 */
export class EmailVerificationService {
  private readonly codec: TokenCodec;
  private readonly notifier: Notifier;
  private readonly verificationLookup: Pick<AuthService, 'checkUserVerification'>;
  private readonly logger: Logger;
  private readonly publicUrl: string;
  private readonly ttl: number;
  private readonly clock: Clock;

  constructor(options: EmailVerificationServiceOptions) {
    this.codec = options.codec;
    this.notifier = options.notifier;
    this.verificationLookup = options.verificationLookup;
    this.logger = options.logger.child({ component: 'email-verification' });
    this.publicUrl = options.publicUrl;
    this.ttl = options.ttl ?? DEFAULT_VERIFICATION_TOKEN_TTL;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Mint a verification token and queue the email
   *
   * A failed hand-off is logged and swallowed: the account stays as it is and
   * the user can ask for another link.
   */
  async issue(userId: number, email: string, options: OperationOptions = {}): Promise<void> {
    const op = 'EmailVerificationService.issue';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      const token = await this.codec.mint(PURPOSE_EMAIL_VERIFICATION, {
        subject: userId,
        ttl: this.ttl,
        claims: {},
      });

      const link = `${this.publicUrl}${EMAIL_VERIFY_PATH}?token=${encodeURIComponent(token)}`;

      commit();
      try {
        await this.notifier.publish({
          to: normalizeEmail(email),
          link,
          subject: SUBJECT_EMAIL_VERIFICATION,
          purpose: PURPOSE_EMAIL_VERIFICATION,
        });
      } catch (error) {
        this.logger.error('Failed to queue verification email', { op, userId, error });
        return;
      }

      this.logger.info('Verification email queued', {
        op,
        userId,
        expiresAt: new Date(this.clock().getTime() + this.ttl * 1000).toISOString(),
      });
    });
  }

  /**
   * Re-send a verification link
   *
   * Resolves the same way whether the address is unknown, already verified
   * or pending, so callers cannot tell which accounts exist.
   */
  async resend(email: string, options: OperationOptions = {}): Promise<void> {
    const op = 'EmailVerificationService.resend';

    let state: UserVerificationState;
    try {
      state = await this.verificationLookup.checkUserVerification(email, options);
    } catch (error) {
      if (AuthError.is(error, ERROR_NOT_FOUND)) {
        this.logger.debug('Resend requested for unknown address', { op });
        return;
      }
      throw error;
    }

    if (state.isVerified) {
      this.logger.debug('Resend requested for verified user', { op, userId: state.userId });
      return;
    }

    await this.issue(state.userId, email, options);
  }
}
