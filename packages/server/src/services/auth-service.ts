import type {
  App,
  Clock,
  OperationOptions,
  Principal,
  RefreshTokenRecord,
  TokenPair,
  User,
  UserVerificationState,
} from '../types/index.js';
import { systemClock } from '../types/index.js';
import type { CredentialReader, CredentialWriter } from '../storage/interfaces/credential-storage.js';
import type { TokenCodec } from '../crypto/token-codec.js';
import type { Logger } from '../logging/logger.js';
import { hashSecret, verifySecret } from '../crypto/hash.js';
import { generateRefreshToken } from '../crypto/random.js';
import { AuthError } from '../errors/auth-error.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
  DEFAULT_SCRYPT_COST,
  PURPOSE_ACCESS,
  PURPOSE_EMAIL_VERIFICATION,
} from '../config/constants.js';
import { withDeadline } from './deadline.js';

export interface AuthServiceOptions {
  credentials: CredentialReader & CredentialWriter;
  codec: TokenCodec;
  logger: Logger;
  clock?: Clock;
  accessTokenTtl?: number; // seconds
  refreshTokenTtl?: number; // seconds
  scryptCost?: number;
}

/**
 * Lower-case and trim an email address so lookups and uniqueness agree
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Registration, login, refresh rotation, logout and email verification
 */
export class AuthService {
  private readonly credentials: CredentialReader & CredentialWriter;
  private readonly codec: TokenCodec;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly accessTokenTtl: number;
  private readonly refreshTokenTtl: number;
  private readonly scryptCost: number;

  constructor(options: AuthServiceOptions) {
    this.credentials = options.credentials;
    this.codec = options.codec;
    this.logger = options.logger.child({ component: 'auth' });
    this.clock = options.clock ?? systemClock;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.refreshTokenTtl = options.refreshTokenTtl ?? DEFAULT_REFRESH_TOKEN_TTL;
    this.scryptCost = options.scryptCost ?? DEFAULT_SCRYPT_COST;
  }

  /**
   * Create an unverified user
   *
   * Uniqueness of email and username is enforced by the store, so two
   * concurrent registrations cannot both succeed.
   */
  async registerNewUser(
    email: string,
    username: string,
    rawPassword: string,
    options: OperationOptions = {}
  ): Promise<number> {
    const op = 'AuthService.registerNewUser';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      const passwordHash = await hashSecret(rawPassword, this.scryptCost);

      commit();
      const userId = await this.credentials.saveUser({ email: normalizeEmail(email), username, passwordHash });

      this.logger.info('User registered', { op, userId });
      return userId;
    });
  }

  /**
   * Exchange credentials for a token pair scoped to `appId`
   */
  async login(
    email: string,
    password: string,
    appId: number,
    options: OperationOptions = {}
  ): Promise<TokenPair> {
    const op = 'AuthService.login';

    return withDeadline(options.signal, op, async (signal, commit) => {
      const user = await this.credentials.getUserByEmail(normalizeEmail(email), { signal });
      if (!user) {
        throw AuthError.notFound('User not found.');
      }

      if (!user.isVerified) {
        throw AuthError.emailNotVerified();
      }

      if (!(await verifySecret(password, user.passwordHash))) {
        this.logger.debug('Password mismatch', { op, userId: user.id });
        throw AuthError.invalidCredentials();
      }

      const app = await this.credentials.getApp(appId, { signal });
      if (!app) {
        throw AuthError.invalidAppId();
      }

      const accessToken = await this.mintAccessToken(user, app);
      const refreshToken = generateRefreshToken();
      const tokenHash = await hashSecret(refreshToken, this.scryptCost);

      commit();
      await this.credentials.saveRefreshToken({
        userId: user.id,
        appId: app.id,
        tokenHash,
        expiresAt: this.refreshExpiry(),
      });

      this.logger.info('User logged in', { op, userId: user.id, appId: app.id });
      return { accessToken, refreshToken, expiresIn: this.accessTokenTtl };
    });
  }

  /**
   * Rotate a refresh token
   *
   * The old value stops working in the same statement that installs the new
   * hash; of two concurrent calls with the same value only one succeeds.
   * Once the rotation is issued the deadline no longer applies, so a caller
   * never loses the new value to a timeout.
   */
  async refresh(rawRefreshToken: string, options: OperationOptions = {}): Promise<TokenPair> {
    const op = 'AuthService.refresh';

    return withDeadline(options.signal, op, async (signal, commit) => {
      const current = await this.findRefreshToken(rawRefreshToken, signal);
      if (!current) {
        throw AuthError.invalidCredentials('Refresh token is invalid or expired.');
      }

      const user = await this.credentials.getUserById(current.userId, { signal });
      if (!user) {
        throw AuthError.notFound('User not found.');
      }

      const app = await this.credentials.getApp(current.appId, { signal });
      if (!app) {
        throw AuthError.invalidAppId();
      }

      const accessToken = await this.mintAccessToken(user, app);
      const refreshToken = generateRefreshToken();
      const newHash = await hashSecret(refreshToken, this.scryptCost);

      commit();
      const rotated = await this.credentials.rotateRefreshToken(
        user.id,
        current.tokenHash,
        newHash,
        this.refreshExpiry()
      );
      if (!rotated) {
        this.logger.warn('Refresh token already rotated', { op, userId: user.id });
        throw AuthError.invalidCredentials('Refresh token is invalid or expired.');
      }

      this.logger.info('Refresh token rotated', { op, userId: user.id, appId: app.id });
      return { accessToken, refreshToken, expiresIn: this.accessTokenTtl };
    });
  }

  /**
   * Revoke a refresh token
   */
  async logout(rawRefreshToken: string, options: OperationOptions = {}): Promise<void> {
    const op = 'AuthService.logout';

    return withDeadline(options.signal, op, async (signal, commit) => {
      const current = await this.findRefreshToken(rawRefreshToken, signal);
      if (!current) {
        throw AuthError.invalidCredentials('Refresh token is invalid or expired.');
      }

      commit();
      const deleted = await this.credentials.deleteRefreshToken(current.tokenHash);
      if (!deleted) {
        throw AuthError.invalidCredentials('Refresh token is invalid or expired.');
      }

      this.logger.info('User logged out', { op, userId: current.userId });
    });
  }

  /**
   * Apply an email verification token and return the verified user's id
   *
   * Re-applying a valid token to an already verified user succeeds.
   */
  async verifyUser(token: string, options: OperationOptions = {}): Promise<number> {
    const op = 'AuthService.verifyUser';

    return withDeadline(options.signal, op, async (_signal, commit) => {
      const claims = await this.codec.verify(token, PURPOSE_EMAIL_VERIFICATION);

      commit();
      const updated = await this.credentials.setEmailVerified(claims.sub);
      if (!updated) {
        throw AuthError.notFound('User not found.');
      }

      this.logger.info('Email verified', { op, userId: claims.sub });
      return claims.sub;
    });
  }

  async checkUserVerification(
    email: string,
    options: OperationOptions = {}
  ): Promise<UserVerificationState> {
    const op = 'AuthService.checkUserVerification';

    return withDeadline(options.signal, op, async (signal) => {
      const user = await this.credentials.getUserByEmail(normalizeEmail(email), { signal });
      if (!user) {
        throw AuthError.notFound('User not found.');
      }
      return { userId: user.id, isVerified: user.isVerified };
    });
  }

  /**
   * Verify an access token against its app's secret and load its user
   */
  async authenticate(accessToken: string, options: OperationOptions = {}): Promise<Principal> {
    const op = 'AuthService.authenticate';

    return withDeadline(options.signal, op, async (signal) => {
      const audience = this.codec.peekAudience(accessToken);
      if (!/^[1-9]\d{0,9}$/.test(audience)) {
        throw AuthError.invalidToken('Token claim "aud" is invalid');
      }

      const app = await this.credentials.getApp(parseInt(audience, 10), { signal });
      if (!app) {
        throw AuthError.invalidToken('Token was issued for an unknown application');
      }

      const claims = await this.codec.verify(accessToken, PURPOSE_ACCESS, { secret: app.secret, audience });
      if (claims.app_id !== app.id) {
        throw AuthError.invalidToken('Token claims are malformed');
      }

      const user = await this.credentials.getUserById(claims.sub, { signal });
      if (!user) {
        throw AuthError.invalidToken('Token subject no longer exists');
      }

      return { user, app };
    });
  }

  private mintAccessToken(user: User, app: App): Promise<string> {
    return this.codec.mint(PURPOSE_ACCESS, {
      subject: user.id,
      ttl: this.accessTokenTtl,
      audience: String(app.id),
      claims: { app_id: app.id, email: user.email },
      secret: app.secret,
    });
  }

  /**
   * Scan unexpired refresh tokens for the one whose hash matches
   */
  private async findRefreshToken(
    rawRefreshToken: string,
    signal: AbortSignal | undefined
  ): Promise<RefreshTokenRecord | null> {
    if (!rawRefreshToken) {
      return null;
    }

    const now = this.clock();
    for await (const candidate of this.credentials.findRefreshTokenCandidates(now, { signal })) {
      if (candidate.expiresAt.getTime() <= now.getTime()) {
        continue;
      }
      if (await verifySecret(rawRefreshToken, candidate.tokenHash)) {
        return candidate;
      }
    }
    return null;
  }

  private refreshExpiry(): Date {
    return new Date(this.clock().getTime() + this.refreshTokenTtl * 1000);
  }
}
