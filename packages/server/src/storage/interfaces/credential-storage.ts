import type {
  User,
  CreateUserInput,
  App,
  RefreshTokenRecord,
  CreateRefreshTokenInput,
  OperationOptions,
} from '../../types/index.js';

/**
 * Read side of the credential store
 *
 * Lookups resolve to `null` when the row does not exist; any other failure
 * rejects with an internal AuthError naming the operation.
 */
export interface CredentialReader {
  getUserByEmail(email: string, options?: OperationOptions): Promise<User | null>;

  getUserById(id: number, options?: OperationOptions): Promise<User | null>;

  getApp(appId: number, options?: OperationOptions): Promise<App | null>;

  /**
   * Stream every refresh token that has not expired at `now`
   *
   * Hashes are salted, so matching a raw value means comparing against each
   * candidate; implementations page through the table instead of loading it.
   */
  findRefreshTokenCandidates(now: Date, options?: OperationOptions): AsyncIterable<RefreshTokenRecord>;
}

/**
 * Write side of the credential store
 */
export interface CredentialWriter {
  /**
   * Insert a new unverified user and return its id
   * Rejects with already_exists when the email or username is taken
   */
  saveUser(input: CreateUserInput, options?: OperationOptions): Promise<number>;

  /**
   * Mark a user verified. Resolves false when no such user exists.
   */
  setEmailVerified(userId: number, options?: OperationOptions): Promise<boolean>;

  saveRefreshToken(input: CreateRefreshTokenInput, options?: OperationOptions): Promise<RefreshTokenRecord>;

  /**
   * Replace `oldHash` with `newHash` on the row owned by `userId`
   * Resolves false when no row matched (already rotated or deleted)
   */
  rotateRefreshToken(
    userId: number,
    oldHash: string,
    newHash: string,
    expiresAt: Date,
    options?: OperationOptions
  ): Promise<boolean>;

  /**
   * Delete the row with this hash. Resolves false when none matched.
   */
  deleteRefreshToken(tokenHash: string, options?: OperationOptions): Promise<boolean>;
}

export interface CredentialStorage extends CredentialReader, CredentialWriter {}
