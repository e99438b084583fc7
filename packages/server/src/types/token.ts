/**
 * Stored refresh token
 * Only the scrypt hash of the raw value is ever persisted
 */
export interface RefreshTokenRecord {
  id: number;
  userId: number;
  appId: number;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
}

/**
 * Input for storing a refresh token
 */
export interface CreateRefreshTokenInput {
  userId: number;
  appId: number;
  tokenHash: string;
  expiresAt: Date;
}

/**
 * Access/refresh pair returned by login and refresh
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}
