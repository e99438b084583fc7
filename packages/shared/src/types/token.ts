/**
 * Purpose claim values. A token minted for one purpose never verifies
 * as another.
 */
export type TokenPurpose = 'access' | 'email_verification' | '2fa';

/**
 * Claims present on every signed token, after parsing
 */
export interface BaseTokenClaims {
  sub: number; // User ID
  purpose: TokenPurpose;
  iat: number; // Unix seconds
  exp: number; // Unix seconds
}

/**
 * Access token claims. The audience is the app the token was minted for.
 */
export interface AccessTokenClaims extends BaseTokenClaims {
  purpose: 'access';
  aud: string;
  app_id: number;
  email: string;
  jti: string;
}

export interface EmailVerificationClaims extends BaseTokenClaims {
  purpose: 'email_verification';
}

/**
 * Magic link (second factor) claims
 */
export interface TwoFactorClaims extends BaseTokenClaims {
  purpose: '2fa';
  app_id: number;
  session_id: string;
}

export type TokenClaims = AccessTokenClaims | EmailVerificationClaims | TwoFactorClaims;

/**
 * Claim set for a given purpose
 */
export type ClaimsFor<P extends TokenPurpose> = Extract<TokenClaims, { purpose: P }>;

/**
 * Purpose-specific claims supplied by the caller when minting.
 * Registered claims (sub, purpose, iat, exp, aud, jti) are set by the codec.
 */
export type ExtraClaims<P extends TokenPurpose> = Omit<
  ClaimsFor<P>,
  'sub' | 'purpose' | 'iat' | 'exp' | 'aud' | 'jti'
>;
