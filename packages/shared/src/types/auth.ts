/**
 * Request and response bodies of the /auth endpoints
 */

export type TokenType = 'Bearer';

export interface RegisterRequest {
  email: string;
  username: string;
  password: string;
}

export interface RegisterResponse {
  user_id: number;
}

export interface LoginRequest {
  email: string;
  password: string;
  app_id: number;
}

export interface RefreshRequest {
  refresh_token: string;
}

export interface LogoutRequest {
  refresh_token: string;
}

export interface ResendVerificationRequest {
  email: string;
}

/**
 * Token pair returned by login and refresh.
 * The refresh token is shown once and cannot be recovered.
 */
export interface TokenPairResponse {
  access_token: string;
  refresh_token: string;
  token_type: TokenType;
  expires_in: number;
}

export interface StatusResponse {
  status: 'ok';
}

export interface ErrorResponse {
  error: string;
  error_description?: string;
}
