/**
 * Request and response bodies of the /auth/2fa endpoints
 */

export interface MagicLinkVerifiedResponse {
  user_id: number;
  app_id: number;
  session_id: string;
}

