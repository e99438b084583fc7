/**
 * Two-factor magic link challenge
 */
export interface MagicLink {
  id: number;
  userId: number;
  appId: number;
  tokenHash: string; // sha256 hex of the raw token
  sessionId: string;
  ipAddress?: string;
  userAgent?: string;
  used: boolean;
  usedAt?: Date;
  expiresAt: Date;
  createdAt: Date;
}

/**
 * Input for creating a magic link
 */
export interface CreateMagicLinkInput {
  userId: number;
  appId: number;
  tokenHash: string;
  sessionId: string;
  ipAddress?: string;
  userAgent?: string;
  expiresAt: Date;
}

/**
 * Parsed 2fa token claims
 */
export interface MagicLinkClaims {
  userId: number;
  appId: number;
  sessionId: string;
}

/**
 * Outcome of a successful consume
 */
export interface ConsumedMagicLink extends MagicLinkClaims {
  magicLinkId: number;
}

export function isMagicLinkExpired(link: MagicLink, now: Date): boolean {
  return link.expiresAt.getTime() <= now.getTime();
}

export function isMagicLinkActive(link: MagicLink, now: Date): boolean {
  return !link.used && !isMagicLinkExpired(link, now);
}
