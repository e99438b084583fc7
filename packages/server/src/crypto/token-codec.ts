import * as jose from 'jose';
import { z } from 'zod';
import type { ClaimsFor, ExtraClaims, TokenPurpose } from '@authgate/shared';
import type { Clock } from '../types/index.js';
import { AuthError } from '../errors/auth-error.js';
import { SIGNING_ALGORITHM_HS256, PURPOSE_ACCESS } from '../config/constants.js';
import { generateJti } from './random.js';

/**
 * Signing and verification of purpose-scoped bearer tokens (HS256 JWTs)
 */

/**
 * Signing secret per purpose namespace. Access tokens are normally signed
 * with the audience app's own secret, supplied per call.
 */
export type CodecSecrets = Partial<Record<TokenPurpose, string>>;

export interface MintInput<P extends TokenPurpose> {
  subject: number;
  ttl: number; // seconds
  claims: ExtraClaims<P>;
  audience?: string;
  secret?: string;
}

export interface VerifyOptions {
  secret?: string;
  audience?: string;
}

// User IDs travel as decimal strings in `sub` (RFC 7519 StringOrURI)
const subjectSchema = z
  .string()
  .regex(/^[1-9]\d{0,14}$/, 'sub must be a positive integer')
  .transform((value) => parseInt(value, 10));

const registeredClaims = {
  sub: subjectSchema,
  iat: z.number().int(),
  exp: z.number().int(),
};

const claimSchemas: { [P in TokenPurpose]: z.ZodType<ClaimsFor<P>, z.ZodTypeDef, unknown> } = {
  access: z.object({
    ...registeredClaims,
    purpose: z.literal('access'),
    aud: z.string(),
    app_id: z.number().int(),
    email: z.string(),
    jti: z.string(),
  }),
  email_verification: z.object({
    ...registeredClaims,
    purpose: z.literal('email_verification'),
  }),
  '2fa': z.object({
    ...registeredClaims,
    purpose: z.literal('2fa'),
    app_id: z.number().int(),
    session_id: z.string().min(1),
  }),
};

function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Map jose failures to a short description (never echoes the token)
 */
function describeVerificationError(error: unknown): string {
  if (error instanceof jose.errors.JWTExpired) {
    return 'Token has expired';
  }
  if (error instanceof jose.errors.JOSEAlgNotAllowed) {
    return 'Unexpected signing algorithm';
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'Token signature is invalid';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    return `Token claim "${error.claim}" is invalid`;
  }
  return 'Token is malformed';
}

export class TokenCodec {
  private readonly secrets: CodecSecrets;
  private readonly clock: Clock;

  constructor(secrets: CodecSecrets, clock: Clock = () => new Date()) {
    this.secrets = secrets;
    this.clock = clock;
  }

  /**
   * Sign a token for the given purpose
   */
  async mint<P extends TokenPurpose>(purpose: P, input: MintInput<P>): Promise<string> {
    const key = this.keyFor(purpose, input.secret);
    const now = epochSeconds(this.clock());

    const payload: jose.JWTPayload = { purpose };
    Object.assign(payload, input.claims);

    const jwt = new jose.SignJWT(payload)
      .setProtectedHeader({ alg: SIGNING_ALGORITHM_HS256, typ: 'JWT' })
      .setSubject(String(input.subject))
      .setIssuedAt(now)
      .setExpirationTime(now + input.ttl);

    if (input.audience) {
      jwt.setAudience(input.audience);
    }

    if (purpose === PURPOSE_ACCESS) {
      jwt.setJti(generateJti());
    }

    return jwt.sign(key);
  }

  /**
   * Verify a token and return its typed claims
   *
   * Rejects other algorithms, expired tokens (evaluated against a single
   * instant, no clock tolerance), missing sub/exp, a purpose other than
   * `expectedPurpose`, and claim sets that do not match the purpose.
   */
  async verify<P extends TokenPurpose>(
    token: string,
    expectedPurpose: P,
    options: VerifyOptions = {}
  ): Promise<ClaimsFor<P>> {
    const key = this.keyFor(expectedPurpose, options.secret);
    const now = this.clock();

    let payload: jose.JWTPayload;
    try {
      const result = await jose.jwtVerify(token, key, {
        algorithms: [SIGNING_ALGORITHM_HS256],
        currentDate: now,
        clockTolerance: 0,
        requiredClaims: ['sub', 'exp', 'iat'],
        audience: options.audience,
      });
      payload = result.payload;
    } catch (error) {
      throw AuthError.invalidToken(describeVerificationError(error), error);
    }

    if (payload['purpose'] !== expectedPurpose) {
      throw AuthError.invalidToken('Token was issued for another purpose');
    }

    const parsed = claimSchemas[expectedPurpose].safeParse(payload);
    if (!parsed.success) {
      throw AuthError.invalidToken('Token claims are malformed', parsed.error);
    }

    return parsed.data;
  }

  /**
   * Audience an access token names, read before verification to pick the
   * app whose secret verifies it. Never trust it before `verify` passes.
   */
  peekAudience(token: string): string {
    let payload: jose.JWTPayload;
    try {
      payload = jose.decodeJwt(token);
    } catch (error) {
      throw AuthError.invalidToken('Token is malformed', error);
    }
    if (typeof payload.aud !== 'string') {
      throw AuthError.invalidToken('Token claim "aud" is invalid');
    }
    return payload.aud;
  }

  private keyFor(purpose: TokenPurpose, override?: string): Uint8Array {
    const secret = override ?? this.secrets[purpose];
    if (!secret) {
      throw AuthError.internal(`TokenCodec.keyFor(${purpose})`, new Error('No signing secret configured'));
    }
    return new TextEncoder().encode(secret);
  }
}
