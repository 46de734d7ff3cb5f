import { errors } from 'jose';
import { z } from 'zod';
import type { AuthConfig } from '../config/index.js';
import { RESERVED_CLAIMS } from '../config/constants.js';
import { AuthError } from '../errors/auth-error.js';
import { encodeSecret, signHmacJwt, verifyHmacJwt, type HmacAlgorithm } from '../crypto/jwt.js';

/**
 * Claims the caller supplies when issuing a session token
 */
export interface SessionClaims {
  sub: string;
  tenant_id: string;
  email: string;
  roles: string[];
}

/**
 * Claims recovered from a verified token
 */
export interface VerifiedClaims extends SessionClaims {
  iat: number;
  exp: number;
  extensions: Record<string, unknown>;
}

export type ClaimExtensions = Record<string, unknown>;

const verifiedPayloadSchema = z
  .object({
    sub: z.string().min(1),
    tenant_id: z.string().min(1),
    email: z.string(),
    roles: z.array(z.string()),
    iat: z.number().int(),
    exp: z.number().int(),
  })
  .passthrough()
  .refine((payload) => payload.exp > payload.iat, { message: 'exp must be after iat' });

const reservedClaims: ReadonlySet<string> = new Set(RESERVED_CLAIMS);

/**
 * Issues and verifies HMAC-signed session tokens (compact JWS)
 */
export class TokenService {
  private readonly secret: Uint8Array;
  private readonly algorithm: HmacAlgorithm;

  constructor(config: Pick<AuthConfig, 'signingSecret' | 'algorithm'>) {
    this.secret = encodeSecret(config.signingSecret);
    this.algorithm = config.algorithm;
  }

  /**
   * Sign a claim set valid from now for `ttlSeconds`
   *
   * Rejects with internal_error on a non-positive TTL, an empty subject or
   * tenant, or an extension that shadows a reserved claim.
   */
  async issue(
    claims: SessionClaims,
    ttlSeconds: number,
    extensions: ClaimExtensions = {}
  ): Promise<string> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw AuthError.internalError(`Token TTL must be a positive integer, got ${ttlSeconds}`);
    }
    if (!claims.sub) {
      throw AuthError.internalError('Token subject is empty');
    }
    if (!claims.tenant_id) {
      throw AuthError.internalError('Token tenant is empty');
    }

    const shadowed = Object.keys(extensions).filter((key) => reservedClaims.has(key));
    if (shadowed.length > 0) {
      throw AuthError.internalError(`Extension claims shadow reserved claims: ${shadowed.join(', ')}`);
    }

    const now = Math.floor(Date.now() / 1000);

    return signHmacJwt(
      {
        ...extensions,
        sub: claims.sub,
        tenant_id: claims.tenant_id,
        email: claims.email,
        roles: [...new Set(claims.roles)],
        iat: now,
        exp: now + ttlSeconds,
      },
      this.secret,
      this.algorithm
    );
  }

  /**
   * Verify signature and expiry, then decode the claim set
   *
   * Signature and algorithm are checked before any claim is read.
   */
  async verify(token: string): Promise<VerifiedClaims> {
    let payload: unknown;
    try {
      payload = await verifyHmacJwt(token, this.secret, this.algorithm);
    } catch (error) {
      throw mapVerificationError(error);
    }

    const parsed = verifiedPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw AuthError.malformedToken(
        `Token payload invalid: ${parsed.error.issues.map((issue) => issue.path.join('.') || issue.message).join(', ')}`
      );
    }

    const { sub, tenant_id, email, roles, iat, exp, ...extensions } = parsed.data;

    return { sub, tenant_id, email, roles, iat, exp, extensions };
  }
}

function mapVerificationError(error: unknown): AuthError {
  // JWTExpired extends JWTClaimValidationFailed, so it is checked first
  if (error instanceof errors.JWTExpired) {
    return AuthError.expiredToken('Token has expired');
  }
  if (
    error instanceof errors.JWSSignatureVerificationFailed ||
    error instanceof errors.JOSEAlgNotAllowed
  ) {
    return AuthError.invalidSignature('Token signature rejected', error);
  }
  if (error instanceof errors.JOSEError) {
    return AuthError.malformedToken(`Token could not be decoded: ${error.code}`, error);
  }
  return AuthError.internalError('Token verification failed unexpectedly', error);
}
