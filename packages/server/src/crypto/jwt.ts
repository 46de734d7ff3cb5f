import * as jose from 'jose';
import type { SUPPORTED_SIGNING_ALGORITHMS } from '../config/constants.js';

/**
 * HMAC JWT signing and verification using the jose library
 */

export type HmacAlgorithm = (typeof SUPPORTED_SIGNING_ALGORITHMS)[number];

/**
 * Encode a shared secret as key material
 */
export function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a payload with an HMAC algorithm
 *
 * `iat` and `exp` are taken from the payload as given.
 */
export async function signHmacJwt(
  payload: jose.JWTPayload & { iat: number; exp: number },
  secret: Uint8Array,
  algorithm: HmacAlgorithm
): Promise<string> {
  const { iat, exp, ...claims } = payload;

  return new jose.SignJWT(claims)
    .setProtectedHeader({ alg: algorithm, typ: 'JWT' })
    .setIssuedAt(iat)
    .setExpirationTime(exp)
    .sign(secret);
}

/**
 * Verify an HMAC-signed JWT
 *
 * Only `algorithm` is accepted. No clock tolerance: a token is expired once
 * the current second reaches `exp`. The signature segment must be canonical
 * base64url, so the unused trailing bits of its last character are fixed.
 */
export async function verifyHmacJwt(
  token: string,
  secret: Uint8Array,
  algorithm: HmacAlgorithm
): Promise<jose.JWTPayload> {
  try {
    const { payload } = await jose.jwtVerify(token, secret, {
      algorithms: [algorithm],
      clockTolerance: 0,
    });
    assertCanonicalSignature(token);
    return payload;
  } catch (error) {
    // Claim checks only run once the signature bytes matched
    if (error instanceof jose.errors.JWTClaimValidationFailed) {
      assertCanonicalSignature(token);
    }
    throw error;
  }
}

function assertCanonicalSignature(token: string): void {
  const signature = token.slice(token.lastIndexOf('.') + 1);
  if (jose.base64url.encode(jose.base64url.decode(signature)) !== signature) {
    throw new jose.errors.JWSSignatureVerificationFailed();
  }
}

/**
 * Decode a JWT without verification
 * WARNING: Only use this when you've already verified the token or for debugging
 */
export function decodeJwt(token: string): jose.JWTPayload | null {
  try {
    return jose.decodeJwt(token);
  } catch {
    return null;
  }
}

/**
 * Get the JWT header without verification
 */
export function getJwtHeader(token: string): jose.ProtectedHeaderParameters | null {
  try {
    return jose.decodeProtectedHeader(token);
  } catch {
    return null;
  }
}
