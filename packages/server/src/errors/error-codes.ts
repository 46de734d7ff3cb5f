import type { PublicErrorCode } from '@org-auth/shared';

/**
 * Internal error codes
 *
 * Logged with full detail; responses only carry the public code.
 */

// Session token rejection (Access Gate)
export const ERROR_MALFORMED_TOKEN = 'malformed_token' as const;
export const ERROR_INVALID_SIGNATURE = 'invalid_signature' as const;
export const ERROR_EXPIRED_TOKEN = 'expired_token' as const;
export const ERROR_MISSING_CREDENTIALS = 'missing_credentials' as const;

// Login handshake failures
export const ERROR_STATE_MISMATCH = 'state_mismatch' as const;
export const ERROR_INCOMPLETE_IDENTITY = 'incomplete_identity' as const;
export const ERROR_ACCESS_DENIED = 'access_denied' as const;
export const ERROR_IDENTITY_CONFLICT = 'identity_conflict' as const;
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_UPSTREAM_AUTH = 'upstream_auth_error' as const;

// Authorization
export const ERROR_INSUFFICIENT_ROLE = 'insufficient_role' as const;
export const ERROR_TENANT_SCOPE_VIOLATION = 'tenant_scope_violation' as const;

// Infrastructure
export const ERROR_STORE_UNAVAILABLE = 'store_unavailable' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;
export const ERROR_INTERNAL = 'internal_error' as const;

export type AuthErrorCode =
  | typeof ERROR_MALFORMED_TOKEN
  | typeof ERROR_INVALID_SIGNATURE
  | typeof ERROR_EXPIRED_TOKEN
  | typeof ERROR_MISSING_CREDENTIALS
  | typeof ERROR_STATE_MISMATCH
  | typeof ERROR_INCOMPLETE_IDENTITY
  | typeof ERROR_ACCESS_DENIED
  | typeof ERROR_IDENTITY_CONFLICT
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_UPSTREAM_AUTH
  | typeof ERROR_INSUFFICIENT_ROLE
  | typeof ERROR_TENANT_SCOPE_VIOLATION
  | typeof ERROR_STORE_UNAVAILABLE
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_INTERNAL;

export type AuthErrorStatus = 400 | 401 | 403 | 429 | 500 | 502 | 503;

/**
 * HTTP status codes for internal errors
 */
export const ERROR_STATUS_CODES: Record<AuthErrorCode, AuthErrorStatus> = {
  [ERROR_MALFORMED_TOKEN]: 401,
  [ERROR_INVALID_SIGNATURE]: 401,
  [ERROR_EXPIRED_TOKEN]: 401,
  [ERROR_MISSING_CREDENTIALS]: 401,
  [ERROR_STATE_MISMATCH]: 400,
  [ERROR_INCOMPLETE_IDENTITY]: 400,
  [ERROR_ACCESS_DENIED]: 400,
  [ERROR_IDENTITY_CONFLICT]: 400,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_UPSTREAM_AUTH]: 502,
  [ERROR_INSUFFICIENT_ROLE]: 403,
  [ERROR_TENANT_SCOPE_VIOLATION]: 403,
  [ERROR_STORE_UNAVAILABLE]: 503,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_INTERNAL]: 500,
};

/**
 * Public code exposed in the response body
 */
export const PUBLIC_ERROR_CODES: Record<AuthErrorCode, PublicErrorCode> = {
  [ERROR_MALFORMED_TOKEN]: 'unauthorized',
  [ERROR_INVALID_SIGNATURE]: 'unauthorized',
  [ERROR_EXPIRED_TOKEN]: 'unauthorized',
  [ERROR_MISSING_CREDENTIALS]: 'unauthorized',
  [ERROR_STATE_MISMATCH]: 'login_failed',
  [ERROR_INCOMPLETE_IDENTITY]: 'login_failed',
  [ERROR_ACCESS_DENIED]: 'login_failed',
  [ERROR_IDENTITY_CONFLICT]: 'login_failed',
  [ERROR_INVALID_REQUEST]: 'login_failed',
  [ERROR_UPSTREAM_AUTH]: 'upstream_unavailable',
  [ERROR_INSUFFICIENT_ROLE]: 'forbidden',
  [ERROR_TENANT_SCOPE_VIOLATION]: 'forbidden',
  [ERROR_STORE_UNAVAILABLE]: 'service_unavailable',
  [ERROR_RATE_LIMITED]: 'rate_limited',
  [ERROR_INTERNAL]: 'server_error',
};

/**
 * Public descriptions, one per public code
 */
export const PUBLIC_ERROR_DESCRIPTIONS: Record<PublicErrorCode, string> = {
  unauthorized: 'A valid session token is required.',
  forbidden: 'The session does not grant access to this resource.',
  login_failed: 'Sign-in could not be completed. Please start again.',
  upstream_unavailable: 'The identity provider could not be reached.',
  service_unavailable: 'The service is temporarily unavailable.',
  rate_limited: 'Too many requests. Try again later.',
  server_error: 'An unexpected error occurred.',
};
