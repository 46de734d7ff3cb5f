import type { ErrorResponse, PublicErrorCode } from '@org-auth/shared';
import {
  type AuthErrorCode,
  type AuthErrorStatus,
  ERROR_STATUS_CODES,
  PUBLIC_ERROR_CODES,
  PUBLIC_ERROR_DESCRIPTIONS,
  ERROR_MALFORMED_TOKEN,
  ERROR_INVALID_SIGNATURE,
  ERROR_EXPIRED_TOKEN,
  ERROR_MISSING_CREDENTIALS,
  ERROR_STATE_MISMATCH,
  ERROR_INCOMPLETE_IDENTITY,
  ERROR_ACCESS_DENIED,
  ERROR_IDENTITY_CONFLICT,
  ERROR_INVALID_REQUEST,
  ERROR_UPSTREAM_AUTH,
  ERROR_INSUFFICIENT_ROLE,
  ERROR_TENANT_SCOPE_VIOLATION,
  ERROR_STORE_UNAVAILABLE,
  ERROR_RATE_LIMITED,
  ERROR_INTERNAL,
} from './error-codes.js';

/**
 * Authentication service error
 *
 * `description` is for logs. The response body only carries the public code
 * and its fixed description.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: AuthErrorStatus;
  public readonly publicCode: PublicErrorCode;
  public readonly description: string;

  constructor(code: AuthErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? code;
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.publicCode = PUBLIC_ERROR_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): ErrorResponse {
    return {
      error: this.publicCode,
      error_description: PUBLIC_ERROR_DESCRIPTIONS[this.publicCode],
    };
  }

  // Factory methods

  static malformedToken(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_MALFORMED_TOKEN, description, { cause });
  }

  static invalidSignature(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_INVALID_SIGNATURE, description, { cause });
  }

  static expiredToken(description?: string): AuthError {
    return new AuthError(ERROR_EXPIRED_TOKEN, description);
  }

  static missingCredentials(description?: string): AuthError {
    return new AuthError(ERROR_MISSING_CREDENTIALS, description);
  }

  static stateMismatch(description?: string): AuthError {
    return new AuthError(ERROR_STATE_MISMATCH, description);
  }

  static incompleteIdentity(description?: string): AuthError {
    return new AuthError(ERROR_INCOMPLETE_IDENTITY, description);
  }

  static accessDenied(description?: string): AuthError {
    return new AuthError(ERROR_ACCESS_DENIED, description);
  }

  static identityConflict(description?: string): AuthError {
    return new AuthError(ERROR_IDENTITY_CONFLICT, description);
  }

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static upstreamAuthError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_UPSTREAM_AUTH, description, { cause });
  }

  static insufficientRole(description?: string): AuthError {
    return new AuthError(ERROR_INSUFFICIENT_ROLE, description);
  }

  static tenantScopeViolation(description?: string): AuthError {
    return new AuthError(ERROR_TENANT_SCOPE_VIOLATION, description);
  }

  static storeUnavailable(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_STORE_UNAVAILABLE, description, { cause });
  }

  static rateLimited(description?: string): AuthError {
    return new AuthError(ERROR_RATE_LIMITED, description);
  }

  static internalError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_INTERNAL, description, { cause });
  }
}
