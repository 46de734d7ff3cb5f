import type { IdentityContext } from '@org-auth/shared';
import type { SecurityEventSink, TokenRejectionReason } from '../logging/security-events.js';
import type { TokenService } from './token-service.js';
import { AuthError } from '../errors/auth-error.js';
import {
  ERROR_EXPIRED_TOKEN,
  ERROR_INVALID_SIGNATURE,
  ERROR_MALFORMED_TOKEN,
} from '../errors/error-codes.js';
import { BEARER_PREFIX } from '../config/constants.js';

export type GateResult =
  | { outcome: 'exempt' }
  | { outcome: 'authenticated'; identity: IdentityContext }
  | { outcome: 'rejected'; reason: TokenRejectionReason; error: AuthError };

export interface AccessGateOptions {
  tokenService: Pick<TokenService, 'verify'>;
  exemptPaths: readonly string[];
  events: SecurityEventSink;
}

/**
 * Decides whether a request may proceed on its bearer token
 */
export class AccessGate {
  private readonly tokenService: Pick<TokenService, 'verify'>;
  private readonly exemptPaths: ReadonlySet<string>;
  private readonly events: SecurityEventSink;

  constructor(options: AccessGateOptions) {
    this.tokenService = options.tokenService;
    this.exemptPaths = new Set(options.exemptPaths);
    this.events = options.events;
  }

  isExempt(path: string): boolean {
    return this.exemptPaths.has(path);
  }

  /**
   * Exempt paths are decided before the header is looked at
   */
  async authenticate(headerValue: string | undefined, path: string): Promise<GateResult> {
    if (this.isExempt(path)) {
      return { outcome: 'exempt' };
    }

    const token = extractBearerToken(headerValue);
    if (token === null) {
      return this.reject(
        'missing_or_malformed_header',
        path,
        AuthError.missingCredentials('Authorization header must be "Bearer <token>"')
      );
    }

    try {
      const claims = await this.tokenService.verify(token);
      const name = claims.extensions['name'];
      const identity: IdentityContext = {
        userId: claims.sub,
        tenantId: claims.tenant_id,
        email: claims.email,
        roles: claims.roles,
      };
      if (typeof name === 'string') {
        identity.name = name;
      }
      return { outcome: 'authenticated', identity };
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      const reason = rejectionReason(error);
      if (reason === null) {
        throw error;
      }
      return this.reject(reason, path, error);
    }
  }

  private reject(reason: TokenRejectionReason, path: string, error: AuthError): GateResult {
    this.events.emit({ type: 'token_rejected', reason, path });
    return { outcome: 'rejected', reason, error };
  }
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.slice(BEARER_PREFIX.length);
  if (token.length === 0 || /\s/.test(token)) {
    return null;
  }
  return token;
}

function rejectionReason(error: AuthError): TokenRejectionReason | null {
  switch (error.code) {
    case ERROR_MALFORMED_TOKEN:
      return 'malformed';
    case ERROR_INVALID_SIGNATURE:
      return 'invalid_signature';
    case ERROR_EXPIRED_TOKEN:
      return 'expired';
    default:
      return null;
  }
}
