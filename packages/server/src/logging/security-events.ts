import type { Logger } from 'pino';

export type TokenRejectionReason =
  | 'missing_or_malformed_header'
  | 'malformed'
  | 'invalid_signature'
  | 'expired';

/**
 * Security-relevant events. Payloads never carry tokens, codes or state values.
 */
export type SecurityEvent =
  | { type: 'login_succeeded'; userId: string; tenantId: string; isNewUser: boolean }
  | { type: 'state_mismatch'; reason: 'missing_stored' | 'missing_presented' | 'mismatch' }
  | { type: 'incomplete_identity'; missing: string[] }
  | { type: 'upstream_failure'; detail: string }
  | { type: 'identity_conflict'; target: 'email' }
  | { type: 'token_rejected'; reason: TokenRejectionReason; path: string }
  | { type: 'forbidden'; userId: string; held: string[]; required: string[] }
  | { type: 'tenant_scope_violation'; userId: string; tokenTenant: string; requestedTenant: string };

/**
 * Destination for security events. Emitting never fails the caller.
 */
export interface SecurityEventSink {
  emit(event: SecurityEvent): void;
}

/**
 * Writes security events to a pino logger
 */
export class PinoSecurityEventSink implements SecurityEventSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'security' });
  }

  emit(event: SecurityEvent): void {
    const { type, ...fields } = event;

    if (type === 'login_succeeded') {
      this.logger.info({ event: type, ...fields }, 'security event');
    } else {
      this.logger.warn({ event: type, ...fields }, 'security event');
    }
  }
}
