import type { IdentityContext } from '@org-auth/shared';
import type { SecurityEventSink } from '../logging/security-events.js';
import { AuthError } from '../errors/auth-error.js';

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; reason: 'insufficient_role'; held: string[]; required: string[] };

/**
 * Role-based authorization check
 *
 * Access is granted when the identity holds at least one required role.
 * An empty requirement admits any authenticated identity.
 */
export class Authorizer {
  constructor(private readonly events: SecurityEventSink) {}

  authorize(identity: IdentityContext, requiredRoles: readonly string[]): AuthorizationDecision {
    if (requiredRoles.length === 0) {
      return { allowed: true };
    }

    const held = new Set(identity.roles);
    if (requiredRoles.some((role) => held.has(role))) {
      return { allowed: true };
    }

    const decision: AuthorizationDecision = {
      allowed: false,
      reason: 'insufficient_role',
      held: [...identity.roles],
      required: [...requiredRoles],
    };
    this.events.emit({
      type: 'forbidden',
      userId: identity.userId,
      held: decision.held,
      required: decision.required,
    });
    return decision;
  }

  /**
   * Throw insufficient_role unless the identity holds a required role
   */
  assert(identity: IdentityContext, requiredRoles: readonly string[]): void {
    const decision = this.authorize(identity, requiredRoles);
    if (!decision.allowed) {
      throw AuthError.insufficientRole(
        `Requires one of [${decision.required.join(', ')}], holds [${decision.held.join(', ')}]`
      );
    }
  }
}
