import type { Context, MiddlewareHandler } from 'hono';
import type { IdentityContext } from '@org-auth/shared';
import type { AuthEnv } from '../types/hono.js';
import type { SecurityEventSink } from '../logging/security-events.js';
import { AuthError } from '../errors/auth-error.js';

/**
 * Identity set by the access gate; its absence means the route was left
 * exempt by mistake
 */
export function requireIdentity(c: Context<AuthEnv>): IdentityContext {
  const identity = c.get('identity');
  if (!identity) {
    throw AuthError.missingCredentials('Route requires an authenticated identity');
  }
  return identity;
}

/**
 * Reject requests whose path tenant differs from the token's tenant
 */
export function requireTenantScope(
  events: SecurityEventSink,
  paramName: string = 'tenantId'
): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const identity = requireIdentity(c);
    const requestedTenant = c.req.param(paramName);

    if (requestedTenant !== undefined && requestedTenant !== identity.tenantId) {
      events.emit({
        type: 'tenant_scope_violation',
        userId: identity.userId,
        tokenTenant: identity.tenantId,
        requestedTenant,
      });
      throw AuthError.tenantScopeViolation(
        `Token for tenant ${identity.tenantId} used on tenant ${requestedTenant}`
      );
    }

    await next();
  };
}
