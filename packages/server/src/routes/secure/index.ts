import { Hono } from 'hono';
import type { TenantMembersResponse, WhoAmIResponse } from '@org-auth/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { IIdentityStore } from '../../storage/interfaces/identity-store.js';
import type { Authorizer } from '../../services/authorization.js';
import type { SecurityEventSink } from '../../logging/security-events.js';
import { requireIdentity, requireTenantScope } from '../../middleware/tenant-scope.js';
import { AuthError } from '../../errors/auth-error.js';

export interface SecureRoutesOptions {
  store: IIdentityStore;
  authorizer: Authorizer;
  events: SecurityEventSink;
  ownerRole: string;
}

/**
 * Create routes behind the access gate
 *
 * Routes:
 * - GET /secure/whoami - Identity carried by the token
 * - GET /secure/tenants/:tenantId/members - Tenant members (owner only)
 */
export function createSecureRoutes(options: SecureRoutesOptions): Hono<AuthEnv> {
  const { store, authorizer, events, ownerRole } = options;
  const app = new Hono<AuthEnv>();

  app.get('/whoami', (c) => {
    const identity = requireIdentity(c);

    const body: WhoAmIResponse = {
      user: {
        user_id: identity.userId,
        tenant_id: identity.tenantId,
        email: identity.email,
        name: identity.name,
        roles: identity.roles,
      },
    };
    return c.json(body);
  });

  app.get('/tenants/:tenantId/members', requireTenantScope(events), async (c) => {
    const identity = requireIdentity(c);
    authorizer.assert(identity, [ownerRole]);

    const members = await store.listMembers(identity.tenantId).catch((error: unknown) => {
      throw error instanceof AuthError
        ? error
        : AuthError.storeUnavailable('Member listing failed', error);
    });

    const body: TenantMembersResponse = {
      tenant_id: identity.tenantId,
      members: members.map((member) => ({
        user_id: member.id,
        email: member.email,
        display_name: member.displayName,
        roles: member.roles,
        created_at: member.createdAt.toISOString(),
      })),
    };
    return c.json(body);
  });

  return app;
}
