import type { IIdentityStore, ProvisionedUser } from '../storage/interfaces/identity-store.js';
import type { TenancyConfig } from '../config/index.js';
import type { SecurityEventSink } from '../logging/security-events.js';
import type { Tenant } from '../types/tenant.js';
import type { User, ExternalIdentity } from '../types/user.js';
import type { TenantResolutionPolicy } from './tenant-policy.js';
import { UniqueConstraintError } from '../storage/errors.js';
import { AuthError } from '../errors/auth-error.js';

export interface ResolvedIdentity {
  user: User;
  tenant: Tenant;
  roles: string[];
  isNewUser: boolean;
}

export interface IdentityServiceOptions {
  store: IIdentityStore;
  policy: TenantResolutionPolicy;
  tenancy: Pick<TenancyConfig, 'ownerRole' | 'memberRole'>;
  events: SecurityEventSink;
}

// One pass may lose a subject race and the next a tenant-key race
const MAX_RESOLVE_ATTEMPTS = 3;

/**
 * Maps an external identity to a local user, tenant and roles,
 * provisioning both on first login
 */
export class IdentityService {
  private readonly store: IIdentityStore;
  private readonly policy: TenantResolutionPolicy;
  private readonly tenancy: Pick<TenancyConfig, 'ownerRole' | 'memberRole'>;
  private readonly events: SecurityEventSink;

  constructor(options: IdentityServiceOptions) {
    this.store = options.store;
    this.policy = options.policy;
    this.tenancy = options.tenancy;
    this.events = options.events;
  }

  /**
   * Find or create the local user for an external identity
   *
   * Concurrent first logins for one subject yield a single user: the loser of
   * the uniqueness race re-reads the winner's row.
   */
  async resolve(identity: ExternalIdentity): Promise<ResolvedIdentity> {
    for (let attempt = 0; attempt < MAX_RESOLVE_ATTEMPTS; attempt++) {
      try {
        const existing = await this.store.findUserByExternalSubject(identity.subject);
        if (existing) {
          return await this.loadExisting(existing);
        }

        const provisioned = await this.provision(identity);
        return { ...provisioned, isNewUser: true };
      } catch (error) {
        if (!(error instanceof UniqueConstraintError)) {
          throw toStoreError(error);
        }

        if (error.target === 'email' && !(await this.subjectNowExists(identity.subject))) {
          this.events.emit({ type: 'identity_conflict', target: 'email' });
          throw AuthError.identityConflict('Email is already bound to another external subject');
        }
        // Lost a race; the next pass reads the winner's user or tenant
      }
    }

    throw AuthError.internalError(
      `Identity resolution did not settle after ${MAX_RESOLVE_ATTEMPTS} attempts`
    );
  }

  private async loadExisting(user: User): Promise<ResolvedIdentity> {
    const tenant = await this.store.findTenantById(user.tenantId);
    if (!tenant) {
      throw AuthError.internalError(`User ${user.id} references missing tenant ${user.tenantId}`);
    }

    const roles = await this.store.getRoles(user.id, tenant.id);
    if (roles.length === 0) {
      throw AuthError.internalError(`User ${user.id} holds no roles`);
    }

    return { user, tenant, roles, isNewUser: false };
  }

  private async provision(identity: ExternalIdentity): Promise<ProvisionedUser> {
    const profile = {
      externalSubject: identity.subject,
      email: identity.email,
      displayName: identity.displayName,
    };

    const tenantKey = this.policy.tenantKeyFor(identity);
    if (tenantKey === null) {
      return this.store.createTenantAndOwner({ ...profile, ownerRole: this.tenancy.ownerRole });
    }

    const tenant = await this.store.findTenantByKey(tenantKey);
    if (tenant) {
      return this.store.addMember({ ...profile, tenantId: tenant.id, role: this.tenancy.memberRole });
    }

    return this.store.createTenantAndOwner({
      ...profile,
      tenantKey,
      ownerRole: this.tenancy.ownerRole,
    });
  }

  private async subjectNowExists(subject: string): Promise<boolean> {
    try {
      return (await this.store.findUserByExternalSubject(subject)) !== null;
    } catch (error) {
      throw toStoreError(error);
    }
  }
}

function toStoreError(error: unknown): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  return AuthError.storeUnavailable('Identity store failed', error);
}
