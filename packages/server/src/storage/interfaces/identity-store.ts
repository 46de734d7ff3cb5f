import type { Tenant } from '../../types/tenant.js';
import type { User, TenantMember } from '../../types/user.js';

export interface CreateTenantAndOwnerInput {
  externalSubject: string;
  email: string;
  displayName: string;
  tenantKey?: string;
  ownerRole: string;
}

export interface AddMemberInput {
  tenantId: string;
  externalSubject: string;
  email: string;
  displayName: string;
  role: string;
}

export interface ProvisionedUser {
  tenant: Tenant;
  user: User;
  roles: string[];
}

/**
 * Storage interface for tenants, users and role assignments
 *
 * Writes that break uniqueness reject with UniqueConstraintError; any other
 * back-end failure rejects with AuthError (store_unavailable).
 */
export interface IIdentityStore {
  /**
   * Find a user by the identity provider's subject
   */
  findUserByExternalSubject(subject: string): Promise<User | null>;

  /**
   * Atomically create a tenant, its founding user and the owner role
   */
  createTenantAndOwner(input: CreateTenantAndOwnerInput): Promise<ProvisionedUser>;

  /**
   * Atomically create a user in an existing tenant with one role
   */
  addMember(input: AddMemberInput): Promise<ProvisionedUser>;

  /**
   * Roles the user holds in the tenant (empty when none)
   */
  getRoles(userId: string, tenantId: string): Promise<string[]>;

  findTenantById(id: string): Promise<Tenant | null>;

  findTenantByKey(key: string): Promise<Tenant | null>;

  /**
   * List a tenant's users with their roles, oldest first
   */
  listMembers(tenantId: string): Promise<TenantMember[]>;

  /**
   * Check the back end is reachable
   */
  ping(): Promise<void>;
}
