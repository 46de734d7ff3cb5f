import type { Tenant } from '../../types/tenant.js';
import type { User, TenantMember } from '../../types/user.js';
import type {
  IIdentityStore,
  CreateTenantAndOwnerInput,
  AddMemberInput,
  ProvisionedUser,
} from '../interfaces/identity-store.js';
import { UniqueConstraintError } from '../errors.js';
import { AuthError } from '../../errors/auth-error.js';
import { generateId } from '../../crypto/random.js';

/**
 * In-memory identity store
 *
 * Each write checks and mutates synchronously, so concurrent calls on the
 * event loop observe each other's results.
 */
export class MemoryIdentityStore implements IIdentityStore {
  private tenants = new Map<string, Tenant>();
  private users = new Map<string, User>();
  // `${userId}:${tenantId}` -> role names
  private roles = new Map<string, Set<string>>();

  // Uniqueness indexes
  private subjectIndex = new Map<string, string>();
  private emailIndex = new Map<string, string>(); // lower-cased email -> user id
  private tenantKeyIndex = new Map<string, string>();

  async findUserByExternalSubject(subject: string): Promise<User | null> {
    const id = this.subjectIndex.get(subject);
    if (!id) return null;
    return this.users.get(id) ?? null;
  }

  async createTenantAndOwner(input: CreateTenantAndOwnerInput): Promise<ProvisionedUser> {
    this.assertUserUnique(input.externalSubject, input.email);
    if (input.tenantKey !== undefined && this.tenantKeyIndex.has(input.tenantKey)) {
      throw new UniqueConstraintError('tenant_key');
    }

    const tenant: Tenant = {
      id: generateId(),
      key: input.tenantKey ?? null,
      createdAt: new Date(),
    };
    this.tenants.set(tenant.id, tenant);
    if (tenant.key !== null) {
      this.tenantKeyIndex.set(tenant.key, tenant.id);
    }

    const user = this.insertUser(tenant.id, input);
    this.roles.set(roleKey(user.id, tenant.id), new Set([input.ownerRole]));

    return { tenant, user, roles: [input.ownerRole] };
  }

  async addMember(input: AddMemberInput): Promise<ProvisionedUser> {
    const tenant = this.tenants.get(input.tenantId);
    if (!tenant) {
      throw AuthError.storeUnavailable(`Tenant not found: ${input.tenantId}`);
    }
    this.assertUserUnique(input.externalSubject, input.email);

    const user = this.insertUser(tenant.id, input);
    this.roles.set(roleKey(user.id, tenant.id), new Set([input.role]));

    return { tenant, user, roles: [input.role] };
  }

  async getRoles(userId: string, tenantId: string): Promise<string[]> {
    return Array.from(this.roles.get(roleKey(userId, tenantId)) ?? []);
  }

  async findTenantById(id: string): Promise<Tenant | null> {
    return this.tenants.get(id) ?? null;
  }

  async findTenantByKey(key: string): Promise<Tenant | null> {
    const id = this.tenantKeyIndex.get(key);
    if (!id) return null;
    return this.tenants.get(id) ?? null;
  }

  async listMembers(tenantId: string): Promise<TenantMember[]> {
    return Array.from(this.users.values())
      .filter((user) => user.tenantId === tenantId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((user) => ({
        ...user,
        roles: Array.from(this.roles.get(roleKey(user.id, tenantId)) ?? []),
      }));
  }

  async ping(): Promise<void> {
    // Always reachable
  }

  /**
   * Get storage stats
   */
  stats(): { tenants: number; users: number } {
    return { tenants: this.tenants.size, users: this.users.size };
  }

  private assertUserUnique(externalSubject: string, email: string): void {
    if (this.subjectIndex.has(externalSubject)) {
      throw new UniqueConstraintError('external_subject');
    }
    if (this.emailIndex.has(email.toLowerCase())) {
      throw new UniqueConstraintError('email');
    }
  }

  private insertUser(
    tenantId: string,
    input: { externalSubject: string; email: string; displayName: string }
  ): User {
    const user: User = {
      id: generateId(),
      tenantId,
      externalSubject: input.externalSubject,
      displayName: input.displayName,
      email: input.email,
      createdAt: new Date(),
    };

    this.users.set(user.id, user);
    this.subjectIndex.set(user.externalSubject, user.id);
    this.emailIndex.set(user.email.toLowerCase(), user.id);

    return user;
  }
}

function roleKey(userId: string, tenantId: string): string {
  return `${userId}:${tenantId}`;
}
