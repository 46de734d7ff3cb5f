import type { Tenant } from '../../types/tenant.js';
import type { User, TenantMember } from '../../types/user.js';
import type {
  IIdentityStore,
  CreateTenantAndOwnerInput,
  AddMemberInput,
  ProvisionedUser,
} from '../interfaces/identity-store.js';
import type { SqlDatabase, SqlSession } from './client.js';
import { uniqueViolationTarget } from './client.js';
import { UniqueConstraintError } from '../errors.js';
import { AuthError } from '../../errors/auth-error.js';
import { generateId } from '../../crypto/random.js';

interface TenantRow {
  id: string;
  key: string | null;
  created_at: Date;
}

interface UserRow {
  id: string;
  tenant_id: string;
  external_subject: string;
  display_name: string;
  email: string;
  created_at: Date;
}

interface MemberRow extends UserRow {
  roles: string[] | null;
}

interface RoleRow {
  role: string;
}

function rowToTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    key: row.key,
    createdAt: row.created_at,
  };
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    externalSubject: row.external_subject,
    displayName: row.display_name,
    email: row.email,
    createdAt: row.created_at,
  };
}

const USER_COLUMNS = 'id, tenant_id, external_subject, display_name, email, created_at';

/**
 * PostgreSQL identity store
 *
 * Uniqueness is enforced by the schema; violations are reported as
 * UniqueConstraintError, everything else as store_unavailable.
 */
export class PgIdentityStore implements IIdentityStore {
  constructor(private readonly db: SqlDatabase) {}

  async findUserByExternalSubject(subject: string): Promise<User | null> {
    return this.run('findUserByExternalSubject', async () => {
      const { rows } = await this.db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE external_subject = $1`,
        [subject]
      );
      const row = rows[0];
      return row ? rowToUser(row) : null;
    });
  }

  async createTenantAndOwner(input: CreateTenantAndOwnerInput): Promise<ProvisionedUser> {
    return this.run('createTenantAndOwner', () =>
      this.db.transaction(async (session) => {
        const { rows } = await session.query<TenantRow>(
          'INSERT INTO tenants (id, key) VALUES ($1, $2) RETURNING id, key, created_at',
          [generateId(), input.tenantKey ?? null]
        );
        const tenantRow = rows[0];
        if (!tenantRow) {
          throw AuthError.storeUnavailable('Tenant insert returned no row');
        }
        const tenant = rowToTenant(tenantRow);
        const user = await insertUser(session, tenant.id, input);
        await insertRole(session, user.id, tenant.id, input.ownerRole);

        return { tenant, user, roles: [input.ownerRole] };
      })
    );
  }

  async addMember(input: AddMemberInput): Promise<ProvisionedUser> {
    return this.run('addMember', () =>
      this.db.transaction(async (session) => {
        const { rows } = await session.query<TenantRow>(
          'SELECT id, key, created_at FROM tenants WHERE id = $1',
          [input.tenantId]
        );
        const tenantRow = rows[0];
        if (!tenantRow) {
          throw AuthError.storeUnavailable(`Tenant not found: ${input.tenantId}`);
        }
        const tenant = rowToTenant(tenantRow);
        const user = await insertUser(session, tenant.id, input);
        await insertRole(session, user.id, tenant.id, input.role);

        return { tenant, user, roles: [input.role] };
      })
    );
  }

  async getRoles(userId: string, tenantId: string): Promise<string[]> {
    return this.run('getRoles', async () => {
      const { rows } = await this.db.query<RoleRow>(
        'SELECT role FROM role_assignments WHERE user_id = $1 AND tenant_id = $2 ORDER BY role',
        [userId, tenantId]
      );
      return rows.map((row) => row.role);
    });
  }

  async findTenantById(id: string): Promise<Tenant | null> {
    return this.run('findTenantById', async () => {
      const { rows } = await this.db.query<TenantRow>(
        'SELECT id, key, created_at FROM tenants WHERE id = $1',
        [id]
      );
      const row = rows[0];
      return row ? rowToTenant(row) : null;
    });
  }

  async findTenantByKey(key: string): Promise<Tenant | null> {
    return this.run('findTenantByKey', async () => {
      const { rows } = await this.db.query<TenantRow>(
        'SELECT id, key, created_at FROM tenants WHERE key = $1',
        [key]
      );
      const row = rows[0];
      return row ? rowToTenant(row) : null;
    });
  }

  async listMembers(tenantId: string): Promise<TenantMember[]> {
    return this.run('listMembers', async () => {
      const { rows } = await this.db.query<MemberRow>(
        `SELECT u.id, u.tenant_id, u.external_subject, u.display_name, u.email, u.created_at,
                array_agg(r.role ORDER BY r.role) FILTER (WHERE r.role IS NOT NULL) AS roles
           FROM users u
           LEFT JOIN role_assignments r ON r.user_id = u.id AND r.tenant_id = u.tenant_id
          WHERE u.tenant_id = $1
          GROUP BY u.id
          ORDER BY u.created_at, u.id`,
        [tenantId]
      );
      return rows.map((row) => ({ ...rowToUser(row), roles: row.roles ?? [] }));
    });
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.db.query('SELECT 1'));
  }

  /**
   * Translate back-end failures into the store's error contract
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AuthError || error instanceof UniqueConstraintError) {
        throw error;
      }
      const target = uniqueViolationTarget(error);
      if (target) {
        throw new UniqueConstraintError(target, { cause: error });
      }
      throw AuthError.storeUnavailable(`Identity store ${operation} failed`, error);
    }
  }
}

async function insertUser(
  session: SqlSession,
  tenantId: string,
  input: { externalSubject: string; email: string; displayName: string }
): Promise<User> {
  const { rows } = await session.query<UserRow>(
    `INSERT INTO users (id, tenant_id, external_subject, display_name, email)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${USER_COLUMNS}`,
    [generateId(), tenantId, input.externalSubject, input.displayName, input.email]
  );
  const row = rows[0];
  if (!row) {
    throw AuthError.storeUnavailable('User insert returned no row');
  }
  return rowToUser(row);
}

async function insertRole(
  session: SqlSession,
  userId: string,
  tenantId: string,
  role: string
): Promise<void> {
  await session.query(
    'INSERT INTO role_assignments (user_id, tenant_id, role) VALUES ($1, $2, $3)',
    [userId, tenantId, role]
  );
}
