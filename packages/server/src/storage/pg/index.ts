import type { IStorage } from '../interfaces/index.js';
import type { LoginAttempt } from '../../types/login.js';
import { MemoryStateStore } from '../memory/state-store.js';
import { createPgDatabase, createPgPool, type PgPoolOptions } from './client.js';
import { PgIdentityStore } from './identity-store.js';

export { PgIdentityStore } from './identity-store.js';
export {
  createPgDatabase,
  createPgPool,
  uniqueViolationTarget,
  type SqlDatabase,
  type SqlSession,
  type SqlResult,
  type PgPoolOptions,
} from './client.js';

/**
 * Create PostgreSQL-backed storage
 *
 * Login attempts are kept in process memory, so the callback must reach the
 * instance that started the login.
 */
export function createPgStorage(options: PgPoolOptions): IStorage {
  const db = createPgDatabase(createPgPool(options));
  const loginAttempts = new MemoryStateStore<LoginAttempt>();

  return {
    identities: new PgIdentityStore(db),
    loginAttempts,
    close: async () => {
      loginAttempts.close();
      await db.close();
    },
  };
}
