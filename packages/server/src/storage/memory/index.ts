import type { IStorage } from '../interfaces/index.js';
import type { LoginAttempt } from '../../types/login.js';
import { MemoryIdentityStore } from './identity-store.js';
import { MemoryStateStore } from './state-store.js';

export { MemoryIdentityStore } from './identity-store.js';
export { MemoryStateStore } from './state-store.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  const loginAttempts = new MemoryStateStore<LoginAttempt>();

  return {
    identities: new MemoryIdentityStore(),
    loginAttempts,
    close: async () => loginAttempts.close(),
  };
}
