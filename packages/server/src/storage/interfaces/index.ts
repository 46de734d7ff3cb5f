import type { IIdentityStore } from './identity-store.js';
import type { IStateStore } from './state-store.js';
import type { LoginAttempt } from '../../types/login.js';

export type {
  IIdentityStore,
  CreateTenantAndOwnerInput,
  AddMemberInput,
  ProvisionedUser,
} from './identity-store.js';
export type { IStateStore } from './state-store.js';

/**
 * Storage back ends used by the service
 */
export interface IStorage {
  identities: IIdentityStore;
  loginAttempts: IStateStore<LoginAttempt>;
  close?(): Promise<void>;
}
