export type { Tenant } from './tenant.js';
export type { User, TenantMember, ExternalIdentityAssertion, ExternalIdentity } from './user.js';
export type { AuthVariables, AuthEnv, AuthContext } from './hono.js';
export type { LoginAttempt } from './login.js';
