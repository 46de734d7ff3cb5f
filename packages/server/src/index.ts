// Programmatic use
export { createAuthServer, type AuthServerOptions } from './app.js';
export { createMemoryStorage, MemoryIdentityStore, MemoryStateStore } from './storage/memory/index.js';
export { createPgStorage, PgIdentityStore, createPgDatabase, createPgPool } from './storage/pg/index.js';
export { UniqueConstraintError, type UniqueTarget } from './storage/errors.js';
export { TokenService, type SessionClaims, type VerifiedClaims } from './services/token-service.js';
export { IdentityService, type ResolvedIdentity } from './services/identity-service.js';
export { LoginService, type LoginResult, type LoginInitiation } from './services/login-service.js';
export { AccessGate, type GateResult } from './services/access-gate.js';
export { Authorizer, type AuthorizationDecision } from './services/authorization.js';
export {
  createTenantPolicy,
  perSignupPolicy,
  singleTenantPolicy,
  emailDomainPolicy,
  type TenantResolutionPolicy,
} from './services/tenant-policy.js';
export { OidcIdentityProvider, type OidcIdentityProviderOptions } from './providers/oidc-provider.js';
export type { IIdentityProvider } from './providers/identity-provider.js';
export { accessGate } from './middleware/bearer-auth.js';
export { requireTenantScope, requireIdentity } from './middleware/tenant-scope.js';
export { HttpMetrics, metricsMiddleware } from './metrics/http-metrics.js';
export * from './logging/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
