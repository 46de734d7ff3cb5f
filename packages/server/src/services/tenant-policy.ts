import type { TenancyConfig } from '../config/index.js';
import type { ExternalIdentity } from '../types/user.js';
import {
  TENANT_POLICY_PER_SIGNUP,
  TENANT_POLICY_SINGLE,
  TENANT_POLICY_EMAIL_DOMAIN,
} from '../config/constants.js';

/**
 * Decides which tenant a first-time user lands in
 *
 * `tenantKeyFor` returns the key of a shared tenant to join (created on
 * demand), or null for a new tenant of their own.
 */
export interface TenantResolutionPolicy {
  readonly name: TenancyConfig['policy'];
  tenantKeyFor(identity: ExternalIdentity): string | null;
}

/**
 * Every new user founds their own tenant
 */
export const perSignupPolicy: TenantResolutionPolicy = {
  name: TENANT_POLICY_PER_SIGNUP,
  tenantKeyFor: () => null,
};

/**
 * Every user shares one tenant
 */
export function singleTenantPolicy(key: string): TenantResolutionPolicy {
  return {
    name: TENANT_POLICY_SINGLE,
    tenantKeyFor: () => key,
  };
}

/**
 * Users sharing an email domain share a tenant
 */
export const emailDomainPolicy: TenantResolutionPolicy = {
  name: TENANT_POLICY_EMAIL_DOMAIN,
  tenantKeyFor: (identity) => {
    const at = identity.email.lastIndexOf('@');
    if (at < 0 || at === identity.email.length - 1) {
      return null;
    }
    return `domain:${identity.email.slice(at + 1).toLowerCase()}`;
  },
};

/**
 * Build the configured tenant-resolution policy
 */
export function createTenantPolicy(
  config: Pick<TenancyConfig, 'policy' | 'singleTenantKey'>
): TenantResolutionPolicy {
  switch (config.policy) {
    case TENANT_POLICY_SINGLE:
      return singleTenantPolicy(config.singleTenantKey);
    case TENANT_POLICY_EMAIL_DOMAIN:
      return emailDomainPolicy;
    case TENANT_POLICY_PER_SIGNUP:
      return perSignupPolicy;
  }
}
