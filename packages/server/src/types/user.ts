/**
 * Local user, bound to one external subject and one tenant for life
 */
export interface User {
  id: string;
  tenantId: string;
  externalSubject: string; // `sub` at the identity provider
  displayName: string;
  email: string;
  createdAt: Date;
}

/**
 * User with the roles held in their tenant
 */
export interface TenantMember extends User {
  roles: string[];
}

/**
 * Identity asserted by the external identity provider
 *
 * Every field is optional here; the login service decides what is required.
 */
export interface ExternalIdentityAssertion {
  subject?: string;
  email?: string;
  emailVerified?: boolean;
  displayName?: string;
  nonce?: string;
}

/**
 * Validated external identity
 */
export interface ExternalIdentity {
  subject: string;
  email: string;
  displayName: string;
}
