/**
 * Verified identity attached to a request by the access gate
 */
export interface IdentityContext {
  userId: string;
  tenantId: string;
  email: string;
  roles: string[];
  name?: string;
}

export interface UserSummary {
  user_id: string;
  tenant_id: string;
  email: string;
  name?: string;
  roles: string[];
}

export interface WhoAmIResponse {
  user: UserSummary;
}

export interface TenantMember {
  user_id: string;
  email: string;
  display_name: string;
  roles: string[];
  created_at: string;
}

export interface TenantMembersResponse {
  tenant_id: string;
  members: TenantMember[];
}
