import type { ExternalIdentityAssertion } from '../types/user.js';

/**
 * Client for the external OAuth/OIDC identity provider
 */
export interface IIdentityProvider {
  /**
   * URL the browser is sent to, carrying the attempt's state and nonce
   */
  buildAuthorizationUrl(state: string, nonce: string): string;

  /**
   * Redeem an authorization code for the user's asserted identity
   *
   * Rejects with AuthError (upstream_auth_error) on any transport, HTTP or
   * verification failure.
   */
  exchangeCodeForIdentity(code: string): Promise<ExternalIdentityAssertion>;
}
