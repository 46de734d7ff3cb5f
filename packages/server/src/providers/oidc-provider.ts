import { createRemoteJWKSet, jwtVerify, type JWTVerifyGetKey } from 'jose';
import { z } from 'zod';
import type { IdentityProviderConfig } from '../config/index.js';
import type { ExternalIdentityAssertion } from '../types/user.js';
import type { IIdentityProvider } from './identity-provider.js';
import { AuthError } from '../errors/auth-error.js';

export interface OidcIdentityProviderOptions {
  config: IdentityProviderConfig;
  fetch?: typeof fetch;
  /**
   * Key source for id_token verification (defaults to the remote JWKS)
   */
  jwks?: JWTVerifyGetKey;
}

/**
 * Token response from identity provider
 */
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  id_token: z.string().optional(),
});

type Claims = Record<string, unknown>;

function claimAsString(payload: Claims, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function claimAsBoolean(payload: Claims, key: string): boolean | undefined {
  const value = payload[key];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

function toAssertion(claims: Claims): ExternalIdentityAssertion {
  return {
    subject: claimAsString(claims, 'sub'),
    email: claimAsString(claims, 'email'),
    emailVerified: claimAsBoolean(claims, 'email_verified'),
    displayName: claimAsString(claims, 'name'),
    nonce: claimAsString(claims, 'nonce'),
  };
}

/**
 * OpenID Connect authorization-code client
 *
 * Prefers the verified id_token; falls back to the userinfo endpoint when the
 * token response carries none.
 */
export class OidcIdentityProvider implements IIdentityProvider {
  private readonly config: IdentityProviderConfig;
  private readonly fetchFn: typeof fetch;
  private readonly jwks: JWTVerifyGetKey;

  constructor(options: OidcIdentityProviderOptions) {
    this.config = options.config;
    this.fetchFn = options.fetch ?? fetch;
    this.jwks = options.jwks ?? createRemoteJWKSet(new URL(options.config.jwksUri), {
      timeoutDuration: options.config.timeoutMs,
    });
  }

  buildAuthorizationUrl(state: string, nonce: string): string {
    const url = new URL(this.config.authorizationEndpoint);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.config.clientId);
    url.searchParams.set('redirect_uri', this.config.redirectUri);
    url.searchParams.set('scope', this.config.scopes.join(' '));
    url.searchParams.set('state', state);
    url.searchParams.set('nonce', nonce);
    return url.toString();
  }

  async exchangeCodeForIdentity(code: string): Promise<ExternalIdentityAssertion> {
    try {
      const tokens = await this.redeemCode(code);

      if (tokens.id_token) {
        const { payload } = await jwtVerify(tokens.id_token, this.jwks, {
          issuer: this.config.issuer,
          audience: this.config.clientId,
        });
        return toAssertion(payload);
      }

      return toAssertion(await this.fetchUserInfo(tokens.access_token));
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw AuthError.upstreamAuthError(`Identity provider exchange failed: ${detail}`, error);
    }
  }

  private async redeemCode(code: string): Promise<z.infer<typeof tokenResponseSchema>> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.config.redirectUri,
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });

    const response = await this.fetchFn(this.config.tokenEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: body.toString(),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      throw AuthError.upstreamAuthError(`Token endpoint responded with ${response.status}`);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw AuthError.upstreamAuthError('Token endpoint returned an unexpected body');
    }
    return parsed.data;
  }

  private async fetchUserInfo(accessToken: string): Promise<Claims> {
    const response = await this.fetchFn(this.config.userinfoEndpoint, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      throw AuthError.upstreamAuthError(`Userinfo endpoint responded with ${response.status}`);
    }

    const parsed = z.record(z.unknown()).safeParse(await response.json());
    if (!parsed.success) {
      throw AuthError.upstreamAuthError('Userinfo endpoint returned an unexpected body');
    }
    return parsed.data;
  }
}
