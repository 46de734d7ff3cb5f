/**
 * Google OpenID Connect endpoints, used unless overridden in configuration
 */
export const GOOGLE_PROVIDER = {
  authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
  tokenEndpoint: 'https://oauth2.googleapis.com/token',
  userinfoEndpoint: 'https://openidconnect.googleapis.com/v1/userinfo',
  jwksUri: 'https://www.googleapis.com/oauth2/v3/certs',
  issuer: 'https://accounts.google.com',
  defaultScopes: ['openid', 'profile', 'email'],
} as const;
