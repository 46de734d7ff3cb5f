import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, ConfigError } from '../../config/index.js';
import { TEST_ENV, TEST_SECRET } from '../e2e/test-setup.js';

function loadError(env: Record<string, string | undefined>): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'org-auth-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should apply defaults', () => {
    const config = loadConfig(TEST_ENV);

    expect(config.server.port).toBe(3000);
    expect(config.auth.algorithm).toBe('HS256');
    expect(config.auth.tokenTtl).toBe(3600);
    expect(config.auth.stateTtl).toBe(600);
    expect(config.auth.stateCookieName).toBe('login_attempt');
    expect(config.auth.stateCookieSecret).toBe(TEST_SECRET);
    expect(config.auth.secureCookies).toBe(false);
    expect(config.auth.exemptPaths).toContain('/auth/callback');
    expect(config.tenancy).toEqual({
      policy: 'per_signup',
      singleTenantKey: 'default',
      ownerRole: 'owner',
      memberRole: 'member',
    });
    expect(config.identityProvider.scopes).toEqual(['openid', 'profile', 'email']);
    expect(config.database.url).toBeUndefined();
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ...TEST_ENV,
      PORT: '8080',
      JWT_ALGORITHM: 'HS512',
      JWT_EXPIRY_SECONDS: '900',
      AUTH_EXEMPT_PATHS: '/health, /public ,',
      TENANT_POLICY: 'email_domain',
      OAUTH_SCOPES: 'openid,email',
      NODE_ENV: 'production',
    });

    expect(config.server.port).toBe(8080);
    expect(config.auth.algorithm).toBe('HS512');
    expect(config.auth.tokenTtl).toBe(900);
    expect(config.auth.exemptPaths).toEqual(['/health', '/public']);
    expect(config.tenancy.policy).toBe('email_domain');
    expect(config.identityProvider.scopes).toEqual(['openid', 'email']);
    expect(config.auth.secureCookies).toBe(true);
  });

  it('should return a frozen configuration', () => {
    const config = loadConfig(TEST_ENV);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.auth)).toBe(true);
    expect(Object.isFrozen(config.auth.exemptPaths)).toBe(true);
  });

  it('should require a signing secret', () => {
    const error = loadError({ ...TEST_ENV, JWT_SECRET_KEY: undefined });

    expect(error.issues).toEqual(['auth.signingSecret: JWT_SECRET_KEY is required']);
  });

  it('should reject a signing secret shorter than 32 bytes', () => {
    const error = loadError({ ...TEST_ENV, JWT_SECRET_KEY: 'short-test-secret' });

    expect(error.issues).toEqual(['auth.signingSecret: JWT_SECRET_KEY must be at least 32 bytes']);
  });

  it('should accept a secret of exactly 32 bytes', () => {
    const config = loadConfig({ ...TEST_ENV, JWT_SECRET_KEY: 'x'.repeat(32) });

    expect(config.auth.signingSecret).toHaveLength(32);
  });

  it('should reject an unsupported algorithm', () => {
    const error = loadError({ ...TEST_ENV, JWT_ALGORITHM: 'RS256' });

    expect(error.issues[0]?.startsWith('auth.algorithm:')).toBe(true);
  });

  it('should reject a non-positive token lifetime', () => {
    const error = loadError({ ...TEST_ENV, JWT_EXPIRY_SECONDS: '0' });

    expect(error.issues[0]?.startsWith('auth.tokenTtl:')).toBe(true);
  });

  it('should report every missing identity provider setting', () => {
    const error = loadError({
      JWT_SECRET_KEY: TEST_SECRET,
    });

    expect(error.issues).toEqual([
      'identityProvider.clientId: GOOGLE_CLIENT_ID is required',
      'identityProvider.clientSecret: GOOGLE_CLIENT_SECRET is required',
      'identityProvider.redirectUri: GOOGLE_OAUTH_REDIRECT_URI is required',
    ]);
  });

  it('should read secrets from files', () => {
    const secretFile = join(dir, 'jwt-secret');
    writeFileSync(secretFile, 'file-test-secret-that-is-at-least-32-bytes\n');

    const config = loadConfig({
      ...TEST_ENV,
      JWT_SECRET_KEY: undefined,
      JWT_SECRET_KEY_FILE: secretFile,
    });

    expect(config.auth.signingSecret).toBe('file-test-secret-that-is-at-least-32-bytes');
  });

  it('should fail when a secret file is missing', () => {
    const error = loadError({ ...TEST_ENV, JWT_SECRET_KEY_FILE: join(dir, 'missing') });

    expect(error.issues).toEqual([`JWT_SECRET_KEY_FILE points to a missing file: ${join(dir, 'missing')}`]);
  });
});
