import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  setupTestContext,
  startLogin,
  completeLogin,
  loginAs,
  bearer,
  ALICE,
  BOB,
  type TestContext,
  type WhoAmIResponse,
} from './test-setup.js';
import type { ErrorResponse, TokenResponse } from '@org-auth/shared';
import { decodeJwt, getJwtHeader } from '../../crypto/jwt.js';

describe('Login Initiation', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  it('should redirect to the identity provider with state and nonce', async () => {
    const res = await ctx.app.request('/auth/login');

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get('location') ?? '');
    expect(location.origin).toBe('https://idp.test');
    expect(location.searchParams.get('state')).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(location.searchParams.get('nonce')).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  it('should set a signed HttpOnly attempt cookie scoped to /auth', async () => {
    const res = await ctx.app.request('/auth/login');
    const cookie = res.headers.get('set-cookie') ?? '';

    expect(cookie.startsWith('login_attempt=')).toBe(true);
    expect(cookie).toContain('Max-Age=600');
    expect(cookie).toContain('Path=/auth');
    expect(cookie).toContain('HttpOnly');
    expect(cookie).toContain('SameSite=Lax');
  });

  it('should accept POST as well as GET', async () => {
    const res = await ctx.app.request('/auth/login', { method: 'POST' });

    expect(res.status).toBe(302);
  });

  it('should issue different state for each attempt', async () => {
    const first = await startLogin(ctx);
    const second = await startLogin(ctx);

    expect(first.state).not.toBe(second.state);
    expect(first.cookie).not.toBe(second.cookie);
  });
});

describe('Login Callback', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  it('should return a bearer token for a valid callback', async () => {
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(res.headers.get('pragma')).toBe('no-cache');

    const body = (await res.json()) as TokenResponse;
    expect(body.token_type).toBe('Bearer');
    expect(body.expires_in).toBe(3600);
    expect(body.access_token.split('.')).toHaveLength(3);
  });

  it('should sign the token with HS256 and the expected claims', async () => {
    const token = await loginAs(ctx, ALICE);

    expect(getJwtHeader(token)).toEqual({ alg: 'HS256', typ: 'JWT' });

    const payload = decodeJwt(token);
    expect(payload?.['email']).toBe('alice@example.com');
    expect(payload?.['roles']).toEqual(['owner']);
    expect(payload?.['name']).toBe('Alice Example');
    expect(typeof payload?.['tenant_id']).toBe('string');
    expect(payload?.exp).toBe((payload?.iat ?? 0) + 3600);
  });

  it('should clear the attempt cookie on the callback', async () => {
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');
    const cookie = res.headers.get('set-cookie') ?? '';

    expect(cookie.startsWith('login_attempt=;')).toBe(true);
    expect(cookie).toContain('Max-Age=0');
  });

  it('should give the first user of a new tenant the owner role', async () => {
    const token = await loginAs(ctx, ALICE);

    const res = await ctx.app.request('/secure/whoami', { headers: bearer(token) });
    expect(res.status).toBe(200);

    const body = (await res.json()) as WhoAmIResponse;
    expect(body.user.email).toBe('alice@example.com');
    expect(body.user.name).toBe('Alice Example');
    expect(body.user.roles).toEqual(['owner']);
  });

  it('should resolve the same user and tenant on a second login', async () => {
    const first = await loginAs(ctx, ALICE, 'code-first');
    const second = await loginAs(ctx, ALICE, 'code-second');

    const firstUser = ((await (
      await ctx.app.request('/secure/whoami', { headers: bearer(first) })
    ).json()) as WhoAmIResponse).user;
    const secondUser = ((await (
      await ctx.app.request('/secure/whoami', { headers: bearer(second) })
    ).json()) as WhoAmIResponse).user;

    expect(secondUser.user_id).toBe(firstUser.user_id);
    expect(secondUser.tenant_id).toBe(firstUser.tenant_id);
    expect(secondUser.roles).toEqual(['owner']);
  });

  it('should create a separate tenant for each new user by default', async () => {
    const aliceToken = await loginAs(ctx, ALICE);
    const bobToken = await loginAs(ctx, BOB);

    expect(decodeJwt(aliceToken)?.['tenant_id']).not.toBe(decodeJwt(bobToken)?.['tenant_id']);
    expect(decodeJwt(bobToken)?.['roles']).toEqual(['owner']);
  });

  it('should log login_succeeded with the new-user flag', async () => {
    await loginAs(ctx, ALICE, 'code-first');
    await loginAs(ctx, ALICE, 'code-second');

    const events = ctx.events.ofType('login_succeeded');
    expect(events.map((event) => event.isNewUser)).toEqual([true, false]);
  });

  it('should reject a presented state that does not match', async () => {
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, { ...login, state: 'forged-state' }, 'code-1');

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorResponse;
    expect(body).toEqual({
      error: 'login_failed',
      error_description: 'Sign-in could not be completed. Please start again.',
    });
    expect(ctx.identityProvider.exchangedCodes).toEqual([]);
    expect(ctx.events.ofType('state_mismatch')).toEqual([
      { type: 'state_mismatch', reason: 'mismatch' },
    ]);
  });

  it('should not call the identity store on a state mismatch', async () => {
    const findSpy = vi.spyOn(ctx.storage.identities, 'findUserByExternalSubject');
    const createSpy = vi.spyOn(ctx.storage.identities, 'createTenantAndOwner');
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    await completeLogin(ctx, { ...login, state: 'forged-state' }, 'code-1');

    expect(findSpy).not.toHaveBeenCalled();
    expect(createSpy).not.toHaveBeenCalled();
  });

  it('should reject a callback without the attempt cookie', async () => {
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const res = await ctx.app.request(
      `/auth/callback?${new URLSearchParams({ state: login.state, code: 'code-1' }).toString()}`
    );

    expect(res.status).toBe(400);
    expect(ctx.events.ofType('state_mismatch')).toEqual([
      { type: 'state_mismatch', reason: 'missing_stored' },
    ]);
  });

  it('should reject a tampered attempt cookie', async () => {
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const res = await completeLogin(
      ctx,
      { ...login, cookie: `login_attempt=forged-attempt-id.${'A'.repeat(43)}%3D` },
      'code-1'
    );

    expect(res.status).toBe(400);
    expect(ctx.identityProvider.exchangedCodes).toEqual([]);
  });

  it('should not accept the same attempt twice', async () => {
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const first = await completeLogin(ctx, login, 'code-1');
    const replay = await completeLogin(ctx, login, 'code-1');

    expect(first.status).toBe(200);
    expect(replay.status).toBe(400);
    expect(ctx.identityProvider.exchangedCodes).toEqual(['code-1']);
  });

  it('should map an identity provider error to login_failed', async () => {
    const login = await startLogin(ctx);

    const res = await ctx.app.request(
      `/auth/callback?${new URLSearchParams({ state: login.state, error: 'access_denied' }).toString()}`,
      { headers: { Cookie: login.cookie } }
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('login_failed');
    expect(ctx.events.ofType('state_mismatch')).toEqual([]);
  });

  it('should treat a forged identity provider error as a state mismatch', async () => {
    const login = await startLogin(ctx);

    const res = await ctx.app.request(
      `/auth/callback?${new URLSearchParams({ state: 'forged-state', error: 'access_denied' }).toString()}`,
      { headers: { Cookie: login.cookie } }
    );

    expect(res.status).toBe(400);
    expect(ctx.events.ofType('state_mismatch')).toEqual([
      { type: 'state_mismatch', reason: 'mismatch' },
    ]);
  });

  it('should reject a callback without a code', async () => {
    const login = await startLogin(ctx);

    const res = await ctx.app.request(
      `/auth/callback?${new URLSearchParams({ state: login.state }).toString()}`,
      { headers: { Cookie: login.cookie } }
    );

    expect(res.status).toBe(400);
    expect(ctx.identityProvider.exchangedCodes).toEqual([]);
  });

  it('should return 502 when the identity provider fails', async () => {
    ctx.identityProvider.failure = new Error('connection reset');
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(502);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('upstream_unavailable');
    expect(ctx.events.ofType('upstream_failure')).toHaveLength(1);
  });

  it('should reject an identity without a display name', async () => {
    ctx.identityProvider.register('code-1', { subject: 'google-sub-carol', email: 'carol@example.com' });
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(400);
    expect(ctx.events.ofType('incomplete_identity')).toEqual([
      { type: 'incomplete_identity', missing: ['displayName'] },
    ]);
  });

  it('should reject an identity whose email is unverified', async () => {
    ctx.identityProvider.register('code-1', { ...ALICE, emailVerified: false });
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(400);
  });

  it('should reject an assertion carrying another attempt nonce', async () => {
    ctx.identityProvider.register('code-1', { ...ALICE, nonce: 'nonce-from-elsewhere' });
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(400);
  });

  it('should accept an assertion echoing the attempt nonce', async () => {
    const login = await startLogin(ctx);
    ctx.identityProvider.register('code-1', { ...ALICE, nonce: login.nonce });

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(200);
  });

  it('should reject an email already bound to another subject', async () => {
    await loginAs(ctx, ALICE);
    ctx.identityProvider.register('code-2', {
      ...ALICE,
      subject: 'google-sub-impostor',
      email: 'ALICE@example.com',
    });
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-2');

    expect(res.status).toBe(400);
    expect(ctx.events.ofType('identity_conflict')).toEqual([
      { type: 'identity_conflict', target: 'email' },
    ]);
  });

  it('should return 503 when the identity store is down', async () => {
    vi.spyOn(ctx.storage.identities, 'findUserByExternalSubject').mockRejectedValue(
      new Error('connection refused')
    );
    ctx.identityProvider.register('code-1', ALICE);
    const login = await startLogin(ctx);

    const res = await completeLogin(ctx, login, 'code-1');

    expect(res.status).toBe(503);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('service_unavailable');
  });
});

describe('Tenant Policies', () => {
  it('should place everyone in one tenant under the single policy', async () => {
    const ctx = setupTestContext({ TENANT_POLICY: 'single' });

    const aliceToken = await loginAs(ctx, ALICE);
    const bobToken = await loginAs(ctx, BOB);

    expect(decodeJwt(bobToken)?.['tenant_id']).toBe(decodeJwt(aliceToken)?.['tenant_id']);
    expect(decodeJwt(aliceToken)?.['roles']).toEqual(['owner']);
    expect(decodeJwt(bobToken)?.['roles']).toEqual(['member']);
  });

  it('should group users by email domain under the email_domain policy', async () => {
    const ctx = setupTestContext({ TENANT_POLICY: 'email_domain' });

    const aliceToken = await loginAs(ctx, ALICE);
    const bobToken = await loginAs(ctx, BOB);
    const daveToken = await loginAs(ctx, {
      subject: 'google-sub-dave',
      email: 'dave@other.test',
      emailVerified: true,
      displayName: 'Dave Other',
    });

    expect(decodeJwt(bobToken)?.['tenant_id']).toBe(decodeJwt(aliceToken)?.['tenant_id']);
    expect(decodeJwt(daveToken)?.['tenant_id']).not.toBe(decodeJwt(aliceToken)?.['tenant_id']);
    expect(decodeJwt(daveToken)?.['roles']).toEqual(['owner']);
  });
});
