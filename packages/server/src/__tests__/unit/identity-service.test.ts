import { describe, it, expect, beforeEach, vi } from 'vitest';
import { IdentityService } from '../../services/identity-service.js';
import {
  perSignupPolicy,
  singleTenantPolicy,
  emailDomainPolicy,
  createTenantPolicy,
  type TenantResolutionPolicy,
} from '../../services/tenant-policy.js';
import { MemoryIdentityStore } from '../../storage/memory/identity-store.js';
import { UniqueConstraintError } from '../../storage/errors.js';
import { AuthError } from '../../errors/auth-error.js';
import { RecordingEventSink } from '../e2e/test-setup.js';
import type { ExternalIdentity } from '../../types/user.js';

const ALICE: ExternalIdentity = {
  subject: 'sub-alice',
  email: 'alice@example.com',
  displayName: 'Alice Example',
};

const BOB: ExternalIdentity = {
  subject: 'sub-bob',
  email: 'bob@example.com',
  displayName: 'Bob Example',
};

const TENANCY = { ownerRole: 'owner', memberRole: 'member' };

describe('IdentityService', () => {
  let store: MemoryIdentityStore;
  let events: RecordingEventSink;

  function createService(policy: TenantResolutionPolicy = perSignupPolicy): IdentityService {
    return new IdentityService({ store, policy, tenancy: TENANCY, events });
  }

  beforeEach(() => {
    store = new MemoryIdentityStore();
    events = new RecordingEventSink();
  });

  describe('first login', () => {
    it('should provision a tenant and an owner', async () => {
      const resolved = await createService().resolve(ALICE);

      expect(resolved.isNewUser).toBe(true);
      expect(resolved.roles).toEqual(['owner']);
      expect(resolved.user.externalSubject).toBe('sub-alice');
      expect(resolved.user.tenantId).toBe(resolved.tenant.id);
      expect(resolved.tenant.key).toBeNull();
      expect(store.stats()).toEqual({ tenants: 1, users: 1 });
    });

    it('should create a single user for concurrent first logins', async () => {
      const service = createService();

      const results = await Promise.all([
        service.resolve(ALICE),
        service.resolve(ALICE),
        service.resolve(ALICE),
      ]);

      expect(store.stats()).toEqual({ tenants: 1, users: 1 });
      expect(new Set(results.map((result) => result.user.id)).size).toBe(1);
      expect(results.filter((result) => result.isNewUser)).toHaveLength(1);
      expect(results.every((result) => result.roles.includes('owner'))).toBe(true);
    });

    it('should make concurrent founders of a shared tenant one owner and one member', async () => {
      const service = createService(singleTenantPolicy('default'));

      const [alice, bob] = await Promise.all([service.resolve(ALICE), service.resolve(BOB)]);

      expect(store.stats()).toEqual({ tenants: 1, users: 2 });
      expect(alice.tenant.id).toBe(bob.tenant.id);
      expect([alice.roles, bob.roles]).toEqual([['owner'], ['member']]);
    });
  });

  describe('returning login', () => {
    it('should return the existing user with stored roles', async () => {
      const service = createService();
      const first = await service.resolve(ALICE);

      const second = await service.resolve({ ...ALICE, displayName: 'Renamed' });

      expect(second.isNewUser).toBe(false);
      expect(second.user.id).toBe(first.user.id);
      expect(second.tenant.id).toBe(first.tenant.id);
      expect(second.roles).toEqual(['owner']);
      expect(store.stats()).toEqual({ tenants: 1, users: 1 });
    });

    it('should fail when the user holds no roles', async () => {
      const service = createService();
      await service.resolve(ALICE);
      vi.spyOn(store, 'getRoles').mockResolvedValue([]);

      await expect(service.resolve(ALICE)).rejects.toMatchObject({ code: 'internal_error' });
    });
  });

  describe('tenant policies', () => {
    it('should join the single tenant as a member', async () => {
      const service = createService(singleTenantPolicy('acme'));

      const alice = await service.resolve(ALICE);
      const bob = await service.resolve(BOB);

      expect(alice.tenant.key).toBe('acme');
      expect(bob.tenant.id).toBe(alice.tenant.id);
      expect(bob.roles).toEqual(['member']);
    });

    it('should group by lower-cased email domain', async () => {
      const service = createService(emailDomainPolicy);

      const alice = await service.resolve(ALICE);
      const bob = await service.resolve({ ...BOB, email: 'bob@EXAMPLE.com' });
      const carol = await service.resolve({
        subject: 'sub-carol',
        email: 'carol@other.test',
        displayName: 'Carol',
      });

      expect(alice.tenant.key).toBe('domain:example.com');
      expect(bob.tenant.id).toBe(alice.tenant.id);
      expect(carol.tenant.key).toBe('domain:other.test');
      expect(carol.roles).toEqual(['owner']);
    });

    it('should give an email without a domain its own tenant', () => {
      expect(emailDomainPolicy.tenantKeyFor({ ...ALICE, email: 'alice@' })).toBeNull();
      expect(emailDomainPolicy.tenantKeyFor({ ...ALICE, email: 'alice' })).toBeNull();
    });

    it('should build the configured policy', () => {
      expect(createTenantPolicy({ policy: 'per_signup', singleTenantKey: 'x' }).name).toBe('per_signup');
      expect(createTenantPolicy({ policy: 'email_domain', singleTenantKey: 'x' }).name).toBe('email_domain');

      const single = createTenantPolicy({ policy: 'single', singleTenantKey: 'acme' });
      expect(single.tenantKeyFor(ALICE)).toBe('acme');
    });
  });

  describe('conflicts and failures', () => {
    it('should reject an email bound to another subject', async () => {
      const service = createService();
      await service.resolve(ALICE);

      const attempt = service.resolve({ ...ALICE, subject: 'sub-impostor', email: 'Alice@Example.com' });

      await expect(attempt).rejects.toMatchObject({ code: 'identity_conflict' });
      expect(events.ofType('identity_conflict')).toEqual([
        { type: 'identity_conflict', target: 'email' },
      ]);
      expect(store.stats()).toEqual({ tenants: 1, users: 1 });
    });

    it('should retry when an email race was lost to the same subject', async () => {
      const service = createService();
      const winner = await service.resolve(ALICE);
      vi.spyOn(store, 'findUserByExternalSubject').mockResolvedValueOnce(null);
      vi.spyOn(store, 'createTenantAndOwner').mockRejectedValueOnce(
        new UniqueConstraintError('email')
      );

      const resolved = await service.resolve(ALICE);

      expect(resolved.user.id).toBe(winner.user.id);
      expect(resolved.isNewUser).toBe(false);
      expect(events.ofType('identity_conflict')).toEqual([]);
    });

    it('should give up after repeated races', async () => {
      const service = createService();
      const findSpy = vi.spyOn(store, 'findUserByExternalSubject').mockResolvedValue(null);
      vi.spyOn(store, 'createTenantAndOwner').mockRejectedValue(
        new UniqueConstraintError('external_subject')
      );

      await expect(service.resolve(ALICE)).rejects.toMatchObject({ code: 'internal_error' });
      expect(findSpy).toHaveBeenCalledTimes(3);
    });

    it('should map back-end failures to store_unavailable', async () => {
      const service = createService();
      vi.spyOn(store, 'findUserByExternalSubject').mockRejectedValue(new Error('socket hang up'));

      const attempt = service.resolve(ALICE);

      await expect(attempt).rejects.toBeInstanceOf(AuthError);
      await expect(attempt).rejects.toMatchObject({ code: 'store_unavailable', statusCode: 503 });
    });

    it('should pass store AuthErrors through unchanged', async () => {
      const service = createService();
      const failure = AuthError.storeUnavailable('pool exhausted');
      vi.spyOn(store, 'createTenantAndOwner').mockRejectedValue(failure);

      await expect(service.resolve(ALICE)).rejects.toBe(failure);
    });
  });
});
