import { ForbiddenError } from '../../common/errors';
import { FakeClock } from '../../testing/fake-clock';
import { InMemoryIdentityStore } from '../../identity/memory-identity.store';
import { TokenClaims } from '../interfaces/token-claims.interface';
import { AuthorizationService } from './authorization.service';

describe('AuthorizationService', () => {
  let identity: InMemoryIdentityStore;
  let authorization: AuthorizationService;
  let tenantId: string;
  let userId: string;

  function claimsIn(tenant: string | null): TokenClaims {
    return {
      subject: userId,
      tenantId: tenant,
      role: null,
      tokenType: 'access',
      jti: 'jti-1',
      issuedAt: 0,
      expiresAt: 60,
    };
  }

  beforeEach(async () => {
    identity = new InMemoryIdentityStore(new FakeClock());
    authorization = new AuthorizationService(identity);
    tenantId = (await identity.createTenant('Acme')).id;
    userId = (await identity.createUser({ email: 'a@x.com', passwordHash: 'hash' })).id;
  });

  describe('can', () => {
    it('denies without a binding', async () => {
      await expect(authorization.can(userId, tenantId, 'admin')).resolves.toBe(false);
    });

    it('lets an owner act as admin', async () => {
      await identity.bind(tenantId, userId, 'owner');

      await expect(authorization.can(userId, tenantId, 'admin')).resolves.toBe(true);
    });

    it('does not let a member act as admin', async () => {
      await identity.bind(tenantId, userId, 'member');

      await expect(authorization.can(userId, tenantId, 'admin')).resolves.toBe(false);
      await expect(authorization.can(userId, tenantId, 'members:read')).resolves.toBe(true);
    });
  });

  describe('assertCan', () => {
    it('passes when the binding satisfies the requirement', async () => {
      await identity.bind(tenantId, userId, 'admin');

      await expect(authorization.assertCan(claimsIn(tenantId), tenantId, 'members:manage')).resolves.toBeUndefined();
    });

    it('names the missing requirement', async () => {
      await identity.bind(tenantId, userId, 'admin');

      await expect(authorization.assertCan(claimsIn(tenantId), tenantId, 'tenant:delete')).rejects.toThrow(
        'Access denied: requires tenant:delete',
      );
    });

    it('refuses a tenant other than the one in the token', async () => {
      const other = await identity.createTenant('Globex');
      await identity.bind(other.id, userId, 'owner');
      const findBinding = jest.spyOn(identity, 'findBinding');

      await expect(authorization.assertCan(claimsIn(tenantId), other.id, 'tenant:read')).rejects.toThrow(
        'Access denied: token was not issued for this tenant',
      );
      expect(findBinding).not.toHaveBeenCalled();
    });

    it('refuses a tenant-agnostic token', async () => {
      await identity.bind(tenantId, userId, 'owner');

      await expect(authorization.assertCan(claimsIn(null), tenantId, 'tenant:read')).rejects.toThrow(ForbiddenError);
    });

    it('refuses once the binding is gone even if the token still names the tenant', async () => {
      await identity.bind(tenantId, userId, 'owner');
      await identity.unbind(tenantId, userId);

      await expect(authorization.assertCan(claimsIn(tenantId), tenantId, 'tenant:read')).rejects.toThrow(
        ForbiddenError,
      );
    });
  });
});
