import {
  DuplicateEmailError,
  InvalidCredentialsError,
  NotFoundError,
  UnavailableError,
  ValidationError,
} from '../common/errors';
import { AuthHarness, createAuthHarness } from '../testing/auth-harness';

describe('AuthService', () => {
  let harness: AuthHarness;

  beforeEach(() => {
    harness = createAuthHarness();
  });

  describe('register', () => {
    it('creates the user and a tenant they own', async () => {
      const registered = await harness.authService.register({
        email: 'alice@x.com',
        password: 'pw123',
        tenant_name: 'Acme',
        full_name: 'Alice',
      });

      if (registered.tenant_id === null) {
        throw new Error('Expected a tenant');
      }
      await expect(harness.identity.findTenant(registered.tenant_id)).resolves.toMatchObject({ name: 'Acme' });
      await expect(harness.identity.findBinding(registered.tenant_id, registered.user_id)).resolves.toBe('owner');
      await expect(harness.identity.findUserById(registered.user_id)).resolves.toMatchObject({
        email: 'alice@x.com',
        fullName: 'Alice',
        isActive: true,
      });
    });

    it('stores a hash, never the password', async () => {
      const { user_id } = await harness.authService.register({ email: 'alice@x.com', password: 'pw123' });

      const user = await harness.identity.findUserById(user_id);
      expect(user?.passwordHash).not.toBe('pw123');
      await expect(harness.passwordService.verifyPassword('pw123', user?.passwordHash ?? '')).resolves.toBe(true);
    });

    it('registers without a tenant', async () => {
      const registered = await harness.authService.register({ email: 'solo@x.com', password: 'pw123' });

      expect(registered.tenant_id).toBeNull();
      await expect(harness.identity.listUserBindings(registered.user_id)).resolves.toEqual([]);
    });

    it('lets one of two concurrent registrations of an email win', async () => {
      const outcomes = await Promise.allSettled([
        harness.authService.register({ email: 'a@x.com', password: 'pw123' }),
        harness.authService.register({ email: 'A@x.com', password: 'pw123' }),
      ]);

      expect(outcomes.filter((outcome) => outcome.status === 'fulfilled')).toHaveLength(1);
      const [rejected] = outcomes.filter((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
      expect(rejected.reason).toBeInstanceOf(DuplicateEmailError);
    });

    it('enforces the minimum password length', async () => {
      const strict = createAuthHarness({ passwordMinLength: 8 });

      await expect(strict.authService.register({ email: 'a@x.com', password: 'short' })).rejects.toThrow(
        new ValidationError('Password must be at least 8 characters long'),
      );
      await expect(strict.identity.findUserByEmail('a@x.com')).resolves.toBeNull();
    });

    it('refuses a password longer than 72 bytes', async () => {
      await expect(harness.authService.register({ email: 'a@x.com', password: 'a'.repeat(73) })).rejects.toThrow(
        new ValidationError('Password must be at most 72 bytes long'),
      );
      await expect(harness.identity.findUserByEmail('a@x.com')).resolves.toBeNull();
    });

    it('removes the user and the tenant when binding the owner fails', async () => {
      const createdTenantIds: string[] = [];
      const createTenant = harness.identity.createTenant.bind(harness.identity);
      jest.spyOn(harness.identity, 'createTenant').mockImplementation(async (name) => {
        const tenant = await createTenant(name);
        createdTenantIds.push(tenant.id);
        return tenant;
      });
      jest.spyOn(harness.identity, 'bind').mockRejectedValueOnce(new UnavailableError());

      await expect(
        harness.authService.register({ email: 'alice@x.com', password: 'pw123', tenant_name: 'Acme' }),
      ).rejects.toThrow(UnavailableError);

      expect(createdTenantIds).toHaveLength(1);
      await expect(harness.identity.findTenant(createdTenantIds[0])).resolves.toBeNull();
      await expect(harness.identity.findUserByEmail('alice@x.com')).resolves.toBeNull();
    });

    it('removes the user when creating the tenant fails', async () => {
      jest.spyOn(harness.identity, 'createTenant').mockRejectedValueOnce(new UnavailableError());

      await expect(
        harness.authService.register({ email: 'alice@x.com', password: 'pw123', tenant_name: 'Acme' }),
      ).rejects.toThrow(UnavailableError);

      await expect(harness.identity.findUserByEmail('alice@x.com')).resolves.toBeNull();
    });

    it('rethrows the first failure when the compensation fails too', async () => {
      jest.spyOn(harness.identity, 'createTenant').mockRejectedValueOnce(new UnavailableError('first'));
      jest.spyOn(harness.identity, 'deleteUser').mockRejectedValueOnce(new UnavailableError('second'));

      await expect(
        harness.authService.register({ email: 'alice@x.com', password: 'pw123', tenant_name: 'Acme' }),
      ).rejects.toThrow('first');
    });
  });

  describe('profile', () => {
    async function signIn() {
      await harness.authService.register({
        email: 'alice@x.com',
        password: 'pw123',
        tenant_name: 'Acme',
        full_name: 'Alice',
      });
      const pair = await harness.sessionService.login('alice@x.com', 'pw123');
      return harness.sessionService.validateAccess(pair.access_token);
    }

    it('describes the caller and their tenant context', async () => {
      const claims = await signIn();

      await expect(harness.authService.getProfile(claims)).resolves.toEqual({
        user_id: claims.subject,
        tenant_id: claims.tenantId,
        role: 'owner',
        email: 'alice@x.com',
        full_name: 'Alice',
        is_active: true,
      });
    });

    it('reports a caller whose account is gone', async () => {
      const claims = await signIn();
      await harness.identity.deleteUser(claims.subject);

      await expect(harness.authService.getProfile(claims)).rejects.toThrow(new NotFoundError('User not found'));
    });

    it('lists the tenants the caller belongs to, oldest first', async () => {
      const claims = await signIn();
      harness.clock.advance(1);
      const globex = await harness.identity.createTenant('Globex');
      await harness.identity.bind(globex.id, claims.subject, 'viewer');

      await expect(harness.authService.listTenants(claims)).resolves.toEqual([
        { tenant_id: claims.tenantId, role: 'owner', created_at: '2026-01-01T00:00:00.000Z' },
        { tenant_id: globex.id, role: 'viewer', created_at: '2026-01-01T00:00:01.000Z' },
      ]);
      await expect(harness.authService.listTenants(claims, { skip: 1, limit: 1 })).resolves.toEqual([
        { tenant_id: globex.id, role: 'viewer', created_at: '2026-01-01T00:00:01.000Z' },
      ]);
    });

    it('renames the caller', async () => {
      const claims = await signIn();

      await expect(harness.authService.updateProfile(claims, { full_name: 'Alice Liddell' })).resolves.toMatchObject({
        full_name: 'Alice Liddell',
      });
    });

    it('changes the password given the current one', async () => {
      const claims = await signIn();

      await harness.authService.updateProfile(claims, { password: 'new-pw', current_password: 'pw123' });

      await expect(harness.sessionService.login('alice@x.com', 'new-pw')).resolves.toHaveProperty('access_token');
      await expect(harness.sessionService.login('alice@x.com', 'pw123')).rejects.toThrow(InvalidCredentialsError);
    });

    it('refuses a new password longer than 72 bytes', async () => {
      const claims = await signIn();

      await expect(
        harness.authService.updateProfile(claims, { password: '\u00e9'.repeat(37), current_password: 'pw123' }),
      ).rejects.toThrow(new ValidationError('Password must be at most 72 bytes long'));
      await expect(harness.sessionService.login('alice@x.com', 'pw123')).resolves.toHaveProperty('access_token');
    });

    it('refuses a password change without the right current password', async () => {
      const claims = await signIn();

      await expect(harness.authService.updateProfile(claims, { password: 'new-pw' })).rejects.toThrow(
        InvalidCredentialsError,
      );
      await expect(
        harness.authService.updateProfile(claims, { password: 'new-pw', current_password: 'wrong' }),
      ).rejects.toThrow(InvalidCredentialsError);
    });
  });
});
