import { randomUUID } from 'crypto';
import { Role } from '../auth/roles';
import { Clock } from '../common/clock';
import { DuplicateEmailError, NotFoundError } from '../common/errors';
import { IdentityStore } from './identity.store';
import { NewUser, RoleBinding, Tenant, User, UserPatch } from './identity.types';

function bindingKey(tenantId: string, userId: string): string {
  return `${tenantId}\u0000${userId}`;
}

function byCreatedAt(a: RoleBinding, b: RoleBinding): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

/**
 * Process-local store for development and tests.
 *
 * Every check-and-write runs without an await in between, so the event loop
 * serializes conflicting writes the way a unique index would.
 */
export class InMemoryIdentityStore extends IdentityStore {
  private readonly tenants = new Map<string, Tenant>();
  private readonly users = new Map<string, User>();
  private readonly userIdsByEmail = new Map<string, string>();
  private readonly bindings = new Map<string, RoleBinding>();

  constructor(private readonly clock: Clock) {
    super();
  }

  async createUser(input: NewUser): Promise<User> {
    const emailKey = input.email.toLowerCase();
    if (this.userIdsByEmail.has(emailKey)) {
      throw new DuplicateEmailError();
    }

    const user: User = {
      id: randomUUID(),
      email: input.email,
      passwordHash: input.passwordHash,
      fullName: input.fullName ?? null,
      isActive: true,
      createdAt: this.clock.now(),
    };
    this.users.set(user.id, user);
    this.userIdsByEmail.set(emailKey, user.id);
    return { ...user };
  }

  async findUserById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const id = this.userIdsByEmail.get(email.toLowerCase());
    return id === undefined ? null : this.findUserById(id);
  }

  async updateUser(id: string, patch: UserPatch): Promise<User> {
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    const updated: User = {
      ...user,
      fullName: patch.fullName !== undefined ? patch.fullName : user.fullName,
      passwordHash: patch.passwordHash ?? user.passwordHash,
      isActive: patch.isActive ?? user.isActive,
    };
    this.users.set(id, updated);
    return { ...updated };
  }

  async deleteUser(id: string): Promise<boolean> {
    const user = this.users.get(id);
    if (!user) {
      return false;
    }

    this.users.delete(id);
    this.userIdsByEmail.delete(user.email.toLowerCase());
    for (const [key, binding] of this.bindings) {
      if (binding.userId === id) {
        this.bindings.delete(key);
      }
    }
    return true;
  }

  async createTenant(name: string): Promise<Tenant> {
    const tenant: Tenant = { id: randomUUID(), name, createdAt: this.clock.now() };
    this.tenants.set(tenant.id, tenant);
    return { ...tenant };
  }

  async findTenant(id: string): Promise<Tenant | null> {
    const tenant = this.tenants.get(id);
    return tenant ? { ...tenant } : null;
  }

  async renameTenant(id: string, name: string): Promise<Tenant> {
    const tenant = this.tenants.get(id);
    if (!tenant) {
      throw new NotFoundError('Tenant not found');
    }

    const renamed = { ...tenant, name };
    this.tenants.set(id, renamed);
    return { ...renamed };
  }

  async deleteTenant(id: string): Promise<void> {
    if (!this.tenants.delete(id)) {
      throw new NotFoundError('Tenant not found');
    }

    for (const [key, binding] of this.bindings) {
      if (binding.tenantId === id) {
        this.bindings.delete(key);
      }
    }
  }

  async bind(tenantId: string, userId: string, role: Role): Promise<RoleBinding> {
    if (!this.tenants.has(tenantId) || !this.users.has(userId)) {
      throw new NotFoundError('Tenant or user not found');
    }

    const key = bindingKey(tenantId, userId);
    const existing = this.bindings.get(key);
    const binding: RoleBinding = {
      tenantId,
      userId,
      role,
      createdAt: existing?.createdAt ?? this.clock.now(),
    };
    this.bindings.set(key, binding);
    return { ...binding };
  }

  async unbind(tenantId: string, userId: string): Promise<boolean> {
    return this.bindings.delete(bindingKey(tenantId, userId));
  }

  async findBinding(tenantId: string, userId: string): Promise<Role | null> {
    return this.bindings.get(bindingKey(tenantId, userId))?.role ?? null;
  }

  async listTenantMembers(tenantId: string): Promise<RoleBinding[]> {
    return [...this.bindings.values()]
      .filter((binding) => binding.tenantId === tenantId)
      .sort(byCreatedAt)
      .map((binding) => ({ ...binding }));
  }

  async listUserBindings(userId: string): Promise<RoleBinding[]> {
    return [...this.bindings.values()]
      .filter((binding) => binding.userId === userId)
      .sort(byCreatedAt)
      .map((binding) => ({ ...binding }));
  }
}
