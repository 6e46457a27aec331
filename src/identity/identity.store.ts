import { Role } from '../auth/roles';
import { NewUser, RoleBinding, Tenant, User, UserPatch } from './identity.types';

/**
 * Durable records for tenants, users and tenant-user role bindings.
 *
 * Implementations keep these invariants atomically:
 * - email is unique across all users, compared case-insensitively
 * - a binding always references an existing tenant and user
 * - deleting a tenant or user removes its bindings
 */
export abstract class IdentityStore {
  /**
   * @throws DuplicateEmailError if the email is taken, whatever its casing
   */
  abstract createUser(user: NewUser): Promise<User>;

  abstract findUserById(id: string): Promise<User | null>;

  /** Case-insensitive */
  abstract findUserByEmail(email: string): Promise<User | null>;

  /**
   * @throws NotFoundError if the user does not exist
   */
  abstract updateUser(id: string, patch: UserPatch): Promise<User>;

  /**
   * Hard delete. Only used to undo a half-finished registration.
   * @returns whether a user was removed
   */
  abstract deleteUser(id: string): Promise<boolean>;

  abstract createTenant(name: string): Promise<Tenant>;

  abstract findTenant(id: string): Promise<Tenant | null>;

  /**
   * @throws NotFoundError if the tenant does not exist
   */
  abstract renameTenant(id: string, name: string): Promise<Tenant>;

  /**
   * Removes the tenant and its bindings; users are kept.
   * @throws NotFoundError if the tenant does not exist
   */
  abstract deleteTenant(id: string): Promise<void>;

  /**
   * Create or overwrite the role of a user in a tenant
   * @throws NotFoundError if the tenant or the user does not exist
   */
  abstract bind(tenantId: string, userId: string, role: Role): Promise<RoleBinding>;

  /**
   * @returns whether a binding was removed
   */
  abstract unbind(tenantId: string, userId: string): Promise<boolean>;

  /**
   * Point lookup on the authorization hot path
   */
  abstract findBinding(tenantId: string, userId: string): Promise<Role | null>;

  abstract listTenantMembers(tenantId: string): Promise<RoleBinding[]>;

  /** Oldest binding first */
  abstract listUserBindings(userId: string): Promise<RoleBinding[]>;
}
