import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { Role, isRole } from '../auth/roles';
import { DuplicateEmailError, InternalError, NotFoundError } from '../common/errors';
import { DatabaseService, pgErrorCode } from '../database/database.service';
import { IdentityStore } from './identity.store';
import { NewUser, RoleBinding, Tenant, User, UserPatch } from './identity.types';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

const USER_COLUMNS = `
  id,
  email,
  password_hash AS "passwordHash",
  full_name AS "fullName",
  is_active AS "isActive",
  created_at AS "createdAt"
`;

const TENANT_COLUMNS = `id, name, created_at AS "createdAt"`;

const BINDING_COLUMNS = `
  tenant_id AS "tenantId",
  user_id AS "userId",
  role,
  created_at AS "createdAt"
`;

interface UserRow {
  id: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  isActive: boolean;
  createdAt: Date;
}

interface TenantRow {
  id: string;
  name: string;
  createdAt: Date;
}

interface BindingRow {
  tenantId: string;
  userId: string;
  role: string;
  createdAt: Date;
}

/**
 * Identity store on Postgres (schema: db/migrations/001_init.sql).
 *
 * Uniqueness and referential integrity are enforced by the database:
 * a unique index on lower(email), the (tenant_id, user_id) primary key and
 * cascading foreign keys.
 */
export class PgIdentityStore extends IdentityStore {
  private readonly logger = new Logger(PgIdentityStore.name);

  constructor(private readonly db: DatabaseService) {
    super();
  }

  async createUser(input: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `
          INSERT INTO users (id, email, password_hash, full_name)
          VALUES ($1, $2, $3, $4)
          RETURNING ${USER_COLUMNS}
        `,
        [randomUUID(), input.email, input.passwordHash, input.fullName ?? null],
      );
      return this.single(result.rows, 'INSERT users');
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }

  async findUserById(id: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower($1)`,
      [email],
    );
    return result.rows[0] ?? null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<User> {
    const result = await this.db.query<UserRow>(
      `
        UPDATE users SET
          full_name = CASE WHEN $2::boolean THEN $3 ELSE full_name END,
          password_hash = COALESCE($4, password_hash),
          is_active = COALESCE($5, is_active)
        WHERE id = $1
        RETURNING ${USER_COLUMNS}
      `,
      [id, patch.fullName !== undefined, patch.fullName ?? null, patch.passwordHash ?? null, patch.isActive ?? null],
    );

    const [user] = result.rows;
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  async deleteUser(id: string): Promise<boolean> {
    const result = await this.db.query(`DELETE FROM users WHERE id = $1`, [id]);
    return result.rowCount === 1;
  }

  async createTenant(name: string): Promise<Tenant> {
    const result = await this.db.query<TenantRow>(
      `INSERT INTO tenants (id, name) VALUES ($1, $2) RETURNING ${TENANT_COLUMNS}`,
      [randomUUID(), name],
    );
    return this.single(result.rows, 'INSERT tenants');
  }

  async findTenant(id: string): Promise<Tenant | null> {
    const result = await this.db.query<TenantRow>(`SELECT ${TENANT_COLUMNS} FROM tenants WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async renameTenant(id: string, name: string): Promise<Tenant> {
    const result = await this.db.query<TenantRow>(
      `UPDATE tenants SET name = $2 WHERE id = $1 RETURNING ${TENANT_COLUMNS}`,
      [id, name],
    );

    const [tenant] = result.rows;
    if (!tenant) {
      throw new NotFoundError('Tenant not found');
    }
    return tenant;
  }

  async deleteTenant(id: string): Promise<void> {
    const result = await this.db.query(`DELETE FROM tenants WHERE id = $1`, [id]);
    if (result.rowCount !== 1) {
      throw new NotFoundError('Tenant not found');
    }
  }

  async bind(tenantId: string, userId: string, role: Role): Promise<RoleBinding> {
    try {
      const result = await this.db.query<BindingRow>(
        `
          INSERT INTO tenant_user_roles (tenant_id, user_id, role)
          VALUES ($1, $2, $3)
          ON CONFLICT (tenant_id, user_id) DO UPDATE SET role = EXCLUDED.role
          RETURNING ${BINDING_COLUMNS}
        `,
        [tenantId, userId, role],
      );
      return this.toBinding(this.single(result.rows, 'UPSERT tenant_user_roles'));
    } catch (error) {
      if (pgErrorCode(error) === FOREIGN_KEY_VIOLATION) {
        throw new NotFoundError('Tenant or user not found');
      }
      throw error;
    }
  }

  async unbind(tenantId: string, userId: string): Promise<boolean> {
    const result = await this.db.query(
      `DELETE FROM tenant_user_roles WHERE tenant_id = $1 AND user_id = $2`,
      [tenantId, userId],
    );
    return result.rowCount === 1;
  }

  async findBinding(tenantId: string, userId: string): Promise<Role | null> {
    const result = await this.db.query<{ role: string }>(
      `SELECT role FROM tenant_user_roles WHERE tenant_id = $1 AND user_id = $2`,
      [tenantId, userId],
    );

    const [row] = result.rows;
    return row ? this.toRole(row.role) : null;
  }

  async listTenantMembers(tenantId: string): Promise<RoleBinding[]> {
    const result = await this.db.query<BindingRow>(
      `SELECT ${BINDING_COLUMNS} FROM tenant_user_roles WHERE tenant_id = $1 ORDER BY created_at, user_id`,
      [tenantId],
    );
    return result.rows.map((row) => this.toBinding(row));
  }

  async listUserBindings(userId: string): Promise<RoleBinding[]> {
    const result = await this.db.query<BindingRow>(
      `SELECT ${BINDING_COLUMNS} FROM tenant_user_roles WHERE user_id = $1 ORDER BY created_at, tenant_id`,
      [userId],
    );
    return result.rows.map((row) => this.toBinding(row));
  }

  private toBinding(row: BindingRow): RoleBinding {
    return { ...row, role: this.toRole(row.role) };
  }

  private toRole(value: string): Role {
    if (!isRole(value)) {
      this.logger.error(`Binding row holds unknown role "${value}"`);
      throw new InternalError('Stored role binding is invalid');
    }
    return value;
  }

  private single<T>(rows: T[], statement: string): T {
    const [row] = rows;
    if (!row) {
      this.logger.error(`${statement} returned no row`);
      throw new InternalError();
    }
    return row;
  }
}
