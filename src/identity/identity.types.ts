import { Role } from '../auth/roles';

export interface Tenant {
  id: string;
  name: string;
  createdAt: Date;
}

export interface User {
  id: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  isActive: boolean;
  createdAt: Date;
}

/**
 * (tenant, user) -> role. At most one per pair.
 */
export interface RoleBinding {
  tenantId: string;
  userId: string;
  role: Role;
  createdAt: Date;
}

export interface NewUser {
  email: string;
  passwordHash: string;
  fullName?: string | null;
}

export interface UserPatch {
  fullName?: string | null;
  passwordHash?: string;
  isActive?: boolean;
}
