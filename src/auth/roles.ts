/**
 * Tenant roles, highest first.
 */
export const ROLES = ['owner', 'admin', 'member', 'viewer'] as const;

export type Role = (typeof ROLES)[number];

const ROLE_RANK: Record<Role, number> = {
  owner: 40,
  admin: 30,
  member: 20,
  viewer: 10,
};

export const PERMISSIONS = [
  'tenant:read',
  'tenant:update',
  'tenant:delete',
  'members:read',
  'members:manage',
  'members:grant-owner',
  'users:deactivate',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

/**
 * Lowest role that holds each permission
 */
const PERMISSION_MIN_ROLE: Record<Permission, Role> = {
  'tenant:read': 'viewer',
  'members:read': 'member',
  'tenant:update': 'admin',
  'members:manage': 'admin',
  'tenant:delete': 'owner',
  'members:grant-owner': 'owner',
  'users:deactivate': 'owner',
};

export type Requirement = Role | Permission;

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

export function isPermission(value: unknown): value is Permission {
  return typeof value === 'string' && (PERMISSIONS as readonly string[]).includes(value);
}

/**
 * Minimum role that satisfies a requirement
 */
export function requiredRole(requirement: Requirement): Role {
  return isRole(requirement) ? requirement : PERMISSION_MIN_ROLE[requirement];
}

/**
 * A higher role satisfies a requirement for any lower one.
 */
export function roleSatisfies(held: Role, requirement: Requirement): boolean {
  return ROLE_RANK[held] >= ROLE_RANK[requiredRole(requirement)];
}
