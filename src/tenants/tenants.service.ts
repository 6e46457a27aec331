import { Inject, Injectable, Logger } from '@nestjs/common';
import { AuthService } from '../auth/auth.service';
import { MessageDto } from '../auth/dto/auth-response.dto';
import { TokenClaims } from '../auth/interfaces/token-claims.interface';
import { Role } from '../auth/roles';
import { AuthorizationService } from '../auth/services/authorization.service';
import { ForbiddenError, InactiveUserError, NotFoundError, ValidationError } from '../common/errors';
import { AuthConfig, authConfig } from '../config/auth.config';
import { IdentityStore } from '../identity/identity.store';
import { RoleBinding, Tenant } from '../identity/identity.types';
import { MemberDto, TenantDto } from './dto/tenant-response.dto';

/**
 * Tenant and membership administration. Every call is gated on the
 * caller's role in the tenant their token was issued for.
 */
@Injectable()
export class TenantsService {
  private readonly logger = new Logger(TenantsService.name);

  constructor(
    private readonly identity: IdentityStore,
    private readonly authorization: AuthorizationService,
    private readonly authService: AuthService,
    @Inject(authConfig.KEY) private readonly config: AuthConfig,
  ) {}

  /**
   * Create a tenant owned by the caller
   * @throws InactiveUserError if the caller was deactivated or removed
   */
  async createTenant(claims: TokenClaims, name: string): Promise<TenantDto> {
    const user = await this.identity.findUserById(claims.subject);
    if (!user || !user.isActive) {
      throw new InactiveUserError();
    }

    const tenant = await this.authService.provisionTenant(name, user.id);
    this.logger.log(`Tenant created: ${tenant.id} (owner: ${user.id})`);
    return toTenantDto(tenant);
  }

  async getTenant(claims: TokenClaims, tenantId: string): Promise<TenantDto> {
    await this.authorization.assertCan(claims, tenantId, 'tenant:read');

    const tenant = await this.identity.findTenant(tenantId);
    if (!tenant) {
      throw new NotFoundError('Tenant not found');
    }
    return toTenantDto(tenant);
  }

  async renameTenant(claims: TokenClaims, tenantId: string, name: string): Promise<TenantDto> {
    await this.authorization.assertCan(claims, tenantId, 'tenant:update');

    const tenant = await this.identity.renameTenant(tenantId, name);
    this.logger.log(`Tenant renamed: ${tenantId} by ${claims.subject}`);
    return toTenantDto(tenant);
  }

  /**
   * Delete the tenant and all its bindings. Member accounts are kept.
   */
  async deleteTenant(claims: TokenClaims, tenantId: string): Promise<void> {
    await this.authorization.assertCan(claims, tenantId, 'tenant:delete');

    await this.identity.deleteTenant(tenantId);
    this.logger.log(`Tenant deleted: ${tenantId} by ${claims.subject}`);
  }

  async listMembers(claims: TokenClaims, tenantId: string): Promise<MemberDto[]> {
    await this.authorization.assertCan(claims, tenantId, 'members:read');

    const members = await this.identity.listTenantMembers(tenantId);
    return members.map(toMemberDto);
  }

  /**
   * Grant a role in the tenant, or change the one the user holds
   * @param role - Must be one of AUTH_ASSIGNABLE_ROLES
   * @throws ValidationError if the role is not assignable
   * @throws ForbiddenError if the change involves owner without owner rights,
   * or would leave the tenant without an owner
   * @throws NotFoundError if the user does not exist
   */
  async assignRole(claims: TokenClaims, tenantId: string, userId: string, role: Role): Promise<MemberDto> {
    await this.authorization.assertCan(claims, tenantId, 'members:manage');

    if (!this.config.assignableRoles.includes(role)) {
      throw new ValidationError(`Role ${role} cannot be assigned`);
    }

    const current = await this.identity.findBinding(tenantId, userId);
    if (role === 'owner' || current === 'owner') {
      await this.authorization.assertCan(claims, tenantId, 'members:grant-owner');
    }
    if (current === 'owner' && role !== 'owner') {
      await this.assertNotLastOwner(tenantId);
    }

    const binding = await this.identity.bind(tenantId, userId, role);
    this.logger.log(`Role ${role} assigned to ${userId} in tenant ${tenantId} by ${claims.subject}`);
    return toMemberDto(binding);
  }

  /**
   * @throws NotFoundError if the user holds no role in the tenant
   */
  async removeMember(claims: TokenClaims, tenantId: string, userId: string): Promise<void> {
    await this.authorization.assertCan(claims, tenantId, 'members:manage');

    const current = await this.identity.findBinding(tenantId, userId);
    if (!current) {
      throw new NotFoundError('Membership not found');
    }
    if (current === 'owner') {
      await this.authorization.assertCan(claims, tenantId, 'members:grant-owner');
      await this.assertNotLastOwner(tenantId);
    }

    await this.identity.unbind(tenantId, userId);
    this.logger.log(`Member ${userId} removed from tenant ${tenantId} by ${claims.subject}`);
  }

  /**
   * Soft-delete a member's account. The account is deactivated everywhere,
   * so the caller must own every tenant the user belongs to.
   * @throws ForbiddenError if the user is also a member of a tenant the caller does not own
   */
  async deactivateUser(claims: TokenClaims, tenantId: string, userId: string): Promise<MessageDto> {
    await this.authorization.assertCan(claims, tenantId, 'users:deactivate');

    if (userId === claims.subject) {
      throw new ForbiddenError('You cannot deactivate your own account');
    }

    const role = await this.identity.findBinding(tenantId, userId);
    if (!role) {
      throw new NotFoundError('Membership not found');
    }

    const bindings = await this.identity.listUserBindings(userId);
    for (const binding of bindings) {
      if (binding.tenantId === tenantId) {
        continue;
      }
      const callerRole = await this.identity.findBinding(binding.tenantId, claims.subject);
      if (callerRole !== 'owner') {
        this.logger.warn(
          `Deactivation of ${userId} by ${claims.subject} refused: member of tenant ${binding.tenantId}`,
        );
        throw new ForbiddenError('Access denied: user is a member of a tenant you do not own');
      }
    }

    await this.identity.updateUser(userId, { isActive: false });
    this.logger.log(`User ${userId} deactivated by ${claims.subject} (tenant: ${tenantId})`);
    return { message: 'User deactivated' };
  }

  // Not atomic with the write that follows; two concurrent demotions can both pass
  private async assertNotLastOwner(tenantId: string): Promise<void> {
    const members = await this.identity.listTenantMembers(tenantId);
    const owners = members.filter((member) => member.role === 'owner');
    if (owners.length <= 1) {
      throw new ForbiddenError('A tenant must keep at least one owner');
    }
  }
}

function toTenantDto(tenant: Tenant): TenantDto {
  return {
    id: tenant.id,
    name: tenant.name,
    created_at: tenant.createdAt.toISOString(),
  };
}

function toMemberDto(binding: RoleBinding): MemberDto {
  return {
    user_id: binding.userId,
    role: binding.role,
    created_at: binding.createdAt.toISOString(),
  };
}
