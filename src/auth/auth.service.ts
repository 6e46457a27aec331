import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InvalidCredentialsError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../common/errors';
import { AuthConfig, authConfig } from '../config/auth.config';
import { IdentityStore } from '../identity/identity.store';
import { RoleBinding, Tenant, User, UserPatch } from '../identity/identity.types';
import { DEFAULT_PAGE_SIZE, PaginationQueryDto } from '../users/dto/pagination-query.dto';
import { UpdateProfileDto } from '../users/dto/update-profile.dto';
import { MembershipDto, RegisterResponseDto, UserProfileDto } from './dto/auth-response.dto';
import { RegisterDto } from './dto/register.dto';
import { TokenClaims } from './interfaces/token-claims.interface';
import { MAX_PASSWORD_BYTES, PasswordService, exceedsBcryptLimit } from './services/password.service';

/**
 * Registration and account self-service. Composes identity store writes
 * and undoes the earlier ones when a later one fails.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly identity: IdentityStore,
    private readonly passwordService: PasswordService,
    @Inject(authConfig.KEY) private readonly config: AuthConfig,
  ) {}

  /**
   * Register a new user, optionally with a tenant they own
   * @param dto - Registration data
   * @throws DuplicateEmailError if the email is taken in any casing
   * @throws ValidationError if the password is too short
   */
  async register(dto: RegisterDto): Promise<RegisterResponseDto> {
    this.assertPasswordPolicy(dto.password);

    const passwordHash = await this.passwordService.hashPassword(dto.password);
    const user = await this.identity.createUser({
      email: dto.email,
      passwordHash,
      fullName: dto.full_name ?? null,
    });

    if (dto.tenant_name === undefined) {
      this.logger.log(`User registered: ${user.id}`);
      return { user_id: user.id, tenant_id: null };
    }

    let tenant: Tenant;
    try {
      tenant = await this.provisionTenant(dto.tenant_name, user.id);
    } catch (error) {
      this.logger.warn(`Registration of ${user.id} failed while creating its tenant; removing the user`);
      await this.compensate(`user ${user.id}`, () => this.identity.deleteUser(user.id));
      throw error;
    }

    this.logger.log(`User registered: ${user.id} (tenant: ${tenant.id}, role: owner)`);
    return { user_id: user.id, tenant_id: tenant.id };
  }

  /**
   * Create a tenant and bind its first owner as one logical unit.
   * If the binding fails the tenant is deleted again, so no tenant is left
   * without an owner.
   */
  async provisionTenant(name: string, ownerId: string): Promise<Tenant> {
    const tenant = await this.identity.createTenant(name);

    try {
      await this.identity.bind(tenant.id, ownerId, 'owner');
    } catch (error) {
      this.logger.warn(`Binding owner ${ownerId} to tenant ${tenant.id} failed; removing the tenant`);
      await this.compensate(`tenant ${tenant.id}`, () => this.identity.deleteTenant(tenant.id));
      throw error;
    }

    return tenant;
  }

  /**
   * Profile of the authenticated caller
   * @param claims - Validated access token claims
   */
  async getProfile(claims: TokenClaims): Promise<UserProfileDto> {
    const user = await this.requireUser(claims.subject);
    return this.toProfile(claims, user);
  }

  /**
   * Change the caller's name and/or password. A new password needs the current one.
   * @throws InvalidCredentialsError if current_password is missing or wrong
   */
  async updateProfile(claims: TokenClaims, dto: UpdateProfileDto): Promise<UserProfileDto> {
    const user = await this.requireUser(claims.subject);
    const patch: UserPatch = {};

    if (dto.full_name !== undefined) {
      patch.fullName = dto.full_name;
    }

    if (dto.password !== undefined) {
      const isCurrentValid =
        dto.current_password !== undefined &&
        (await this.passwordService.verifyPassword(dto.current_password, user.passwordHash));
      if (!isCurrentValid) {
        throw new InvalidCredentialsError();
      }
      this.assertPasswordPolicy(dto.password);
      patch.passwordHash = await this.passwordService.hashPassword(dto.password);
    }

    const updated = await this.identity.updateUser(user.id, patch);
    if (patch.passwordHash) {
      this.logger.log(`Password changed for user ${user.id}`);
    }
    return this.toProfile(claims, updated);
  }

  /**
   * Tenants the caller is bound to, oldest binding first
   * @param page - skip defaults to 0, limit to 100
   */
  async listTenants(claims: TokenClaims, page: PaginationQueryDto = {}): Promise<MembershipDto[]> {
    const skip = page.skip ?? 0;
    const limit = page.limit ?? DEFAULT_PAGE_SIZE;
    const bindings = await this.identity.listUserBindings(claims.subject);
    return bindings.slice(skip, skip + limit).map(toMembership);
  }

  private assertPasswordPolicy(password: string): void {
    const minLength = this.config.passwordMinLength;
    if (password.length < minLength) {
      throw new ValidationError(`Password must be at least ${minLength} characters long`);
    }
    if (exceedsBcryptLimit(password)) {
      throw new ValidationError(`Password must be at most ${MAX_PASSWORD_BYTES} bytes long`);
    }
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.identity.findUserById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  private async compensate(target: string, undo: () => Promise<unknown>): Promise<void> {
    try {
      await undo();
    } catch (error) {
      this.logger.error(`Could not remove ${target} after a failed write: ${errorMessage(error)}`);
    }
  }

  private toProfile(claims: TokenClaims, user: User): UserProfileDto {
    return {
      user_id: user.id,
      tenant_id: claims.tenantId,
      role: claims.role,
      email: user.email,
      full_name: user.fullName,
      is_active: user.isActive,
    };
  }
}

function toMembership(binding: RoleBinding): MembershipDto {
  return {
    tenant_id: binding.tenantId,
    role: binding.role,
    created_at: binding.createdAt.toISOString(),
  };
}
