import { Injectable, Logger } from '@nestjs/common';
import { ForbiddenError } from '../../common/errors';
import { IdentityStore } from '../../identity/identity.store';
import { TokenClaims } from '../interfaces/token-claims.interface';
import { Requirement, roleSatisfies } from '../roles';

@Injectable()
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);

  constructor(private readonly identity: IdentityStore) {}

  /**
   * Whether the user's role in the tenant satisfies the requirement.
   * No binding means no access.
   * @param requirement - A role, or a permission mapped to its minimum role
   */
  async can(userId: string, tenantId: string, requirement: Requirement): Promise<boolean> {
    const role = await this.identity.findBinding(tenantId, userId);
    return role !== null && roleSatisfies(role, requirement);
  }

  /**
   * Gate a tenant-scoped operation on validated token claims.
   *
   * The effective tenant is the one the token was issued for; a request that
   * names any other tenant is refused before the binding is consulted.
   * @throws ForbiddenError
   */
  async assertCan(claims: TokenClaims, tenantId: string, requirement: Requirement): Promise<void> {
    if (claims.tenantId !== tenantId) {
      this.logger.warn(
        `Tenant mismatch for user ${claims.subject}: requested ${tenantId}, token tenant ${claims.tenantId ?? 'none'}`,
      );
      throw new ForbiddenError('Access denied: token was not issued for this tenant');
    }

    if (!(await this.can(claims.subject, tenantId, requirement))) {
      throw new ForbiddenError(`Access denied: requires ${requirement}`);
    }
  }
}
