import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
} from '@nestjs/common';
import { SessionService } from '../auth/services/session.service';
import { AssignRoleDto } from './dto/assign-role.dto';
import { TenantNameDto } from './dto/tenant-name.dto';
import { TenantsService } from './tenants.service';

/**
 * Every route expects `Authorization: Bearer <access token>`.
 * Tenant-scoped routes only accept the tenant the token was issued for.
 */
@Controller('tenants')
export class TenantsController {
  constructor(
    private readonly tenantsService: TenantsService,
    private readonly sessionService: SessionService,
  ) {}

  /**
   * POST /api/tenants
   * Body: { name }
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Headers('authorization') authorization: string | undefined, @Body() dto: TenantNameDto) {
    const claims = this.sessionService.authenticate(authorization);
    return this.tenantsService.createTenant(claims, dto.name);
  }

  /**
   * GET /api/tenants/:tenantId
   */
  @Get(':tenantId')
  async findOne(@Headers('authorization') authorization: string | undefined, @Param('tenantId') tenantId: string) {
    const claims = this.sessionService.authenticate(authorization);
    return this.tenantsService.getTenant(claims, tenantId);
  }

  /**
   * PATCH /api/tenants/:tenantId
   * Body: { name }
   */
  @Patch(':tenantId')
  async rename(
    @Headers('authorization') authorization: string | undefined,
    @Param('tenantId') tenantId: string,
    @Body() dto: TenantNameDto,
  ) {
    const claims = this.sessionService.authenticate(authorization);
    return this.tenantsService.renameTenant(claims, tenantId, dto.name);
  }

  /**
   * DELETE /api/tenants/:tenantId
   */
  @Delete(':tenantId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Headers('authorization') authorization: string | undefined, @Param('tenantId') tenantId: string) {
    const claims = this.sessionService.authenticate(authorization);
    await this.tenantsService.deleteTenant(claims, tenantId);
  }

  /**
   * GET /api/tenants/:tenantId/members
   */
  @Get(':tenantId/members')
  async listMembers(
    @Headers('authorization') authorization: string | undefined,
    @Param('tenantId') tenantId: string,
  ) {
    const claims = this.sessionService.authenticate(authorization);
    return this.tenantsService.listMembers(claims, tenantId);
  }

  /**
   * PUT /api/tenants/:tenantId/members/:userId
   * Body: { role }
   */
  @Put(':tenantId/members/:userId')
  async assignRole(
    @Headers('authorization') authorization: string | undefined,
    @Param('tenantId') tenantId: string,
    @Param('userId') userId: string,
    @Body() dto: AssignRoleDto,
  ) {
    const claims = this.sessionService.authenticate(authorization);
    return this.tenantsService.assignRole(claims, tenantId, userId, dto.role);
  }

  /**
   * DELETE /api/tenants/:tenantId/members/:userId
   */
  @Delete(':tenantId/members/:userId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removeMember(
    @Headers('authorization') authorization: string | undefined,
    @Param('tenantId') tenantId: string,
    @Param('userId') userId: string,
  ) {
    const claims = this.sessionService.authenticate(authorization);
    await this.tenantsService.removeMember(claims, tenantId, userId);
  }

  /**
   * POST /api/tenants/:tenantId/members/:userId/deactivate
   */
  @Post(':tenantId/members/:userId/deactivate')
  @HttpCode(HttpStatus.OK)
  async deactivate(
    @Headers('authorization') authorization: string | undefined,
    @Param('tenantId') tenantId: string,
    @Param('userId') userId: string,
  ) {
    const claims = this.sessionService.authenticate(authorization);
    return this.tenantsService.deactivateUser(claims, tenantId, userId);
  }
}
