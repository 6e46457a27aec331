import { Body, Controller, Get, Headers, Patch, Query } from '@nestjs/common';
import { AuthService } from '../auth/auth.service';
import { SessionService } from '../auth/services/session.service';
import { PaginationQueryDto } from './dto/pagination-query.dto';
import { UpdateProfileDto } from './dto/update-profile.dto';

@Controller('users')
export class UsersController {
  constructor(
    private readonly authService: AuthService,
    private readonly sessionService: SessionService,
  ) {}

  /**
   * Get current user profile
   * GET /api/users/me
   * Headers: Authorization: Bearer <token>
   */
  @Get('me')
  async getMe(@Headers('authorization') authorization: string | undefined) {
    const claims = this.sessionService.authenticate(authorization);
    return this.authService.getProfile(claims);
  }

  /**
   * Tenants the current user belongs to
   * GET /api/users/me/tenants?skip=0&limit=100
   * Headers: Authorization: Bearer <token>
   */
  @Get('me/tenants')
  async listMyTenants(@Headers('authorization') authorization: string | undefined, @Query() query: PaginationQueryDto) {
    const claims = this.sessionService.authenticate(authorization);
    return this.authService.listTenants(claims, query);
  }

  /**
   * Update name or password
   * PATCH /api/users/me
   * Body: { full_name?, password?, current_password? }
   */
  @Patch('me')
  async updateMe(@Headers('authorization') authorization: string | undefined, @Body() dto: UpdateProfileDto) {
    const claims = this.sessionService.authenticate(authorization);
    return this.authService.updateProfile(claims, dto);
  }
}
