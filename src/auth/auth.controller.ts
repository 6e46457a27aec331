import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import { MessageDto } from './dto/auth-response.dto';
import { LoginDto } from './dto/login.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import { RegisterDto } from './dto/register.dto';
import { SessionService } from './services/session.service';

@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly sessionService: SessionService,
  ) {}

  /**
   * Basic auth login
   * POST /api/auth/login
   * Body: { email: string, password: string, tenant_id?: string }
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto) {
    return this.sessionService.login(dto.email, dto.password, dto.tenant_id);
  }

  /**
   * Rotate a refresh token
   * POST /api/auth/refresh
   * Body: { refresh_token: string }
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshTokenDto) {
    return this.sessionService.refresh(dto.refresh_token);
  }

  /**
   * User registration
   * POST /api/auth/register
   * Body: { email, password, tenant_name?, full_name? }
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto) {
    return this.authService.register(dto);
  }

  /**
   * Logout (revoke the refresh token)
   * POST /api/auth/logout
   * Body: { refresh_token: string }
   */
  @Post('logout')
  @HttpCode(HttpStatus.OK)
  async logout(@Body() dto: RefreshTokenDto): Promise<MessageDto> {
    await this.sessionService.logout(dto.refresh_token);
    return { message: 'Logged out successfully' };
  }
}
