import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Clock, fromEpochSeconds } from '../../common/clock';
import {
  BadSignatureError,
  ExpiredTokenError,
  ForbiddenError,
  InactiveUserError,
  InvalidCredentialsError,
  MalformedTokenError,
  RevokedTokenError,
  WrongTokenTypeError,
  errorMessage,
} from '../../common/errors';
import { AuthConfig, authConfig } from '../../config/auth.config';
import { IdentityStore } from '../../identity/identity.store';
import { TokenPairDto } from '../dto/auth-response.dto';
import { TokenClaims, TokenSubject, TokenType } from '../interfaces/token-claims.interface';
import { RevocationStore } from '../revocation/revocation.store';
import { JwtTokenService } from './jwt.service';
import { PasswordService } from './password.service';

const BEARER = /^Bearer\s+(\S+)$/i;

/**
 * Session lifecycle: Anonymous -> Authenticated -> Refreshed -> Revoked | Expired.
 *
 * Access tokens are validated statelessly and simply outlive their short TTL.
 * Refresh tokens are single-use: each refresh revokes the presented jti.
 */
@Injectable()
export class SessionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionService.name);
  private purgeTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly identity: IdentityStore,
    private readonly revocations: RevocationStore,
    private readonly passwordService: PasswordService,
    private readonly jwtTokenService: JwtTokenService,
    private readonly clock: Clock,
    @Inject(authConfig.KEY) private readonly config: AuthConfig,
  ) {}

  onModuleInit() {
    const interval = this.config.revocationPurgeIntervalMs;
    if (interval > 0) {
      this.purgeTimer = setInterval(() => {
        this.purgeExpiredRevocations().catch((error: unknown) => {
          this.logger.error(`Revocation purge failed: ${errorMessage(error)}`);
        });
      }, interval);
      this.purgeTimer.unref();
    }
  }

  onModuleDestroy() {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = null;
    }
  }

  /**
   * Authenticate with email and password and mint a token pair
   * @param email - Matched case-insensitively
   * @param password - Plaintext password
   * @param tenantId - Tenant to sign into; defaults to the user's oldest binding
   * @throws InvalidCredentialsError for an unknown email or a wrong password alike
   * @throws InactiveUserError once the password is verified for a deactivated account
   * @throws ForbiddenError if the user holds no binding in the requested tenant
   */
  async login(email: string, password: string, tenantId?: string): Promise<TokenPairDto> {
    const user = await this.identity.findUserByEmail(email);
    if (!user) {
      await this.passwordService.verifyAgainstDecoy(password);
      throw new InvalidCredentialsError();
    }

    const isPasswordValid = await this.passwordService.verifyPassword(password, user.passwordHash);
    if (!isPasswordValid) {
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      throw new InactiveUserError();
    }

    const subject = await this.resolveTenantContext(user.id, tenantId);
    this.logger.log(`User logged in: ${user.id} (tenant: ${subject.tenantId ?? 'none'}, role: ${subject.role ?? 'none'})`);

    return this.issuePair(subject);
  }

  /**
   * Trade a refresh token for a new pair. The presented token is revoked
   * first; of two concurrent calls with the same token exactly one wins.
   * @throws ExpiredTokenError | BadSignatureError | MalformedTokenError | WrongTokenTypeError
   * @throws RevokedTokenError if the token was already used or logged out
   * @throws InactiveUserError if the user was deactivated or removed meanwhile
   */
  async refresh(refreshToken: string): Promise<TokenPairDto> {
    const claims = this.decode(refreshToken, 'refresh');

    const revokedNow = await this.revocations.revoke({
      jti: claims.jti,
      revokedAt: this.clock.now(),
      expiresAt: fromEpochSeconds(claims.expiresAt),
    });
    if (!revokedNow) {
      this.logger.warn(`Refresh token reuse for user ${claims.subject} (jti ${claims.jti})`);
      throw new RevokedTokenError();
    }

    const user = await this.identity.findUserById(claims.subject);
    if (!user || !user.isActive) {
      throw new InactiveUserError();
    }

    return this.issuePair({ subject: claims.subject, tenantId: claims.tenantId, role: claims.role });
  }

  /**
   * Stateless check of an access token; no store lookup
   */
  validateAccess(accessToken: string): TokenClaims {
    return this.decode(accessToken, 'access');
  }

  /**
   * Resolve the caller of a protected operation from its Authorization header
   * @param authorization - Raw header value, `Bearer <token>`
   * @throws MalformedTokenError if the header is missing or not a bearer credential
   */
  authenticate(authorization: string | undefined): TokenClaims {
    const match = BEARER.exec(authorization?.trim() ?? '');
    if (!match) {
      throw new MalformedTokenError('Missing or invalid authorization header');
    }
    return this.validateAccess(match[1]);
  }

  /**
   * Revoke a refresh token by its jti. Revoking twice is a no-op.
   * @param jti - Token identifier
   * @param expiresAt - Token expiry; defaults to the longest a refresh token can live
   */
  async revoke(jti: string, expiresAt?: Date): Promise<void> {
    const now = this.clock.now();
    const revokedNow = await this.revocations.revoke({
      jti,
      revokedAt: now,
      expiresAt: expiresAt ?? new Date(now.getTime() + this.config.refreshTokenTtl * 1000),
    });
    if (revokedNow) {
      this.logger.log(`Refresh token revoked: ${jti}`);
    }
  }

  /**
   * Revoke the presented refresh token. An expired token needs no revocation.
   */
  async logout(refreshToken: string): Promise<void> {
    let claims: TokenClaims;
    try {
      claims = this.decode(refreshToken, 'refresh');
    } catch (error) {
      if (error instanceof ExpiredTokenError) {
        return;
      }
      throw error;
    }
    await this.revoke(claims.jti, fromEpochSeconds(claims.expiresAt));
  }

  /**
   * Delete revocation records of tokens that have expired anyway
   * @returns number of records removed
   */
  async purgeExpiredRevocations(): Promise<number> {
    const removed = await this.revocations.purgeExpired(this.clock.now());
    if (removed > 0) {
      this.logger.log(`Purged ${removed} expired revocation record(s)`);
    }
    return removed;
  }

  private async resolveTenantContext(userId: string, tenantId?: string): Promise<TokenSubject> {
    if (tenantId !== undefined) {
      const role = await this.identity.findBinding(tenantId, userId);
      if (!role) {
        throw new ForbiddenError('Access denied: you are not a member of this tenant');
      }
      return { subject: userId, tenantId, role };
    }

    const [first] = await this.identity.listUserBindings(userId);
    return first
      ? { subject: userId, tenantId: first.tenantId, role: first.role }
      : { subject: userId, tenantId: null, role: null };
  }

  private issuePair(subject: TokenSubject): TokenPairDto {
    const access = this.jwtTokenService.issue(subject, 'access', this.config.accessTokenTtl);
    const refresh = this.jwtTokenService.issue(subject, 'refresh', this.config.refreshTokenTtl);

    return {
      access_token: access.token,
      refresh_token: refresh.token,
      token_type: 'bearer',
      expires_in: this.config.accessTokenTtl,
    };
  }

  private decode(token: string, expectedType: TokenType): TokenClaims {
    try {
      return this.jwtTokenService.decode(token, expectedType);
    } catch (error) {
      // Tampered or misused tokens are worth a trace; expiry is routine
      if (error instanceof BadSignatureError || error instanceof WrongTokenTypeError) {
        this.logger.warn(`Rejected ${expectedType} token: ${error.code}`);
      }
      throw error;
    }
  }
}
