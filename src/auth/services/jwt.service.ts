import { Injectable } from '@nestjs/common';
import { JwtModuleOptions, JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { Clock, toEpochSeconds } from '../../common/clock';
import {
  AuthError,
  BadSignatureError,
  ExpiredTokenError,
  MalformedTokenError,
  WrongTokenTypeError,
} from '../../common/errors';
import { AuthConfig } from '../../config/auth.config';
import { JwtPayload } from '../interfaces/jwt-payload.interface';
import { IssuedToken, TOKEN_TYPES, TokenClaims, TokenSubject, TokenType } from '../interfaces/token-claims.interface';
import { isRole } from '../roles';

// jsonwebtoken reports these as JsonWebTokenError; they mean "not signed by us"
const SIGNATURE_FAILURES = [
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
  'jwt issuer invalid',
  'jwt audience invalid',
];

/**
 * Signing and verification settings for JwtModule.
 * HS* algorithms sign with the shared secret, the others with the key pair.
 */
export function buildJwtOptions({ jwt }: AuthConfig): JwtModuleOptions {
  const claims = { issuer: jwt.issuer, audience: jwt.audience };
  const signOptions = { algorithm: jwt.algorithm, ...claims };
  const verifyOptions = { algorithms: [jwt.algorithm], ...claims };

  if (jwt.algorithm.startsWith('HS')) {
    return { secret: jwt.secret ?? undefined, signOptions, verifyOptions };
  }

  return {
    privateKey: jwt.privateKey ?? undefined,
    publicKey: jwt.publicKey ?? undefined,
    signOptions,
    verifyOptions,
  };
}

function toTokenError(error: unknown): AuthError {
  if (error instanceof Error) {
    if (error.name === 'TokenExpiredError') {
      return new ExpiredTokenError();
    }
    if (error.name === 'JsonWebTokenError' && SIGNATURE_FAILURES.some((failure) => error.message.startsWith(failure))) {
      return new BadSignatureError();
    }
  }
  return new MalformedTokenError();
}

function toClaims(payload: Record<string, unknown>): TokenClaims | null {
  const { sub, jti, iat, exp, typ, tenantId: rawTenantId, role: rawRole } = payload;
  const tokenType = TOKEN_TYPES.find((type) => type === typ);
  const tenantId = typeof rawTenantId === 'string' ? rawTenantId : rawTenantId === null ? null : undefined;
  const role = isRole(rawRole) ? rawRole : rawRole === null ? null : undefined;

  if (
    typeof sub !== 'string' ||
    typeof jti !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    tokenType === undefined ||
    tenantId === undefined ||
    role === undefined
  ) {
    return null;
  }

  return { subject: sub, tenantId, role, tokenType, jti, issuedAt: iat, expiresAt: exp };
}

@Injectable()
export class JwtTokenService {
  constructor(
    private readonly jwtService: JwtService,
    private readonly clock: Clock,
  ) {}

  /**
   * Sign a token for the given subject
   * @param subject - User, tenant context and role carried by the token
   * @param tokenType - access or refresh; tokens of one type are rejected where the other is expected
   * @param ttlSeconds - Lifetime from now
   * @returns The signed token and the claims it carries
   */
  issue(subject: TokenSubject, tokenType: TokenType, ttlSeconds: number): IssuedToken {
    const issuedAt = toEpochSeconds(this.clock.now());
    const claims: TokenClaims = {
      subject: subject.subject,
      tenantId: subject.tenantId,
      role: subject.role,
      tokenType,
      jti: randomUUID(),
      issuedAt,
      expiresAt: issuedAt + ttlSeconds,
    };

    const payload: JwtPayload = {
      sub: claims.subject,
      tenantId: claims.tenantId,
      role: claims.role,
      typ: tokenType,
      jti: claims.jti,
      iat: claims.issuedAt,
      exp: claims.expiresAt,
    };

    return { token: this.jwtService.sign(payload), claims };
  }

  /**
   * Verify and decode a token
   * @param token - The JWT to verify
   * @param expectedType - Type required at the call site
   * @throws ExpiredTokenError | BadSignatureError | MalformedTokenError | WrongTokenTypeError
   */
  decode(token: string, expectedType: TokenType): TokenClaims {
    let payload: Record<string, unknown>;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        clockTimestamp: toEpochSeconds(this.clock.now()),
      });
    } catch (error) {
      throw toTokenError(error);
    }

    const claims = toClaims(payload);
    if (!claims) {
      throw new MalformedTokenError('Token is missing required claims');
    }
    if (claims.tokenType !== expectedType) {
      throw new WrongTokenTypeError(expectedType);
    }
    return claims;
  }
}
