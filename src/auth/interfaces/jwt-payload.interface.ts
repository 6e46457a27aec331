import { Role } from '../roles';
import { TokenType } from './token-claims.interface';

/**
 * Claims as they appear inside the signed JWT
 */
export interface JwtPayload {
  sub: string;
  tenantId: string | null;
  role: Role | null;
  typ: TokenType;
  jti: string; // revocation key for refresh tokens
  iat: number;
  exp: number;
}
