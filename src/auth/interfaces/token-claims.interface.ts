import { Role } from '../roles';

export const TOKEN_TYPES = ['access', 'refresh'] as const;

export type TokenType = (typeof TOKEN_TYPES)[number];

/**
 * Who a token speaks for. `tenantId` and `role` are null for a
 * tenant-agnostic token.
 */
export interface TokenSubject {
  subject: string;
  tenantId: string | null;
  role: Role | null;
}

export interface TokenClaims extends TokenSubject {
  tokenType: TokenType;
  jti: string;
  /** Epoch seconds */
  issuedAt: number;
  /** Epoch seconds */
  expiresAt: number;
}

export interface IssuedToken {
  token: string;
  claims: TokenClaims;
}
