import { registerAs } from '@nestjs/config';
import { ROLES, Role, isRole } from '../auth/roles';
import { EnvironmentVariables, JWT_ALGORITHMS, validateEnv } from './env.validation';

export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export interface AuthConfig {
  jwt: {
    algorithm: JwtAlgorithm;
    secret: string | null;
    privateKey: string | null;
    publicKey: string | null;
    issuer: string;
    audience: string;
  };
  /** Seconds */
  accessTokenTtl: number;
  /** Seconds */
  refreshTokenTtl: number;
  bcryptRounds: number;
  passwordMinLength: number;
  /** Roles admins may hand out; a subset of ROLES */
  assignableRoles: readonly Role[];
  /** 0 disables the periodic purge */
  revocationPurgeIntervalMs: number;
}

function isJwtAlgorithm(value: string): value is JwtAlgorithm {
  return (JWT_ALGORITHMS as readonly string[]).includes(value);
}

function parseRoleList(raw: string): Role[] {
  const roles = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  const unknown = roles.filter((role) => !isRole(role));
  if (unknown.length > 0) {
    throw new Error(`AUTH_ASSIGNABLE_ROLES contains unknown roles: ${unknown.join(', ')} (allowed: ${ROLES.join(', ')})`);
  }

  return roles.filter(isRole);
}

// PEM keys usually arrive with escaped newlines from env files
function readKey(value: string | undefined): string | null {
  return value ? value.replace(/\\n/g, '\n') : null;
}

export function toAuthConfig(env: EnvironmentVariables): AuthConfig {
  const algorithm = env.AUTH_JWT_ALGORITHM;
  if (!isJwtAlgorithm(algorithm)) {
    throw new Error(`Unsupported AUTH_JWT_ALGORITHM: ${algorithm}`);
  }

  return {
    jwt: {
      algorithm,
      secret: env.AUTH_JWT_SECRET ?? null,
      privateKey: readKey(env.AUTH_JWT_PRIVATE_KEY),
      publicKey: readKey(env.AUTH_JWT_PUBLIC_KEY),
      issuer: env.AUTH_JWT_ISSUER,
      audience: env.AUTH_JWT_AUDIENCE,
    },
    accessTokenTtl: env.AUTH_ACCESS_TOKEN_TTL,
    refreshTokenTtl: env.AUTH_REFRESH_TOKEN_TTL,
    bcryptRounds: env.AUTH_BCRYPT_ROUNDS,
    passwordMinLength: env.AUTH_PASSWORD_MIN_LENGTH,
    assignableRoles: parseRoleList(env.AUTH_ASSIGNABLE_ROLES),
    revocationPurgeIntervalMs: env.AUTH_REVOCATION_PURGE_INTERVAL_MS,
  };
}

export const authConfig = registerAs('auth', (): AuthConfig => toAuthConfig(validateEnv(process.env)));
