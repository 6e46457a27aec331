import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsString, Max, Min, MinLength, ValidateIf, validateSync } from 'class-validator';

export const JWT_ALGORITHMS = [
  'HS256',
  'HS384',
  'HS512',
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
  'PS256',
  'PS384',
  'PS512',
] as const;

export const STORE_DRIVERS = ['memory', 'postgres'] as const;

function usesSharedSecret(env: EnvironmentVariables): boolean {
  return env.AUTH_JWT_ALGORITHM.startsWith('HS');
}

/**
 * Every variable the service reads, with its default
 */
export class EnvironmentVariables {
  @IsIn(JWT_ALGORITHMS)
  AUTH_JWT_ALGORITHM: string = 'HS256';

  @ValidateIf(usesSharedSecret)
  @IsString()
  @MinLength(8)
  AUTH_JWT_SECRET?: string;

  @ValidateIf((env: EnvironmentVariables) => !usesSharedSecret(env))
  @IsString()
  AUTH_JWT_PRIVATE_KEY?: string;

  @ValidateIf((env: EnvironmentVariables) => !usesSharedSecret(env))
  @IsString()
  AUTH_JWT_PUBLIC_KEY?: string;

  @IsString()
  AUTH_JWT_ISSUER: string = 'tenant-auth';

  @IsString()
  AUTH_JWT_AUDIENCE: string = 'tenant-auth-api';

  @IsInt()
  @Min(1)
  AUTH_ACCESS_TOKEN_TTL: number = 30 * 60;

  @IsInt()
  @Min(1)
  AUTH_REFRESH_TOKEN_TTL: number = 7 * 24 * 60 * 60;

  @IsInt()
  @Min(4)
  @Max(31)
  AUTH_BCRYPT_ROUNDS: number = 12;

  @IsInt()
  @Min(1)
  AUTH_PASSWORD_MIN_LENGTH: number = 1;

  @IsString()
  AUTH_ASSIGNABLE_ROLES: string = 'owner,admin,member,viewer';

  @IsInt()
  @Min(0)
  AUTH_REVOCATION_PURGE_INTERVAL_MS: number = 10 * 60 * 1000;

  @IsIn(STORE_DRIVERS)
  STORE_DRIVER: string = 'memory';

  @ValidateIf((env: EnvironmentVariables) => env.STORE_DRIVER === 'postgres')
  @IsString()
  DATABASE_URL?: string;

  @IsInt()
  @Min(1)
  STORE_TIMEOUT_MS: number = 5000;
}

/**
 * Validate and coerce raw environment variables
 * @param config - Usually process.env
 * @throws Error listing every invalid variable
 */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(env);

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return env;
}
