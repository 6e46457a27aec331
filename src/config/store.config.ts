import { registerAs } from '@nestjs/config';
import { EnvironmentVariables, STORE_DRIVERS, validateEnv } from './env.validation';

export type StoreDriver = (typeof STORE_DRIVERS)[number];

export interface StoreConfig {
  driver: StoreDriver;
  databaseUrl: string | null;
  timeoutMs: number;
}

export function toStoreConfig(env: EnvironmentVariables): StoreConfig {
  const driver = STORE_DRIVERS.find((candidate) => candidate === env.STORE_DRIVER);
  if (!driver) {
    throw new Error(`Unsupported STORE_DRIVER: ${env.STORE_DRIVER}`);
  }

  return {
    driver,
    databaseUrl: env.DATABASE_URL ?? null,
    timeoutMs: env.STORE_TIMEOUT_MS,
  };
}

export const storeConfig = registerAs('store', (): StoreConfig => toStoreConfig(validateEnv(process.env)));
