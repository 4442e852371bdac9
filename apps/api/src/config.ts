/**
 * Application configuration
 *
 * Read once at startup into a frozen object that is injected into the app;
 * request handlers never consult process.env.
 */

import { z } from 'zod';
import {
  CorsEnvSchema,
  DatabaseEnvSchema,
  EnvValidationError,
  ServerEnvSchema,
  parseList,
  parseServiceType,
  validateEnv,
} from '@schoolreg/core';
import type { ServiceType } from '@schoolreg/types';

const ApiEnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema)
  .merge(CorsEnvSchema)
  .extend({
    SERVICE_TYPE: z.string().optional(),
    API_BASE_URL: z.string().url().optional(),
  });

export type ApiEnv = z.infer<typeof ApiEnvSchema>;

export interface ApiConfig {
  env: ApiEnv['NODE_ENV'];
  isProd: boolean;
  serviceType: ServiceType;
  server: Readonly<{ port: number; host: string; baseUrl: string | undefined }>;
  logger: Readonly<{ level: ApiEnv['LOG_LEVEL'] }>;
  database: Readonly<{
    url: string | undefined;
    readUrl: string | undefined;
    maxConnections: number;
    ssl: boolean;
    runMigrations: boolean;
  }>;
  cors: Readonly<{ origins: readonly string[] }>;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Readonly<ApiConfig> {
  const env = validateEnv(ApiEnvSchema, source);
  const serviceType = parseServiceType(env.SERVICE_TYPE);
  const isProd = env.NODE_ENV === 'production';

  // The in-memory store is a development stand-in only
  if (isProd && !env.DATABASE_URL && !(serviceType === 'reader' && env.DATABASE_READ_URL)) {
    throw new EnvValidationError({ DATABASE_URL: ['Required in production'] });
  }

  // Only readers use the replica; anything else would fall back to memory unnoticed
  if (serviceType !== 'reader' && env.DATABASE_READ_URL && !env.DATABASE_URL) {
    throw new EnvValidationError({
      DATABASE_URL: [`Required for a ${serviceType} service when DATABASE_READ_URL is set`],
    });
  }

  return Object.freeze({
    env: env.NODE_ENV,
    isProd,
    serviceType,
    server: Object.freeze({ port: env.PORT, host: env.HOST, baseUrl: env.API_BASE_URL }),
    logger: Object.freeze({ level: env.LOG_LEVEL }),
    database: Object.freeze({
      url: env.DATABASE_URL,
      readUrl: env.DATABASE_READ_URL,
      maxConnections: env.DATABASE_MAX_CONNECTIONS,
      ssl: env.DATABASE_SSL,
      runMigrations: env.RUN_MIGRATIONS,
    }),
    cors: Object.freeze({ origins: Object.freeze(parseList(env.CORS_ORIGIN)) }),
  });
}
