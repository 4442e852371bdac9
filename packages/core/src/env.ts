import { z } from 'zod';

/**
 * Environment Variable Validation
 * Shared building blocks; each app merges the parts it needs and fails at boot
 * time on an invalid environment.
 */

const BooleanStringSchema = z
  .enum(['true', 'false'])
  .optional()
  .transform((v) => v !== 'false');

// Base server config
export const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

// PostgreSQL config; both URLs are optional outside production
export const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url('DATABASE_URL must be a connection URL').optional(),
  DATABASE_READ_URL: z.string().url('DATABASE_READ_URL must be a connection URL').optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().min(1).max(100).default(10),
  DATABASE_SSL: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  /** Apply pending SQL migrations at startup (writer and default profiles) */
  RUN_MIGRATIONS: BooleanStringSchema,
});

export const CorsEnvSchema = z.object({
  /** Comma-separated list of allowed origins; unset disables CORS */
  CORS_ORIGIN: z.string().optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;
export type DatabaseEnv = z.infer<typeof DatabaseEnvSchema>;

/**
 * Thrown when the environment does not satisfy a schema
 */
export class EnvValidationError extends Error {
  public readonly fieldErrors: Record<string, string[] | undefined>;

  constructor(fieldErrors: Record<string, string[] | undefined>) {
    const errorMessages = Object.entries(fieldErrors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');
    super(`Environment validation failed:\n${errorMessages}`);
    this.name = 'EnvValidationError';
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Validate an environment against a schema
 */
export function validateEnv<S extends z.ZodTypeAny>(
  schema: S,
  source: NodeJS.ProcessEnv = process.env
): z.infer<S> {
  const result = schema.safeParse(source);

  if (!result.success) {
    throw new EnvValidationError(result.error.flatten().fieldErrors);
  }

  return result.data;
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
