/**
 * Gateway configuration
 *
 * Route table and pools come from a JSON file (config/gateway.json unless
 * GATEWAY_CONFIG_PATH says otherwise); pool hosts can be replaced per
 * environment through GATEWAY_POOL_*. Everything is validated once at
 * startup and an inconsistent table fails the boot.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ServerEnvSchema, ValidationError, parseList, validateEnv } from '@schoolreg/core';
import { HttpMethodSchema, ServiceTypeSchema, type ServiceType } from '@schoolreg/types';

import { validateRouteTable, type RouteDefinition } from './route-table.js';

export const DEFAULT_GATEWAY_CONFIG_PATH = fileURLToPath(
  new URL('../config/gateway.json', import.meta.url)
);

const PathTemplateSchema = z.string().startsWith('/', 'Path templates must start with "/"');

const HostListSchema = z.array(z.string().url()).min(1, 'A pool needs at least one host');

const RouteDefinitionSchema = z.object({
  upstreamPathTemplate: PathTemplateSchema,
  upstreamMethods: z.array(HttpMethodSchema).min(1),
  pool: ServiceTypeSchema,
  downstreamPathTemplate: PathTemplateSchema,
});

export const GatewayFileSchema = z.object({
  routes: z.array(RouteDefinitionSchema).min(1),
  pools: z.object({
    default: HostListSchema,
    reader: HostListSchema,
    writer: HostListSchema,
  }),
});

export type GatewayFile = z.infer<typeof GatewayFileSchema>;

const GatewayEnvSchema = ServerEnvSchema.extend({
  PORT: z.coerce.number().int().min(1).max(65535).default(8086),
  GATEWAY_CONFIG_PATH: z.string().optional(),
  GATEWAY_POOL_DEFAULT: z.string().optional(),
  GATEWAY_POOL_READER: z.string().optional(),
  GATEWAY_POOL_WRITER: z.string().optional(),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export type GatewayEnv = z.infer<typeof GatewayEnvSchema>;

export interface GatewayConfig {
  env: GatewayEnv['NODE_ENV'];
  server: Readonly<{ port: number; host: string }>;
  logger: Readonly<{ level: GatewayEnv['LOG_LEVEL'] }>;
  timeoutMs: number;
  routes: readonly RouteDefinition[];
  pools: Readonly<Record<ServiceType, readonly string[]>>;
}

/**
 * Read and validate a gateway file
 */
export function readGatewayFile(filePath: string): GatewayFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ValidationError(
      `Cannot read gateway configuration at ${filePath}`,
      { cause: error instanceof Error ? error.message : String(error) },
      'INVALID_GATEWAY_CONFIG'
    );
  }

  const result = GatewayFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Invalid gateway configuration at ${filePath}`,
      result.error.flatten(),
      'INVALID_GATEWAY_CONFIG'
    );
  }
  return result.data;
}

function overrideHosts(configured: readonly string[], override: string | undefined): string[] {
  const hosts = parseList(override);
  if (hosts.length === 0) return [...configured];

  const parsed = HostListSchema.safeParse(hosts);
  if (!parsed.success) {
    throw new ValidationError('Invalid pool override', parsed.error.flatten(), 'INVALID_GATEWAY_CONFIG');
  }
  return parsed.data;
}

export function loadGatewayConfig(source: NodeJS.ProcessEnv = process.env): Readonly<GatewayConfig> {
  const env = validateEnv(GatewayEnvSchema, source);
  const file = readGatewayFile(env.GATEWAY_CONFIG_PATH ?? DEFAULT_GATEWAY_CONFIG_PATH);

  validateRouteTable(file.routes);

  return Object.freeze({
    env: env.NODE_ENV,
    server: Object.freeze({ port: env.PORT, host: env.HOST }),
    logger: Object.freeze({ level: env.LOG_LEVEL }),
    timeoutMs: env.GATEWAY_TIMEOUT_MS,
    routes: Object.freeze(file.routes.map((route) => Object.freeze(route))),
    pools: Object.freeze({
      default: Object.freeze(overrideHosts(file.pools.default, env.GATEWAY_POOL_DEFAULT)),
      reader: Object.freeze(overrideHosts(file.pools.reader, env.GATEWAY_POOL_READER)),
      writer: Object.freeze(overrideHosts(file.pools.writer, env.GATEWAY_POOL_WRITER)),
    }),
  });
}
