import type { FastifyBaseLogger, FastifyPluginAsync } from 'fastify';
import { pingDatabase, redactString, type DatabasePool } from '@schoolreg/core';
import type { ServiceType } from '@schoolreg/types';

/**
 * Health Check Routes
 *
 * `/health` is liveness only. `/ready` pings the pool this process reads
 * from; without a pool (in-memory store) it is always ready.
 */

interface HealthCheck {
  status: 'ok' | 'error';
  message?: string;
  latencyMs?: number;
}

interface HealthResponse {
  status: 'ok' | 'ready' | 'unhealthy';
  serviceType: ServiceType;
  timestamp: string;
  version: string;
  uptime: number;
  checks?: { database: HealthCheck };
}

export interface HealthRoutesOptions {
  serviceType: ServiceType;
  /** Pool probed by /ready; undefined when running on the in-memory store */
  pool?: DatabasePool;
}

async function checkDatabase(
  pool: DatabasePool | undefined,
  log: FastifyBaseLogger
): Promise<HealthCheck> {
  if (!pool) {
    return { status: 'ok', message: 'not configured (using in-memory store)' };
  }

  const start = Date.now();
  try {
    const reachable = await pingDatabase(pool);
    const latencyMs = Date.now() - start;
    return reachable ? { status: 'ok', latencyMs } : { status: 'error', message: 'ping failed', latencyMs };
  } catch (error) {
    // Driver messages can carry hosts and credentials; they stay in the log
    const detail = error instanceof Error ? error.message : String(error);
    log.error({ detail: redactString(detail) }, 'Database ping failed');
    return { status: 'error', message: 'database unreachable', latencyMs: Date.now() - start };
  }
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (
  fastify,
  { serviceType, pool }
) => {
  const version = process.env.npm_package_version ?? '1.0.0';

  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: { tags: ['Health'], summary: 'Liveness probe' } },
    async () => ({
      status: 'ok',
      serviceType,
      timestamp: new Date().toISOString(),
      version,
      uptime: process.uptime(),
    })
  );

  fastify.get<{ Reply: HealthResponse }>(
    '/ready',
    { schema: { tags: ['Health'], summary: 'Readiness probe' } },
    async (request, reply) => {
      const database = await checkDatabase(pool, request.log);
      const body: HealthResponse = {
        status: database.status === 'ok' ? 'ready' : 'unhealthy',
        serviceType,
        timestamp: new Date().toISOString(),
        version,
        uptime: process.uptime(),
        checks: { database },
      };

      if (database.status === 'error') {
        request.log.warn({ database }, 'Readiness check failed');
        return reply.status(503).send(body);
      }
      return body;
    }
  );
};
