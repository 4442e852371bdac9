import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { Localizer, createLoggerOptions, type DatabasePool } from '@schoolreg/core';
import type { SchoolService } from '@schoolreg/domain';

import type { ApiConfig } from './config.js';
import correlationPlugin from './plugins/correlation.js';
import localizationPlugin from './plugins/localization.js';
import serviceTypePlugin from './plugins/service-type.js';
import { healthRoutes } from './routes/health.js';
import { API_PREFIX, SCHOOL_RESOURCE, schoolRoutes } from './routes/schools.js';

/**
 * School API
 *
 * One build serves all three profiles; SERVICE_TYPE decides which verbs
 * reach the school routes and which repositories back them.
 */

export interface BuildAppOptions {
  config: Readonly<ApiConfig>;
  service: SchoolService;
  /** Defaults to the catalogs shipped with @schoolreg/core */
  localizer?: Localizer;
  /** Pool probed by /ready */
  healthPool?: DatabasePool;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, service } = options;
  const localizer = options.localizer ?? new Localizer();

  const fastify = Fastify({
    logger: {
      ...createLoggerOptions({ name: `school-api-${config.serviceType}`, level: config.logger.level }),
      serializers: {
        req(request) {
          return {
            method: request.method,
            url: request.url,
            remoteAddress: request.ip,
          };
        },
        res(reply) {
          return {
            statusCode: reply.statusCode,
          };
        },
      },
    },
  });

  await fastify.register(correlationPlugin);
  await fastify.register(localizationPlugin, { localizer });
  // Must precede route registration
  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    // Framework 4xx (malformed JSON, unsupported media type, body too large)
    if (statusCode >= 400 && statusCode < 500) {
      request.log.info({ err: error }, 'Request rejected by the framework');
      return reply.sendError({
        statusCode,
        code: typeof error.code === 'string' ? error.code : 'BAD_REQUEST',
        fallbackMessage: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.sendError({ statusCode: 500, code: 'INTERNAL_ERROR' });
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.sendError({ statusCode: 404, code: 'NOT_FOUND' });
  });

  await fastify.register(serviceTypePlugin, {
    serviceType: config.serviceType,
    prefixes: [`${API_PREFIX}${SCHOOL_RESOURCE}`],
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
    hidePoweredBy: true,
  });

  await fastify.register(cors, {
    origin: config.cors.origins.length > 0 ? [...config.cors.origins] : false,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    exposedHeaders: ['location', 'x-correlation-id'],
  });

  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: `School API - ${config.serviceType}`,
        version: '1.0.0',
        description: 'Temporal school records. Every change keeps the previous version.',
      },
      servers: [
        {
          url: config.server.baseUrl ?? `http://localhost:${config.server.port}`,
          description: config.isProd ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'School', description: 'School records and their history' },
        { name: 'Health', description: 'Health checks and readiness probes' },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
    },
    staticCSP: true,
  });

  await fastify.register(healthRoutes, {
    serviceType: config.serviceType,
    pool: options.healthPool,
  });
  await fastify.register(schoolRoutes, { prefix: API_PREFIX, service });

  return fastify;
}
