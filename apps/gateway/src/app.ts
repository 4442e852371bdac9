import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import {
  SpanAttributes,
  createLoggerOptions,
  generateCorrelationId,
  getTracer,
  withResultSpan,
  type Tracer,
} from '@schoolreg/core';
import { CorrelationIdSchema } from '@schoolreg/types';

import { RoundRobinBalancer } from './balancer.js';
import type { GatewayConfig } from './config.js';
import { stripHopByHop, type Forwarder, type HeaderMap } from './forwarder.js';
import { RouteTable } from './route-table.js';

/**
 * School API Gateway
 *
 * Single entry point in front of the default, reader and writer pools.
 * Every path except /health goes through the route table.
 */

const CORRELATION_HEADER = 'x-correlation-id';

export interface BuildGatewayOptions {
  config: Readonly<GatewayConfig>;
  forwarder: Forwarder;
  balancer?: RoundRobinBalancer;
  tracer?: Tracer;
}

function sendGatewayError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  correlationId: string
): FastifyReply {
  return reply.status(statusCode).send({ error: { code, message, correlationId } });
}

function readCorrelationId(request: FastifyRequest): string {
  const header = CorrelationIdSchema.safeParse(request.headers[CORRELATION_HEADER]);
  return header.success ? header.data : generateCorrelationId();
}

function flattenHeaders(request: FastifyRequest): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (value !== undefined) {
      headers[name] = value;
    }
  }
  return headers;
}

function appendForwardedFor(existing: string | string[] | undefined, ip: string): string {
  const prior = Array.isArray(existing) ? existing.join(', ') : existing;
  return prior ? `${prior}, ${ip}` : ip;
}

export async function buildGateway(options: BuildGatewayOptions): Promise<FastifyInstance> {
  const { config, forwarder } = options;
  const table = new RouteTable(config.routes);
  const balancer = options.balancer ?? new RoundRobinBalancer(config.pools);
  const tracer = options.tracer ?? getTracer('school-gateway');

  const fastify = Fastify({
    logger: createLoggerOptions({ name: 'school-gateway', level: config.logger.level }),
  });

  // Bodies are relayed untouched
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    const correlationId = readCorrelationId(request);
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return sendGatewayError(reply, statusCode, 'BAD_REQUEST', error.message, correlationId);
    }
    request.log.error({ err: error }, 'Gateway error');
    return sendGatewayError(
      reply,
      500,
      'INTERNAL_ERROR',
      'An unexpected error occurred',
      correlationId
    );
  });

  fastify.get('/health', async () => ({
    status: 'ok',
    service: 'gateway',
    timestamp: new Date().toISOString(),
    routes: table.routes.length,
  }));

  const proxy = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    const correlationId = readCorrelationId(request);
    void reply.header(CORRELATION_HEADER, correlationId);

    const queryIndex = request.url.indexOf('?');
    const path = queryIndex === -1 ? request.url : request.url.slice(0, queryIndex);
    const query = queryIndex === -1 ? '' : request.url.slice(queryIndex);

    const match = table.match(request.method, path);
    if (match.kind === 'not_found') {
      return sendGatewayError(reply, 404, 'NOT_FOUND', 'No route matches this path', correlationId);
    }
    if (match.kind === 'method_not_allowed') {
      void reply.header('allow', match.allow.join(', '));
      return sendGatewayError(
        reply,
        405,
        'METHOD_NOT_ALLOWED',
        `${request.method} is not routed for ${match.route.upstreamPathTemplate}`,
        correlationId
      );
    }

    const { pool } = match.route;
    const host = balancer.next(pool);
    const target = `${host.replace(/\/+$/, '')}${match.downstreamPath}${query}`;
    const incoming = flattenHeaders(request);
    const headers = stripHopByHop(incoming, ['host', 'content-length']);
    headers['x-forwarded-for'] = appendForwardedFor(incoming['x-forwarded-for'], request.ip);
    headers['x-forwarded-host'] = request.headers.host ?? request.hostname;
    headers['x-forwarded-proto'] = request.protocol;
    headers[CORRELATION_HEADER] = correlationId;

    const log = request.log.child({ correlationId, pool, target });
    const result = await withResultSpan(
      tracer,
      'gateway.forward',
      (span) => {
        span.setAttribute(SpanAttributes.GATEWAY_POOL, pool);
        span.setAttribute(SpanAttributes.GATEWAY_TARGET, target);
        return forwarder.forward({
          method: request.method,
          url: target,
          headers,
          body: Buffer.isBuffer(request.body) ? request.body : undefined,
        });
      },
      { correlationId }
    );

    if (result._tag === 'Err') {
      const { error } = result;
      if (error.reason === 'timeout') {
        log.warn({ err: error }, 'Downstream timed out');
        return sendGatewayError(
          reply,
          504,
          error.code,
          'The downstream service did not respond in time',
          correlationId
        );
      }
      log.warn({ err: error }, 'Downstream unreachable');
      return sendGatewayError(
        reply,
        502,
        error.code,
        'The downstream service is unavailable',
        correlationId
      );
    }

    const { statusCode, headers: responseHeaders, body } = result.value;
    log.debug({ statusCode }, 'Forwarded');
    return reply
      .status(statusCode)
      .headers({ ...responseHeaders, [CORRELATION_HEADER]: correlationId })
      .send(body);
  };

  fastify.all('/*', proxy);
  fastify.setNotFoundHandler(proxy);

  return fastify;
}
