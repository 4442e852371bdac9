/**
 * Correlation ID plugin for request tracing
 *
 * Reads `x-correlation-id` (the gateway always sets one) or generates a new
 * UUID, echoes it on the response and binds it to the request logger.
 */

import { type FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { generateCorrelationId } from '@schoolreg/core';
import { CorrelationIdSchema } from '@schoolreg/types';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

const correlationPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request, reply) => {
    const header = CorrelationIdSchema.safeParse(request.headers[CORRELATION_HEADER]);
    const correlationId = header.success ? header.data : generateCorrelationId();

    request.correlationId = correlationId;
    void reply.header(CORRELATION_HEADER, correlationId);
    request.log = request.log.child({ correlationId });
  });
};

export default fp(correlationPlugin, {
  name: 'correlation',
  fastify: '5.x',
});
