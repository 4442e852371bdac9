/**
 * Service-type filter
 *
 * Rejects requests whose verb the process profile does not serve (a reader
 * takes no writes, a writer no reads) before body parsing and before any
 * repository is reached.
 */

import { type FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { isMethodAllowed } from '@schoolreg/core';
import type { ServiceType } from '@schoolreg/types';

export interface ServiceTypePluginOptions {
  serviceType: ServiceType;
  /** Paths under these prefixes are filtered; health and docs stay reachable */
  prefixes: readonly string[];
}

/**
 * Match against the route template the router resolved, so percent-encoded
 * or otherwise non-canonical request paths land on the same decision.
 */
function matchesPrefix(routeUrl: string | undefined, prefix: string): boolean {
  if (routeUrl === undefined || !routeUrl.startsWith(prefix)) return false;
  const next = routeUrl.charAt(prefix.length);
  return next === '' || next === '/';
}

const serviceTypePlugin: FastifyPluginAsync<ServiceTypePluginOptions> = async (
  fastify,
  { serviceType, prefixes }
) => {
  fastify.addHook('onRequest', async (request, reply) => {
    const routeUrl = request.routeOptions.url;
    if (!prefixes.some((prefix) => matchesPrefix(routeUrl, prefix))) return;
    if (isMethodAllowed(serviceType, request.method)) return;

    request.log.warn(
      { method: request.method, url: request.url, route: routeUrl, serviceType },
      'Request rejected by service type'
    );
    return reply.sendError({
      statusCode: 403,
      code: 'ServiceTypeForbidden',
      params: { serviceType },
    });
  });
};

export default fp(serviceTypePlugin, {
  name: 'service-type',
  fastify: '5.x',
  dependencies: ['localization'],
});
