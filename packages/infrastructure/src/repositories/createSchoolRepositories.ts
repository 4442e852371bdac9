/**
 * Repository wiring per service type
 *
 * - default: command + query on the primary pool
 * - reader: query only, on the read pool (falls back to the primary)
 * - writer: command + query on the primary; the query side only backs the
 *   existence check before a delete
 *
 * Without any pool the in-memory temporal store stands in for PostgreSQL.
 */

import type { DatabasePool, Logger } from '@schoolreg/core';
import type { SchoolCommandRepository, SchoolQueryRepository } from '@schoolreg/domain';
import type { ServiceType } from '@schoolreg/types';

import {
  InMemorySchoolCommandRepository,
  InMemorySchoolQueryRepository,
} from './InMemorySchoolRepositories.js';
import { InMemoryTemporalSchoolStore } from './InMemoryTemporalSchoolStore.js';
import { PostgresSchoolCommandRepository } from './PostgresSchoolCommandRepository.js';
import { PostgresSchoolQueryRepository } from './PostgresSchoolQueryRepository.js';

export interface SchoolRepositoryWiring {
  serviceType: ServiceType;
  primaryPool?: DatabasePool;
  readPool?: DatabasePool;
  /** Store used when no pool is configured; a fresh one is created otherwise */
  memoryStore?: InMemoryTemporalSchoolStore;
  /** Parent logger for the PostgreSQL adapters */
  logger?: Logger;
}

export interface SchoolRepositories {
  commandRepository?: SchoolCommandRepository;
  queryRepository?: SchoolQueryRepository;
  /** `postgres` or `memory` */
  backend: 'postgres' | 'memory';
}

export class RepositoryWiringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RepositoryWiringError';
  }
}

export function createSchoolRepositories(wiring: SchoolRepositoryWiring): SchoolRepositories {
  const { serviceType, primaryPool, readPool } = wiring;
  const childLogger = (component: string): Logger | undefined =>
    wiring.logger?.child({ component });

  if (!primaryPool && !readPool) {
    const store = wiring.memoryStore ?? new InMemoryTemporalSchoolStore();
    const queryRepository = new InMemorySchoolQueryRepository(store);
    if (serviceType === 'reader') {
      return { queryRepository, backend: 'memory' };
    }
    return {
      commandRepository: new InMemorySchoolCommandRepository(store),
      queryRepository,
      backend: 'memory',
    };
  }

  if (serviceType === 'reader') {
    const pool = readPool ?? primaryPool;
    if (!pool) {
      throw new RepositoryWiringError('A reader needs a read or primary database pool');
    }
    return {
      queryRepository: new PostgresSchoolQueryRepository({
        pool,
        logger: childLogger('school-query-repository'),
      }),
      backend: 'postgres',
    };
  }

  if (!primaryPool) {
    throw new RepositoryWiringError(`A ${serviceType} service needs the primary database pool`);
  }

  return {
    commandRepository: new PostgresSchoolCommandRepository({
      pool: primaryPool,
      logger: childLogger('school-command-repository'),
    }),
    queryRepository: new PostgresSchoolQueryRepository({
      pool: primaryPool,
      logger: childLogger('school-query-repository'),
    }),
    backend: 'postgres',
  };
}
