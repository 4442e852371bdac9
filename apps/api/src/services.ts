/**
 * Service wiring per profile
 *
 * Opens the pools the profile needs and hands the repositories to a
 * SchoolService. Without a database URL (development, tests) everything runs
 * on the in-memory temporal store.
 */

import { createDatabaseClient, type DatabasePool, type Logger } from '@schoolreg/core';
import { SchoolService } from '@schoolreg/domain';
import { createSchoolRepositories, type InMemoryTemporalSchoolStore } from '@schoolreg/infrastructure';

import type { ApiConfig } from './config.js';

export interface SchoolServiceWiring {
  service: SchoolService;
  /** Pool for writes and migrations; absent for readers on a replica */
  primaryPool?: DatabasePool;
  /** Pool probed by /ready */
  healthPool?: DatabasePool;
  /** Every pool opened, for shutdown */
  pools: DatabasePool[];
  backend: 'postgres' | 'memory';
}

export interface CreateSchoolServiceOptions {
  logger?: Logger;
  memoryStore?: InMemoryTemporalSchoolStore;
  clock?: () => Date;
}

export function createSchoolService(
  config: Readonly<ApiConfig>,
  options: CreateSchoolServiceOptions = {}
): SchoolServiceWiring {
  const { serviceType, database } = config;
  const openPool = (connectionString: string, name: string): DatabasePool =>
    createDatabaseClient({
      connectionString,
      name,
      maxConnections: database.maxConnections,
      ssl: database.ssl,
    });

  // A reader only needs the primary when it has no replica to read from
  const useReplica = serviceType === 'reader' && database.readUrl !== undefined;
  const primaryPool =
    database.url !== undefined && !useReplica ? openPool(database.url, 'primary') : undefined;
  const readPool =
    useReplica && database.readUrl !== undefined ? openPool(database.readUrl, 'read') : undefined;

  const repositories = createSchoolRepositories({
    serviceType,
    primaryPool,
    readPool,
    memoryStore: options.memoryStore,
    logger: options.logger,
  });

  const service = new SchoolService({
    commandRepository: repositories.commandRepository,
    queryRepository: repositories.queryRepository,
    serviceType,
    clock: options.clock,
    logger: options.logger?.child({ component: 'school-service' }),
  });

  const pools = [primaryPool, readPool].filter((pool): pool is DatabasePool => pool !== undefined);

  return {
    service,
    primaryPool,
    healthPool: readPool ?? primaryPool,
    pools,
    backend: repositories.backend,
  };
}
