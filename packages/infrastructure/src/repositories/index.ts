/**
 * @fileoverview Repository Adapters (Infrastructure Layer)
 *
 * Adapters implementing the school repository ports of the domain layer:
 * - PostgresSchoolCommandRepository / PostgresSchoolQueryRepository (CQRS over PostgreSQL)
 * - InMemorySchoolCommandRepository / InMemorySchoolQueryRepository (temporal store in memory)
 *
 * @module @schoolreg/infrastructure/repositories
 */

// =============================================================================
// POSTGRESQL ADAPTERS
// =============================================================================

export {
  PostgresSchoolCommandRepository,
  type PostgresSchoolCommandRepositoryConfig,
} from './PostgresSchoolCommandRepository.js';

export {
  PostgresSchoolQueryRepository,
  type PostgresSchoolQueryRepositoryConfig,
} from './PostgresSchoolQueryRepository.js';

export { SCHOOL_COLUMNS, InvalidSchoolRowError, isSchoolRow, toSchool, type SchoolRow } from './school-row.js';

// =============================================================================
// IN-MEMORY ADAPTERS
// =============================================================================

export {
  InMemoryTemporalSchoolStore,
  type InMemoryTemporalSchoolStoreOptions,
} from './InMemoryTemporalSchoolStore.js';

export {
  InMemorySchoolCommandRepository,
  InMemorySchoolQueryRepository,
} from './InMemorySchoolRepositories.js';

// =============================================================================
// WIRING
// =============================================================================

export {
  createSchoolRepositories,
  RepositoryWiringError,
  type SchoolRepositoryWiring,
  type SchoolRepositories,
} from './createSchoolRepositories.js';
