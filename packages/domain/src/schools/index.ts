/**
 * Schools Module (Domain Layer)
 *
 * - School: temporal entity and its invariants
 * - SchoolCommandRepository / SchoolQueryRepository: ports
 * - SchoolService: facade used by the API
 *
 * @example
 * ```typescript
 * import { SchoolService } from '@schoolreg/domain';
 * import { PostgresSchoolCommandRepository, PostgresSchoolQueryRepository } from '@schoolreg/infrastructure';
 *
 * const service = new SchoolService({
 *   commandRepository: new PostgresSchoolCommandRepository({ pool }),
 *   queryRepository: new PostgresSchoolQueryRepository({ pool: readPool }),
 * });
 * ```
 *
 * @module domain/schools
 */

export * from './school.js';
export * from './school-repository.js';
export * from './school-service.js';
