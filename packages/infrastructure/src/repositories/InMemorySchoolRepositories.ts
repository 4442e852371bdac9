/**
 * In-Memory School Repositories
 *
 * Command and query adapters over one shared InMemoryTemporalSchoolStore,
 * with the same Result codes as the PostgreSQL adapters.
 *
 * @example
 * ```typescript
 * const store = new InMemoryTemporalSchoolStore();
 * const service = new SchoolService({
 *   commandRepository: new InMemorySchoolCommandRepository(store),
 *   queryRepository: new InMemorySchoolQueryRepository(store),
 * });
 * ```
 */

import {
  ConcurrencyError,
  Err,
  FailureError,
  NotFoundError,
  Ok,
  type AppError,
  type Result,
} from '@schoolreg/core';
import {
  overlapsRange,
  type NewSchool,
  type School,
  type SchoolChanges,
  type SchoolCommandRepository,
  type SchoolQueryRepository,
} from '@schoolreg/domain';

import type { InMemoryTemporalSchoolStore } from './InMemoryTemporalSchoolStore.js';

function schoolNotFound(id: number): NotFoundError {
  return new NotFoundError('SchoolNotFound', `School ${id} was not found`, { id });
}

export class InMemorySchoolCommandRepository implements SchoolCommandRepository {
  constructor(private readonly store: InMemoryTemporalSchoolStore) {}

  add(school: NewSchool): Promise<Result<School, AppError>> {
    return Promise.resolve(Ok(this.store.insert(school)));
  }

  update(changes: SchoolChanges): Promise<Result<School, AppError>> {
    const existing = this.store.findCurrent(changes.id);
    if (!existing) {
      return Promise.resolve(Err(schoolNotFound(changes.id)));
    }
    if (changes.version !== undefined && existing.version !== changes.version) {
      return Promise.resolve(
        Err(new ConcurrencyError('School', String(changes.id), 'SchoolVersionConflict'))
      );
    }

    const updated = this.store.replace(changes);
    if (!updated) {
      return Promise.resolve(
        Err(
          new FailureError('FailedToUpdateSchool', 'No school row was updated', undefined, {
            id: changes.id,
          })
        )
      );
    }
    return Promise.resolve(Ok(updated));
  }

  delete(school: Pick<School, 'id'>): Promise<Result<true, AppError>> {
    if (!this.store.findCurrent(school.id)) {
      return Promise.resolve(Err(schoolNotFound(school.id)));
    }
    if (!this.store.remove(school.id)) {
      return Promise.resolve(
        Err(
          new FailureError('FailedToDeleteSchool', 'No school row was deleted', undefined, {
            id: school.id,
          })
        )
      );
    }
    return Promise.resolve(Ok(true as const));
  }
}

export class InMemorySchoolQueryRepository implements SchoolQueryRepository {
  constructor(private readonly store: InMemoryTemporalSchoolStore) {}

  getById(id: number): Promise<Result<School, AppError>> {
    const school = this.store.findCurrent(id);
    return Promise.resolve(school ? Ok(school) : Err(schoolNotFound(id)));
  }

  getAll(): Promise<Result<School[], AppError>> {
    const schools = this.store.listCurrent();
    if (schools.length === 0) {
      return Promise.resolve(Err(new NotFoundError('NoSchoolsFound', 'No schools were found')));
    }
    return Promise.resolve(Ok(schools));
  }

  getSchoolsByDateRange(fromDate: Date, toDate: Date): Promise<Result<School[], AppError>> {
    const schools = this.store
      .allVersions()
      .filter((school) => overlapsRange(school, fromDate, toDate));
    if (schools.length === 0) {
      return Promise.resolve(
        Err(
          new NotFoundError('NoSchoolsInDateRange', 'No school versions in the requested range', {
            fromDate: fromDate.toISOString(),
            toDate: toDate.toISOString(),
          })
        )
      );
    }
    return Promise.resolve(Ok(schools));
  }

  getAllVersions(id: number): Promise<Result<School[], AppError>> {
    const versions = this.store.versionsOf(id);
    if (versions.length === 0) {
      return Promise.resolve(
        Err(
          new NotFoundError('NoSchoolVersionsFound', `No versions of school ${id} were found`, {
            id,
          })
        )
      );
    }
    return Promise.resolve(Ok(versions));
  }
}
