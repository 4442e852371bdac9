/**
 * School Repository Interfaces (Ports)
 *
 * Writes and reads are split: a process may be wired with only one side.
 * Adapters are provided by @schoolreg/infrastructure:
 * - PostgresSchoolCommandRepository / PostgresSchoolQueryRepository
 * - InMemorySchoolCommandRepository / InMemorySchoolQueryRepository
 *
 * Every method resolves to a Result. Anticipated conditions (missing row,
 * zero rows affected) and store exceptions come back as Err values; no
 * method rejects.
 *
 * @module domain/schools/school-repository
 */

import type { AppError, Result } from '@schoolreg/core';

import type { NewSchool, School, SchoolChanges } from './school.js';

export interface SchoolCommandRepository {
  /**
   * Insert a school; resolves to the stored current version
   * (`FailedToAddSchool` when nothing was written)
   */
  add(school: NewSchool): Promise<Result<School, AppError>>;

  /**
   * Replace the mutable fields of the current version; the previous version
   * moves to history (`SchoolNotFound`, `SchoolVersionConflict`,
   * `FailedToUpdateSchool`)
   */
  update(school: SchoolChanges): Promise<Result<School, AppError>>;

  /**
   * Close the current version into history (`SchoolNotFound`,
   * `FailedToDeleteSchool`)
   */
  delete(school: Pick<School, 'id'>): Promise<Result<true, AppError>>;
}

export interface SchoolQueryRepository {
  /** Current version (`SchoolNotFound`) */
  getById(id: number): Promise<Result<School, AppError>>;

  /** Every current version ordered by id (`NoSchoolsFound` when empty) */
  getAll(): Promise<Result<School[], AppError>>;

  /**
   * Every version, current or historical, whose validity period intersects
   * [fromDate, toDate], ordered by validFrom (`NoSchoolsInDateRange`)
   */
  getSchoolsByDateRange(fromDate: Date, toDate: Date): Promise<Result<School[], AppError>>;

  /** Every version of one school ordered by validFrom (`NoSchoolVersionsFound`) */
  getAllVersions(id: number): Promise<Result<School[], AppError>>;
}
