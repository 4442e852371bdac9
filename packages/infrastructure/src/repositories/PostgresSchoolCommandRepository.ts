/**
 * @fileoverview PostgreSQL School Command Repository (Infrastructure Layer)
 *
 * Write side of the school store. Each operation runs in its own unit of
 * work (one pooled client, BEGIN ... COMMIT/ROLLBACK, release in finally).
 * History is written by the `schools_versioning` trigger, never here.
 *
 * @module @schoolreg/infrastructure/repositories/postgres-school-command-repository
 *
 * @example
 * ```typescript
 * const repository = new PostgresSchoolCommandRepository({ pool });
 * const added = await repository.add({ name, address, principalName, createdAt: new Date() });
 * ```
 */

import {
  ConcurrencyError,
  Err,
  FailureError,
  NotFoundError,
  Ok,
  SpanAttributes,
  createLogger,
  getTracer,
  withResultSpan,
  withTransaction,
  type AppError,
  type DatabasePool,
  type Logger,
  type Result,
  type Tracer,
} from '@schoolreg/core';
import type { NewSchool, School, SchoolChanges, SchoolCommandRepository } from '@schoolreg/domain';

import { SCHOOL_COLUMNS, toSchool } from './school-row.js';

export interface PostgresSchoolCommandRepositoryConfig {
  /** Pool of the primary (writable) database */
  pool: DatabasePool;
  logger?: Logger;
  tracer?: Tracer;
}

export class PostgresSchoolCommandRepository implements SchoolCommandRepository {
  private readonly pool: DatabasePool;
  private readonly logger: Logger;
  private readonly tracer: Tracer;

  constructor(config: PostgresSchoolCommandRepositoryConfig) {
    this.pool = config.pool;
    this.logger = config.logger ?? createLogger({ name: 'postgres-school-command-repository' });
    this.tracer = config.tracer ?? getTracer('@schoolreg/infrastructure');
  }

  async add(school: NewSchool): Promise<Result<School, AppError>> {
    return this.run('add', undefined, async () =>
      withTransaction(this.pool, async (tx) => {
        const { rows } = await tx.query(
          `INSERT INTO schools (name, address, principal_name, created_at)
           VALUES ($1, $2, $3, $4)
           RETURNING ${SCHOOL_COLUMNS}`,
          [school.name, school.address, school.principalName, school.createdAt]
        );

        const inserted = rows[0];
        if (!inserted) {
          return Err(new FailureError('FailedToAddSchool', 'No school row was inserted'));
        }
        return Ok(toSchool(inserted));
      })
    );
  }

  async update(changes: SchoolChanges): Promise<Result<School, AppError>> {
    return this.run('update', changes.id, async () =>
      withTransaction(this.pool, async (tx) => {
        const { rows: current } = await tx.selectForUpdate(
          `SELECT ${SCHOOL_COLUMNS} FROM schools WHERE id = $1`,
          [changes.id]
        );

        const locked = current[0];
        if (!locked) {
          return Err(this.notFound(changes.id));
        }

        if (changes.version !== undefined && toSchool(locked).version !== changes.version) {
          return Err(new ConcurrencyError('School', String(changes.id), 'SchoolVersionConflict'));
        }

        // id, created_at, version and the period are owned by the versioning trigger
        const { rows } = await tx.query(
          `UPDATE schools
           SET name = $2, address = $3, principal_name = $4
           WHERE id = $1
           RETURNING ${SCHOOL_COLUMNS}`,
          [changes.id, changes.name, changes.address, changes.principalName]
        );

        const updated = rows[0];
        if (!updated) {
          return Err(
            new FailureError('FailedToUpdateSchool', 'No school row was updated', undefined, {
              id: changes.id,
            })
          );
        }
        return Ok(toSchool(updated));
      })
    );
  }

  async delete(school: Pick<School, 'id'>): Promise<Result<true, AppError>> {
    return this.run('delete', school.id, async () =>
      withTransaction(this.pool, async (tx): Promise<Result<true, AppError>> => {
        const { rows: current } = await tx.selectForUpdate('SELECT id FROM schools WHERE id = $1', [
          school.id,
        ]);

        if (current.length === 0) {
          return Err(this.notFound(school.id));
        }

        const { rowCount } = await tx.query('DELETE FROM schools WHERE id = $1', [school.id]);

        if (!rowCount) {
          return Err(
            new FailureError('FailedToDeleteSchool', 'No school row was deleted', undefined, {
              id: school.id,
            })
          );
        }
        return Ok(true as const);
      })
    );
  }

  private notFound(id: number): NotFoundError {
    return new NotFoundError('SchoolNotFound', `School ${id} was not found`, { id });
  }

  /**
   * Span, logging and the exception boundary shared by every command
   */
  private async run<T>(
    operation: string,
    schoolId: number | undefined,
    fn: () => Promise<Result<T, AppError>>
  ): Promise<Result<T, AppError>> {
    return withResultSpan<T, AppError>(this.tracer, `school.command.${operation}`, async (span) => {
      span.setAttribute(SpanAttributes.SCHOOL_OPERATION, operation);
      if (schoolId !== undefined) {
        span.setAttribute(SpanAttributes.SCHOOL_ID, schoolId);
      }

      try {
        return await fn();
      } catch (error) {
        this.logger.error({ err: error, operation, schoolId }, 'School command failed');
        return Err(FailureError.fromException(error));
      }
    });
  }
}
