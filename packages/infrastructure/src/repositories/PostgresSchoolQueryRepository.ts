/**
 * @fileoverview PostgreSQL School Query Repository (Infrastructure Layer)
 *
 * Read side of the school store. Every call runs in its own READ ONLY
 * transaction at REPEATABLE READ, so a query sees one snapshot and cannot
 * write. May point at a read replica.
 *
 * @module @schoolreg/infrastructure/repositories/postgres-school-query-repository
 */

import {
  Err,
  FailureError,
  IsolationLevel,
  NotFoundError,
  Ok,
  SpanAttributes,
  createLogger,
  getTracer,
  withResultSpan,
  withTransaction,
  type AppError,
  type DatabasePool,
  type ErrorParams,
  type Logger,
  type Result,
  type TransactionClient,
  type Tracer,
} from '@schoolreg/core';
import type { School, SchoolQueryRepository } from '@schoolreg/domain';

import { SCHOOL_COLUMNS, toSchool } from './school-row.js';

export interface PostgresSchoolQueryRepositoryConfig {
  /** Pool of the database to read from (primary or replica) */
  pool: DatabasePool;
  logger?: Logger;
  tracer?: Tracer;
}

// Current and historical versions in one relation
const ALL_VERSIONS = `(
  SELECT ${SCHOOL_COLUMNS} FROM schools
  UNION ALL
  SELECT ${SCHOOL_COLUMNS} FROM school_history
) AS versions`;

export class PostgresSchoolQueryRepository implements SchoolQueryRepository {
  private readonly pool: DatabasePool;
  private readonly logger: Logger;
  private readonly tracer: Tracer;

  constructor(config: PostgresSchoolQueryRepositoryConfig) {
    this.pool = config.pool;
    this.logger = config.logger ?? createLogger({ name: 'postgres-school-query-repository' });
    this.tracer = config.tracer ?? getTracer('@schoolreg/infrastructure');
  }

  async getById(id: number): Promise<Result<School, AppError>> {
    return this.run('getById', id, async (tx) => {
      const { rows } = await tx.query(`SELECT ${SCHOOL_COLUMNS} FROM schools WHERE id = $1`, [id]);
      const row = rows[0];
      if (!row) {
        return Err(new NotFoundError('SchoolNotFound', `School ${id} was not found`, { id }));
      }
      return Ok(toSchool(row));
    });
  }

  async getAll(): Promise<Result<School[], AppError>> {
    return this.run('getAll', undefined, async (tx) => {
      const { rows } = await tx.query(`SELECT ${SCHOOL_COLUMNS} FROM schools ORDER BY id`);
      return this.nonEmpty(rows.map(toSchool), 'NoSchoolsFound', 'No schools were found');
    });
  }

  async getSchoolsByDateRange(fromDate: Date, toDate: Date): Promise<Result<School[], AppError>> {
    return this.run('getSchoolsByDateRange', undefined, async (tx) => {
      const { rows } = await tx.query(
        `SELECT ${SCHOOL_COLUMNS} FROM ${ALL_VERSIONS}
         WHERE valid_from <= $2 AND valid_to >= $1
         ORDER BY valid_from`,
        [fromDate, toDate]
      );
      return this.nonEmpty(
        rows.map(toSchool),
        'NoSchoolsInDateRange',
        'No school versions in the requested range',
        { fromDate: fromDate.toISOString(), toDate: toDate.toISOString() }
      );
    });
  }

  async getAllVersions(id: number): Promise<Result<School[], AppError>> {
    return this.run('getAllVersions', id, async (tx) => {
      const { rows } = await tx.query(
        `SELECT ${SCHOOL_COLUMNS} FROM ${ALL_VERSIONS}
         WHERE id = $1
         ORDER BY valid_from`,
        [id]
      );
      return this.nonEmpty(
        rows.map(toSchool),
        'NoSchoolVersionsFound',
        `No versions of school ${id} were found`,
        { id }
      );
    });
  }

  private nonEmpty(
    schools: School[],
    code: string,
    message: string,
    params?: ErrorParams
  ): Result<School[], AppError> {
    if (schools.length === 0) {
      return Err(new NotFoundError(code, message, params));
    }
    return Ok(schools);
  }

  /**
   * Snapshot transaction, span, logging and the exception boundary shared by every query
   */
  private async run<T>(
    operation: string,
    schoolId: number | undefined,
    fn: (tx: TransactionClient) => Promise<Result<T, AppError>>
  ): Promise<Result<T, AppError>> {
    return withResultSpan<T, AppError>(this.tracer, `school.query.${operation}`, async (span) => {
      span.setAttribute(SpanAttributes.SCHOOL_OPERATION, operation);
      if (schoolId !== undefined) {
        span.setAttribute(SpanAttributes.SCHOOL_ID, schoolId);
      }

      try {
        return await withTransaction(this.pool, fn, {
          isolationLevel: IsolationLevel.REPEATABLE_READ,
          readOnly: true,
        });
      } catch (error) {
        this.logger.error({ err: error, operation, schoolId }, 'School query failed');
        return Err(FailureError.fromException(error));
      }
    });
  }
}
