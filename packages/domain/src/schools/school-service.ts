/**
 * School Service
 *
 * Facade over the command and query repositories. Stamps creation time,
 * defaults the principal, and checks existence on the query side before a
 * delete. A side that is not wired for this process answers
 * `ServiceTypeForbidden` without touching any repository.
 */

import {
  Err,
  ForbiddenError,
  ValidationError,
  createLogger,
  isErr,
  isOk,
  type AppError,
  type Logger,
  type Result,
} from '@schoolreg/core';
import type { ServiceType } from '@schoolreg/types';

import type { SchoolCommandRepository, SchoolQueryRepository } from './school-repository.js';
import { normalizePrincipalName, type School, type SchoolChanges } from './school.js';

export interface AddSchoolInput {
  name: string;
  address: string;
  principalName?: string | null;
}

export interface SchoolServiceOptions {
  commandRepository?: SchoolCommandRepository;
  queryRepository?: SchoolQueryRepository;
  /** Profile of this process; only used in messages and logs */
  serviceType?: ServiceType;
  /** Source of `createdAt`; defaults to the system clock */
  clock?: () => Date;
  logger?: Logger;
}

export class SchoolService {
  private readonly commandRepository: SchoolCommandRepository | undefined;
  private readonly queryRepository: SchoolQueryRepository | undefined;
  private readonly serviceType: ServiceType;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: SchoolServiceOptions = {}) {
    this.commandRepository = options.commandRepository;
    this.queryRepository = options.queryRepository;
    this.serviceType = options.serviceType ?? 'default';
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ name: 'school-service' });
  }

  get canWrite(): boolean {
    return this.commandRepository !== undefined;
  }

  get canRead(): boolean {
    return this.queryRepository !== undefined;
  }

  // ===========================================================================
  // COMMANDS
  // ===========================================================================

  async addSchool(input: AddSchoolInput): Promise<Result<School, AppError>> {
    const commands = this.commandRepository;
    if (!commands) return this.forbidden('add');

    const result = await commands.add({
      name: input.name,
      address: input.address,
      principalName: normalizePrincipalName(input.principalName),
      createdAt: this.clock(),
    });

    if (isOk(result)) {
      this.logger.info({ schoolId: result.value.id }, 'School added');
    } else {
      this.logger.warn({ code: result.error.code }, 'Add school failed');
    }
    return result;
  }

  async updateSchool(changes: SchoolChanges): Promise<Result<School, AppError>> {
    const commands = this.commandRepository;
    if (!commands) return this.forbidden('update');

    const result = await commands.update(changes);

    if (isOk(result)) {
      this.logger.info(
        { schoolId: changes.id, version: result.value.version },
        'School updated'
      );
    } else {
      this.logger.warn({ schoolId: changes.id, code: result.error.code }, 'Update school failed');
    }
    return result;
  }

  /**
   * Delete after confirming the school exists on the query side; a lookup
   * error is returned unchanged and no delete is attempted
   */
  async deleteSchool(id: number): Promise<Result<true, AppError>> {
    const commands = this.commandRepository;
    const queries = this.queryRepository;
    if (!commands || !queries) return this.forbidden('delete');

    const existing = await queries.getById(id);
    if (isErr(existing)) {
      this.logger.warn({ schoolId: id, code: existing.error.code }, 'Delete lookup failed');
      return existing;
    }

    const result = await commands.delete(existing.value);

    if (isOk(result)) {
      this.logger.info({ schoolId: id }, 'School deleted');
    } else {
      this.logger.warn({ schoolId: id, code: result.error.code }, 'Delete school failed');
    }
    return result;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  async getSchoolById(id: number): Promise<Result<School, AppError>> {
    const queries = this.queryRepository;
    if (!queries) return this.forbidden('getById');
    return queries.getById(id);
  }

  async getAllSchools(): Promise<Result<School[], AppError>> {
    const queries = this.queryRepository;
    if (!queries) return this.forbidden('getAll');
    return queries.getAll();
  }

  async getSchoolsByDateRange(fromDate: Date, toDate: Date): Promise<Result<School[], AppError>> {
    const queries = this.queryRepository;
    if (!queries) return this.forbidden('getSchoolsByDateRange');

    if (
      Number.isNaN(fromDate.getTime()) ||
      Number.isNaN(toDate.getTime()) ||
      fromDate.getTime() > toDate.getTime()
    ) {
      return Err(
        new ValidationError(
          'fromDate must be a valid date not after toDate',
          { fromDate: String(fromDate), toDate: String(toDate) },
          'InvalidDateRange'
        )
      );
    }

    return queries.getSchoolsByDateRange(fromDate, toDate);
  }

  async getAllVersionsOfSchool(id: number): Promise<Result<School[], AppError>> {
    const queries = this.queryRepository;
    if (!queries) return this.forbidden('getAllVersions');
    return queries.getAllVersions(id);
  }

  private forbidden(operation: string): Result<never, AppError> {
    this.logger.warn(
      { operation, serviceType: this.serviceType },
      'Operation not available for this service type'
    );
    return Err(
      new ForbiddenError(
        'ServiceTypeForbidden',
        `Operation ${operation} is not available on a ${this.serviceType} service`,
        { serviceType: this.serviceType }
      )
    );
  }
}
