import { describe, it, expect, vi } from 'vitest';
import {
  ConcurrencyError,
  Err,
  NotFoundError,
  Ok,
  isErr,
  isOk,
  createLogger,
} from '@schoolreg/core';

import { SchoolService } from '../schools/school-service.js';
import { MAX_VALID_TO, type School } from '../schools/school.js';
import type {
  SchoolCommandRepository,
  SchoolQueryRepository,
} from '../schools/school-repository.js';

const T0 = new Date('2024-03-01T08:00:00.000Z');
const silentLogger = createLogger({ name: 'school-service-test', level: 'silent', pretty: false });

function buildSchool(overrides: Partial<School> = {}): School {
  return {
    id: 1,
    name: 'Northside Primary',
    address: '1 Elm Street',
    principalName: 'J. Smith',
    createdAt: T0,
    validFrom: T0,
    validTo: MAX_VALID_TO,
    version: 1,
    ...overrides,
  };
}

function createCommandRepository() {
  return {
    add: vi.fn<SchoolCommandRepository['add']>(async (school) =>
      Ok(buildSchool({ ...school, id: 10 }))
    ),
    update: vi.fn<SchoolCommandRepository['update']>(async (changes) =>
      Ok(buildSchool({ ...changes, version: 2 }))
    ),
    delete: vi.fn<SchoolCommandRepository['delete']>(async () => Ok(true as const)),
  } satisfies SchoolCommandRepository;
}

function createQueryRepository() {
  return {
    getById: vi.fn<SchoolQueryRepository['getById']>(async (id) => Ok(buildSchool({ id }))),
    getAll: vi.fn<SchoolQueryRepository['getAll']>(async () => Ok([buildSchool()])),
    getSchoolsByDateRange: vi.fn<SchoolQueryRepository['getSchoolsByDateRange']>(async () =>
      Ok([buildSchool()])
    ),
    getAllVersions: vi.fn<SchoolQueryRepository['getAllVersions']>(async (id) =>
      Ok([buildSchool({ id })])
    ),
  } satisfies SchoolQueryRepository;
}

function createService(wiring: { commands?: boolean; queries?: boolean } = {}) {
  const commandRepository = createCommandRepository();
  const queryRepository = createQueryRepository();
  const service = new SchoolService({
    commandRepository: wiring.commands === false ? undefined : commandRepository,
    queryRepository: wiring.queries === false ? undefined : queryRepository,
    serviceType: wiring.commands === false ? 'reader' : 'default',
    clock: () => T0,
    logger: silentLogger,
  });
  return { service, commandRepository, queryRepository };
}

describe('SchoolService', () => {
  describe('addSchool', () => {
    it('should stamp createdAt from the clock and keep the given principal', async () => {
      const { service, commandRepository } = createService();

      const result = await service.addSchool({
        name: 'Northside Primary',
        address: '1 Elm Street',
        principalName: 'J. Smith',
      });

      expect(isOk(result)).toBe(true);
      expect(commandRepository.add).toHaveBeenCalledWith({
        name: 'Northside Primary',
        address: '1 Elm Street',
        principalName: 'J. Smith',
        createdAt: T0,
      });
    });

    it.each([undefined, null, '', '   '])(
      'should default the principal when given %j',
      async (principalName) => {
        const { service, commandRepository } = createService();

        await service.addSchool({ name: 'A', address: 'B', principalName });

        expect(commandRepository.add.mock.calls[0]?.[0].principalName).toBe('Default Principal');
      }
    );

    it('should answer ServiceTypeForbidden without a command repository', async () => {
      const { service, queryRepository } = createService({ commands: false });

      const result = await service.addSchool({ name: 'A', address: 'B' });

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error.code).toBe('ServiceTypeForbidden');
        expect(result.error.statusCode).toBe(403);
        expect(result.error.params).toEqual({ serviceType: 'reader' });
      }
      expect(queryRepository.getById).not.toHaveBeenCalled();
    });
  });

  describe('updateSchool', () => {
    it('should delegate to the command repository', async () => {
      const { service, commandRepository } = createService();
      const changes = { id: 4, name: 'New', address: 'Addr', principalName: 'P' };

      const result = await service.updateSchool(changes);

      expect(commandRepository.update).toHaveBeenCalledWith(changes);
      expect(isOk(result) && result.value.version).toBe(2);
    });

    it('should propagate a version conflict unchanged', async () => {
      const { service, commandRepository } = createService();
      const conflict = new ConcurrencyError('School', '4', 'SchoolVersionConflict');
      commandRepository.update.mockResolvedValueOnce(Err(conflict));

      const result = await service.updateSchool({
        id: 4,
        name: 'New',
        address: 'Addr',
        principalName: 'P',
        version: 1,
      });

      expect(result).toEqual(Err(conflict));
    });
  });

  describe('deleteSchool', () => {
    it('should look the school up first and delete what it found', async () => {
      const { service, commandRepository, queryRepository } = createService();

      const result = await service.deleteSchool(7);

      expect(result).toEqual(Ok(true));
      expect(queryRepository.getById).toHaveBeenCalledWith(7);
      expect(commandRepository.delete).toHaveBeenCalledWith(buildSchool({ id: 7 }));
    });

    it('should return the lookup error and never attempt the delete', async () => {
      const { service, commandRepository, queryRepository } = createService();
      const notFound = new NotFoundError('SchoolNotFound', 'missing', { id: 7 });
      queryRepository.getById.mockResolvedValueOnce(Err(notFound));

      const result = await service.deleteSchool(7);

      expect(result).toEqual(Err(notFound));
      expect(commandRepository.delete).not.toHaveBeenCalled();
    });

    it('should touch no repository when the command side is missing', async () => {
      const { service, queryRepository } = createService({ commands: false });

      const result = await service.deleteSchool(7);

      expect(isErr(result) && result.error.code).toBe('ServiceTypeForbidden');
      expect(queryRepository.getById).not.toHaveBeenCalled();
    });
  });

  describe('queries', () => {
    it('should delegate reads to the query repository', async () => {
      const { service, queryRepository } = createService();

      await service.getSchoolById(3);
      await service.getAllSchools();
      await service.getAllVersionsOfSchool(3);

      expect(queryRepository.getById).toHaveBeenCalledWith(3);
      expect(queryRepository.getAll).toHaveBeenCalledTimes(1);
      expect(queryRepository.getAllVersions).toHaveBeenCalledWith(3);
    });

    it('should forbid reads without a query repository', async () => {
      const { service } = createService({ queries: false });

      const result = await service.getAllSchools();

      expect(isErr(result) && result.error.code).toBe('ServiceTypeForbidden');
    });

    it('should pass a valid date range through', async () => {
      const { service, queryRepository } = createService();
      const to = new Date('2024-03-06T08:00:00.000Z');

      await service.getSchoolsByDateRange(T0, to);

      expect(queryRepository.getSchoolsByDateRange).toHaveBeenCalledWith(T0, to);
    });

    it.each([
      ['reversed', new Date('2024-03-06T00:00:00.000Z'), new Date('2024-03-01T00:00:00.000Z')],
      ['unparsable', new Date('not a date'), new Date('2024-03-01T00:00:00.000Z')],
    ])('should reject a %s range before querying', async (_label, from, to) => {
      const { service, queryRepository } = createService();

      const result = await service.getSchoolsByDateRange(from, to);

      expect(isErr(result) && result.error.code).toBe('InvalidDateRange');
      expect(isErr(result) && result.error.statusCode).toBe(400);
      expect(queryRepository.getSchoolsByDateRange).not.toHaveBeenCalled();
    });
  });

  it('should report which sides are wired', () => {
    expect(createService().service.canWrite).toBe(true);
    expect(createService({ commands: false }).service.canWrite).toBe(false);
    expect(createService({ queries: false }).service.canRead).toBe(false);
  });
});
