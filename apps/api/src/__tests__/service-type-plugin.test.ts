import { describe, it, expect, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { Ok } from '@schoolreg/core';
import {
  SchoolService,
  type School,
  type SchoolCommandRepository,
  type SchoolQueryRepository,
} from '@schoolreg/domain';
import type { ServiceType } from '@schoolreg/types';

import { T0, buildTestApp } from './helpers/build-test-app.js';

const SCHOOL: School = {
  id: 1,
  name: 'Northside Primary',
  address: '1 Elm Street',
  principalName: 'Ada Park',
  createdAt: T0,
  validFrom: T0,
  validTo: new Date('9999-12-31T23:59:59.999Z'),
  version: 1,
};

function createRepositories() {
  const commandRepository = {
    add: vi.fn<SchoolCommandRepository['add']>().mockResolvedValue(Ok(SCHOOL)),
    update: vi.fn<SchoolCommandRepository['update']>().mockResolvedValue(Ok(SCHOOL)),
    delete: vi.fn<SchoolCommandRepository['delete']>().mockResolvedValue(Ok(true as const)),
  } satisfies SchoolCommandRepository;

  const queryRepository = {
    getById: vi.fn<SchoolQueryRepository['getById']>().mockResolvedValue(Ok(SCHOOL)),
    getAll: vi.fn<SchoolQueryRepository['getAll']>().mockResolvedValue(Ok([SCHOOL])),
    getSchoolsByDateRange: vi
      .fn<SchoolQueryRepository['getSchoolsByDateRange']>()
      .mockResolvedValue(Ok([SCHOOL])),
    getAllVersions: vi.fn<SchoolQueryRepository['getAllVersions']>().mockResolvedValue(Ok([SCHOOL])),
  } satisfies SchoolQueryRepository;

  return { commandRepository, queryRepository };
}

type Repositories = ReturnType<typeof createRepositories>;

function totalCalls(repositories: Repositories): number {
  return [
    ...Object.values(repositories.commandRepository),
    ...Object.values(repositories.queryRepository),
  ].reduce((sum, fn) => sum + fn.mock.calls.length, 0);
}

describe('Service-type filter', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  /**
   * Wire repositories the way the profile would: readers get no command side
   */
  async function start(serviceType: ServiceType) {
    const repositories = createRepositories();
    const service = new SchoolService({
      commandRepository: serviceType === 'reader' ? undefined : repositories.commandRepository,
      queryRepository: repositories.queryRepository,
      serviceType,
    });
    const testApp = await buildTestApp({ serviceType, service });
    app = testApp.app;
    return { app: testApp.app, repositories };
  }

  describe('reader', () => {
    it('should reject POST with 403 before any repository is called', async () => {
      const { app, repositories } = await start('reader');

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/school',
        payload: { name: 'Northside Primary', address: '1 Elm Street' },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json().error).toEqual({
        code: 'ServiceTypeForbidden',
        message: 'This operation is not available on a reader service.',
        correlationId: expect.any(String),
      });
      expect(totalCalls(repositories)).toBe(0);
    });

    it.each(['PUT', 'DELETE'] as const)('should reject %s', async (method) => {
      const { app, repositories } = await start('reader');

      const response = await app.inject({ method, url: '/api/v1/school/1', payload: {} });

      expect(response.statusCode).toBe(403);
      expect(totalCalls(repositories)).toBe(0);
    });

    it('should reject writes without looking at the body', async () => {
      const { app } = await start('reader');

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/school',
        headers: { 'content-type': 'application/json' },
        payload: '{not json',
      });

      expect(response.statusCode).toBe(403);
    });

    it('should serve reads', async () => {
      const { app, repositories } = await start('reader');

      const response = await app.inject({ method: 'GET', url: '/api/v1/school' });

      expect(response.statusCode).toBe(200);
      expect(repositories.queryRepository.getAll).toHaveBeenCalledTimes(1);
    });

    it('should localize the rejection', async () => {
      const { app } = await start('reader');

      const response = await app.inject({
        method: 'DELETE',
        url: '/api/v1/school/1',
        headers: { 'accept-language': 'fr-FR' },
      });

      expect(response.json().error.message).toBe(
        "Cette opération n'est pas disponible sur un service reader."
      );
    });

    it('should reject writes on a percent-encoded school path', async () => {
      const { app, repositories } = await start('reader');

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/%73chool',
        payload: { name: 'Northside Primary', address: '1 Elm Street' },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.code).toBe('ServiceTypeForbidden');
      expect(totalCalls(repositories)).toBe(0);
    });

    it('should leave paths outside the school resource alone', async () => {
      const { app } = await start('reader');

      const response = await app.inject({ method: 'POST', url: '/api/v1/schoolhouse' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.code).toBe('NOT_FOUND');
    });
  });

  describe('writer', () => {
    it.each([
      '/api/v1/school',
      '/api/v1/school/1',
      '/api/v1/school/history/1',
      '/api/v1/school/by-date-range?fromDate=2024-01-01&toDate=2024-12-31',
    ])('should reject GET %s', async (url) => {
      const { app, repositories } = await start('writer');

      const response = await app.inject({ method: 'GET', url });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.message).toBe(
        'This operation is not available on a writer service.'
      );
      expect(totalCalls(repositories)).toBe(0);
    });

    it('should reject GET on a percent-encoded school path', async () => {
      const { app, repositories } = await start('writer');

      const response = await app.inject({ method: 'GET', url: '/api/v1/%73chool/1' });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.code).toBe('ServiceTypeForbidden');
      expect(totalCalls(repositories)).toBe(0);
    });

    it('should check existence on the query side before deleting', async () => {
      const { app, repositories } = await start('writer');

      const response = await app.inject({ method: 'DELETE', url: '/api/v1/school/1' });

      expect(response.statusCode).toBe(204);
      expect(repositories.queryRepository.getById).toHaveBeenCalledWith(1);
      expect(repositories.commandRepository.delete).toHaveBeenCalledWith(SCHOOL);
    });

    it('should accept creates', async () => {
      const { app, repositories } = await start('writer');

      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/school',
        payload: { name: 'Northside Primary', address: '1 Elm Street', principalName: 'Ada Park' },
      });

      expect(response.statusCode).toBe(201);
      expect(repositories.commandRepository.add).toHaveBeenCalledTimes(1);
    });

    it('should keep health probes reachable', async () => {
      const { app } = await start('writer');

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().serviceType).toBe('writer');
    });
  });
});
