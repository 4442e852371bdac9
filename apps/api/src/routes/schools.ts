/**
 * School routes
 *
 * Thin HTTP layer over SchoolService: validate with the shared zod schemas,
 * call the facade, map Result errors to localized responses.
 */

import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { isErr } from '@schoolreg/core';
import type { SchoolService } from '@schoolreg/domain';
import {
  CreateSchoolRequestSchema,
  DateRangeQuerySchema,
  IdParamsSchema,
  UpdateSchoolRequestSchema,
} from '@schoolreg/types';

import { toSchoolDto, toSchoolVersionDto } from '../mappers.js';
import type { ValidationIssue } from '../plugins/localization.js';

export const API_PREFIX = '/api/v1';
export const SCHOOL_RESOURCE = '/school';

export interface SchoolRoutesOptions {
  service: SchoolService;
}

function toIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

function invalidRequest(reply: FastifyReply, error: ZodError, code = 'VALIDATION_ERROR'): FastifyReply {
  return reply.sendError({ statusCode: 400, code, details: toIssues(error) });
}

export const schoolRoutes: FastifyPluginAsync<SchoolRoutesOptions> = async (fastify, { service }) => {
  const tags = ['School'];

  fastify.get(SCHOOL_RESOURCE, { schema: { tags, summary: 'List current schools' } }, async (_request, reply) => {
    const result = await service.getAllSchools();
    if (isErr(result)) return reply.sendAppError(result.error);
    return result.value.map(toSchoolDto);
  });

  /**
   * Versions valid at any instant of [fromDate, toDate], current and historical
   */
  const dateRangeHandler = async (request: { query: unknown }, reply: FastifyReply) => {
    const query = DateRangeQuerySchema.safeParse(request.query);
    if (!query.success) return invalidRequest(reply, query.error, 'InvalidDateRange');

    const result = await service.getSchoolsByDateRange(query.data.fromDate, query.data.toDate);
    if (isErr(result)) return reply.sendAppError(result.error);
    return result.value.map(toSchoolVersionDto);
  };

  fastify.get(
    `${SCHOOL_RESOURCE}/by-date-range`,
    { schema: { tags, summary: 'School versions valid within a date range' } },
    dateRangeHandler
  );
  fastify.get(
    `${SCHOOL_RESOURCE}/range`,
    { schema: { tags, summary: 'Alias of by-date-range', deprecated: true } },
    dateRangeHandler
  );

  fastify.get(
    `${SCHOOL_RESOURCE}/history/:id`,
    { schema: { tags, summary: 'Every version of one school' } },
    async (request, reply) => {
      const params = IdParamsSchema.safeParse(request.params);
      if (!params.success) return invalidRequest(reply, params.error);

      const result = await service.getAllVersionsOfSchool(params.data.id);
      if (isErr(result)) return reply.sendAppError(result.error);
      return result.value.map(toSchoolVersionDto);
    }
  );

  fastify.get(
    `${SCHOOL_RESOURCE}/:id`,
    { schema: { tags, summary: 'Current version of one school' } },
    async (request, reply) => {
      const params = IdParamsSchema.safeParse(request.params);
      if (!params.success) return invalidRequest(reply, params.error);

      const result = await service.getSchoolById(params.data.id);
      if (isErr(result)) return reply.sendAppError(result.error);
      return toSchoolDto(result.value);
    }
  );

  fastify.post(SCHOOL_RESOURCE, { schema: { tags, summary: 'Create a school' } }, async (request, reply) => {
    const body = CreateSchoolRequestSchema.safeParse(request.body);
    if (!body.success) return invalidRequest(reply, body.error);

    const result = await service.addSchool(body.data);
    if (isErr(result)) return reply.sendAppError(result.error);

    return reply
      .status(201)
      .header('location', `${API_PREFIX}${SCHOOL_RESOURCE}/${result.value.id}`)
      .send(toSchoolDto(result.value));
  });

  fastify.put(
    `${SCHOOL_RESOURCE}/:id`,
    { schema: { tags, summary: 'Replace the current version of a school' } },
    async (request, reply) => {
      const params = IdParamsSchema.safeParse(request.params);
      if (!params.success) return invalidRequest(reply, params.error);

      const body = UpdateSchoolRequestSchema.safeParse(request.body);
      if (!body.success) return invalidRequest(reply, body.error);

      if (body.data.id !== params.data.id) {
        return reply.sendError({ statusCode: 400, code: 'IdMismatch' });
      }

      const result = await service.updateSchool(body.data);
      if (isErr(result)) return reply.sendAppError(result.error);
      return reply.status(204).send();
    }
  );

  fastify.delete(
    `${SCHOOL_RESOURCE}/:id`,
    { schema: { tags, summary: 'Delete a school; its history is kept' } },
    async (request, reply) => {
      const params = IdParamsSchema.safeParse(request.params);
      if (!params.success) return invalidRequest(reply, params.error);

      const result = await service.deleteSchool(params.data.id);
      if (isErr(result)) return reply.sendAppError(result.error);
      return reply.status(204).send();
    }
  );
};
