/**
 * School Registry Types Package
 *
 * Zod schemas and inferred types shared by the API, the gateway and the
 * domain layer.
 *
 * @module @schoolreg/types
 */

export {
  CorrelationIdSchema,
  EntityIdSchema,
  IdParamsSchema,
  type CorrelationId,
  type EntityId,
  type IdParams,
} from './schemas/common.js';

export {
  ServiceTypeSchema,
  SERVICE_TYPES,
  HttpMethodSchema,
  type ServiceType,
  type HttpMethod,
} from './schemas/service-type.js';

export {
  SCHOOL_NAME_MAX_LENGTH,
  SCHOOL_ADDRESS_MAX_LENGTH,
  SCHOOL_PRINCIPAL_MAX_LENGTH,
  CreateSchoolRequestSchema,
  UpdateSchoolRequestSchema,
  DateRangeQuerySchema,
  SchoolDtoSchema,
  SchoolVersionDtoSchema,
  type CreateSchoolRequest,
  type UpdateSchoolRequest,
  type DateRangeQuery,
  type SchoolDto,
  type SchoolVersionDto,
} from './schemas/school.js';
