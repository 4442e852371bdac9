/**
 * School Schemas
 *
 * Request and response shapes for the School API. Column limits mirror the
 * `schools` table so oversize input is rejected before reaching the store.
 */
import { z } from 'zod';

import { EntityIdSchema } from './common.js';

export const SCHOOL_NAME_MAX_LENGTH = 100;
export const SCHOOL_ADDRESS_MAX_LENGTH = 200;
export const SCHOOL_PRINCIPAL_MAX_LENGTH = 50;

const requiredText = (field: string, max: number) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(max, `${field} must be at most ${max} characters`);

// =============================================================================
// REQUESTS
// =============================================================================

export const CreateSchoolRequestSchema = z.object({
  name: requiredText('name', SCHOOL_NAME_MAX_LENGTH),
  address: requiredText('address', SCHOOL_ADDRESS_MAX_LENGTH),
  // Blank principals are defaulted by the service, so only the length is checked here
  principalName: z.string().max(SCHOOL_PRINCIPAL_MAX_LENGTH).optional(),
});

export const UpdateSchoolRequestSchema = z.object({
  id: EntityIdSchema,
  name: requiredText('name', SCHOOL_NAME_MAX_LENGTH),
  address: requiredText('address', SCHOOL_ADDRESS_MAX_LENGTH),
  principalName: requiredText('principalName', SCHOOL_PRINCIPAL_MAX_LENGTH),
  version: z.number().int().positive().optional(),
});

export const DateRangeQuerySchema = z
  .object({
    fromDate: z.coerce.date({ invalid_type_error: 'fromDate must be a valid date' }),
    toDate: z.coerce.date({ invalid_type_error: 'toDate must be a valid date' }),
  })
  .refine((range) => range.fromDate.getTime() <= range.toDate.getTime(), {
    message: 'fromDate must not be after toDate',
    path: ['fromDate'],
  });

// =============================================================================
// RESPONSES
// =============================================================================

export const SchoolDtoSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  address: z.string(),
  principalName: z.string(),
  createdAt: z.string().datetime(),
  version: z.number().int().positive(),
});

export const SchoolVersionDtoSchema = SchoolDtoSchema.extend({
  validFrom: z.string().datetime(),
  validTo: z.string().datetime(),
});

export type CreateSchoolRequest = z.infer<typeof CreateSchoolRequestSchema>;
export type UpdateSchoolRequest = z.infer<typeof UpdateSchoolRequestSchema>;
export type DateRangeQuery = z.infer<typeof DateRangeQuerySchema>;
export type SchoolDto = z.infer<typeof SchoolDtoSchema>;
export type SchoolVersionDto = z.infer<typeof SchoolVersionDtoSchema>;
