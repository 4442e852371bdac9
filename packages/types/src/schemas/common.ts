/**
 * Common schemas shared across the platform
 */
import { z } from 'zod';

/**
 * Correlation ID for request tracing
 */
export const CorrelationIdSchema = z
  .string()
  .min(1)
  .max(64)
  .describe('Correlation ID for distributed tracing');

const EntityIdNumberSchema = z
  .number()
  .int('Id must be an integer')
  .positive('Id must be positive')
  .max(Number.MAX_SAFE_INTEGER);

/**
 * Store-assigned integer identity
 *
 * Route params arrive as strings and are only accepted in plain decimal form,
 * so `1e0`, `0x1`, `01` and padded values are rejected rather than coerced.
 */
export const EntityIdSchema = z
  .union([
    EntityIdNumberSchema,
    z
      .string()
      .regex(/^[1-9]\d*$/, 'Id must be a positive decimal integer')
      .transform(Number)
      .pipe(EntityIdNumberSchema),
  ])
  .describe('Store-assigned integer identity');

export const IdParamsSchema = z.object({
  id: EntityIdSchema,
});

export type CorrelationId = z.infer<typeof CorrelationIdSchema>;
export type EntityId = z.infer<typeof EntityIdSchema>;
export type IdParams = z.infer<typeof IdParamsSchema>;
