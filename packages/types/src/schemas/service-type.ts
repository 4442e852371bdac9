import { z } from 'zod';

/**
 * Deployment profile of an API process.
 *
 * - `default`: serves reads and writes
 * - `reader`: serves reads only (read replica)
 * - `writer`: serves writes only
 */
export const ServiceTypeSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['default', 'reader', 'writer']))
  .describe('Deployment profile of an API process');

export const SERVICE_TYPES = ['default', 'reader', 'writer'] as const;

export type ServiceType = (typeof SERVICE_TYPES)[number];

export const HttpMethodSchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS']));

export type HttpMethod = z.infer<typeof HttpMethodSchema>;
