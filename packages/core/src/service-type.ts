/**
 * Service-type policy
 *
 * A process runs under one service type for its whole life. The policy is a
 * pure function of (service type, HTTP method) so the API filter and the
 * gateway's route-table validation agree by construction.
 */

import { ServiceTypeSchema, type ServiceType } from '@schoolreg/types';

import { ValidationError } from './errors.js';

export type MethodCategory = 'read' | 'write' | 'other';

const READ_METHODS = new Set(['GET', 'HEAD']);
const WRITE_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

/**
 * Classify an HTTP method as read, write or other (OPTIONS, TRACE, ...)
 */
export function classifyMethod(method: string): MethodCategory {
  const upper = method.toUpperCase();
  if (READ_METHODS.has(upper)) return 'read';
  if (WRITE_METHODS.has(upper)) return 'write';
  return 'other';
}

/**
 * Whether a process of the given service type serves the method
 *
 * - reader rejects writes
 * - writer rejects reads
 * - default serves everything
 */
export function isMethodAllowed(serviceType: ServiceType, method: string): boolean {
  const category = classifyMethod(method);
  switch (serviceType) {
    case 'reader':
      return category !== 'write';
    case 'writer':
      return category !== 'read';
    case 'default':
      return true;
  }
}

/**
 * Parse a service type case-insensitively; unset means `default`
 */
export function parseServiceType(value: string | undefined): ServiceType {
  if (value === undefined || value.trim() === '') {
    return 'default';
  }
  const result = ServiceTypeSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Unknown service type "${value}"; expected default, reader or writer`,
      result.error.flatten(),
      'INVALID_SERVICE_TYPE'
    );
  }
  return result.data;
}
