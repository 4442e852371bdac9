/**
 * Row shape shared by `schools` and `school_history`, and its mapping to the
 * domain entity.
 */

import type { School } from '@schoolreg/domain';

export const SCHOOL_COLUMNS =
  'id, name, address, principal_name, created_at, version, valid_from, valid_to';

export interface SchoolRow {
  id: number | string;
  name: string;
  address: string;
  principal_name: string;
  created_at: Date;
  version: number;
  valid_from: Date;
  valid_to: Date;
}

/**
 * Thrown when a row does not have the expected shape (schema drift)
 */
export class InvalidSchoolRowError extends Error {
  constructor(columns: string[]) {
    super(`Unexpected school row shape (columns: ${columns.join(', ')})`);
    this.name = 'InvalidSchoolRowError';
  }
}

// BIGSERIAL columns arrive as strings from pg
function isIdentity(value: unknown): value is number | string {
  return (
    (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) ||
    (typeof value === 'string' && /^[1-9]\d*$/.test(value) && Number.isSafeInteger(Number(value)))
  );
}

export function isSchoolRow(row: Record<string, unknown>): row is Record<string, unknown> & SchoolRow {
  return (
    isIdentity(row.id) &&
    typeof row.name === 'string' &&
    typeof row.address === 'string' &&
    typeof row.principal_name === 'string' &&
    row.created_at instanceof Date &&
    typeof row.version === 'number' &&
    row.valid_from instanceof Date &&
    row.valid_to instanceof Date
  );
}

export function toSchool(row: Record<string, unknown>): School {
  if (!isSchoolRow(row)) {
    throw new InvalidSchoolRowError(Object.keys(row));
  }
  return {
    id: Number(row.id),
    name: row.name,
    address: row.address,
    principalName: row.principal_name,
    createdAt: row.created_at,
    validFrom: row.valid_from,
    validTo: row.valid_to,
    version: row.version,
  };
}
