/**
 * School entity
 *
 * One row of a school's temporal chain. The store assigns `id`, `version`
 * and the validity period; `createdAt` is fixed by the first Add and shared
 * by every later version.
 *
 * @module domain/schools/school
 */

/**
 * `validTo` of the current version of a live school
 */
export const MAX_VALID_TO = new Date('9999-12-31T23:59:59.999Z');

/**
 * Principal recorded when a school is added without one
 */
export const DEFAULT_PRINCIPAL_NAME = 'Default Principal';

export interface School {
  readonly id: number;
  readonly name: string;
  readonly address: string;
  readonly principalName: string;
  readonly createdAt: Date;
  readonly validFrom: Date;
  readonly validTo: Date;
  readonly version: number;
}

/**
 * Values supplied on Add; everything else is assigned by the store
 */
export interface NewSchool {
  readonly name: string;
  readonly address: string;
  readonly principalName: string;
  readonly createdAt: Date;
}

/**
 * Values supplied on Update. When `version` is present it must match the
 * stored version, otherwise the last writer wins.
 */
export interface SchoolChanges {
  readonly id: number;
  readonly name: string;
  readonly address: string;
  readonly principalName: string;
  readonly version?: number;
}

export function isCurrentVersion(school: Pick<School, 'validTo'>): boolean {
  return school.validTo.getTime() === MAX_VALID_TO.getTime();
}

/**
 * Whether a version's validity period intersects [fromDate, toDate] (inclusive)
 */
export function overlapsRange(
  school: Pick<School, 'validFrom' | 'validTo'>,
  fromDate: Date,
  toDate: Date
): boolean {
  return (
    school.validFrom.getTime() <= toDate.getTime() && school.validTo.getTime() >= fromDate.getTime()
  );
}

/**
 * Blank or whitespace-only principals become the default principal
 */
export function normalizePrincipalName(principalName: string | undefined | null): string {
  if (principalName === undefined || principalName === null || principalName.trim() === '') {
    return DEFAULT_PRINCIPAL_NAME;
  }
  return principalName;
}
