/**
 * Result type for functional error handling
 *
 * Repositories and services return a Result instead of throwing for
 * anticipated conditions (not found, conflicts, store failures).
 *
 * @example
 * ```typescript
 * const result = await repository.getById(42);
 * if (isOk(result)) {
 *   logger.info({ id: result.value.id }, 'School loaded');
 * } else {
 *   logger.warn({ code: result.error.code }, 'School lookup failed');
 * }
 * ```
 *
 * @module types/result
 */

/**
 * Success result variant
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

/**
 * Error result variant
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Create a success result
 */
export function Ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

/**
 * Create an error result
 */
export function Err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}
