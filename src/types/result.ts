/**
 * Result type for operational failures such as an unrecognized unit
 * label or a value array of the wrong length.
 * Throw only for programmer errors (a broken unit table).
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
