/**
 * Result Type
 *
 * Discriminated union for operations that can fail in an expected way.
 * Programming errors are not Results: they go through `precondition`.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
