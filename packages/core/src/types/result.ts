/**
 * Successful outcome.
 * @public
 */
export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

/**
 * Failed outcome.
 * @public
 */
export interface Err<E> {
  readonly ok: false
  readonly error: E
}

/**
 * Outcome of an operation that reports failure as a value.
 * @public
 */
export type Result<T, E> = Ok<T> | Err<E>

/** @public */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

/** @public */
export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}
