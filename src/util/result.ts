/**
 * Result values for expected failures.
 *
 * Ownership misses, missing rows and bad input are data, not exceptions:
 * services return `Result<T, E>` and callers branch on `ok`.
 */

export type Ok<T> = {readonly ok: true; readonly value: T}
export type Err<E> = {readonly ok: false; readonly error: E}
export type Result<T, E> = Ok<T> | Err<E>

export namespace Result {
  export function ok<T>(value: T): Ok<T> {
    return {ok: true, value}
  }

  export function err<E>(error: E): Err<E> {
    return {ok: false, error}
  }

  export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? ok(fn(result.value)) : result
  }
}
