/**
 * Discriminated union for fallible operations. `ok: true` carries a value,
 * `ok: false` carries an error.
 */
export type Result<T, E = Error> =
  | {readonly ok: true; readonly value: T}
  | {readonly ok: false; readonly error: E};

export function ok<T>(value: T): Result<T, never> {
  return {ok: true, value};
}

export function err<E>(error: E): Result<never, E> {
  return {ok: false, error};
}

/** Extracts the value or throws the error. Use at call sites that cannot recover. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error instanceof Error
    ? result.error
    : new Error(String(result.error));
}
