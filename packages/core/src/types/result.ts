/**
 * Result type used by every fallible parser operation
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => (result.ok ? result : error(fn(result.error)));

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.ok ? result.value : defaultValue;

/**
 * Collect a list of results, stopping at the first failure
 */
export const collect = <T, U, E>(
  items: readonly T[],
  fn: (item: T) => Result<U, E>
): Result<U[], E> => {
  const values: U[] = [];
  for (const item of items) {
    const result = fn(item);
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
};
