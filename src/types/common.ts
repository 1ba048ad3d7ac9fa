/**
 * Result type for operations that can fail.
 * Every fallible keyspec function returns one instead of throwing.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** Creates a successful Result. */
export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

/** Creates a failed Result. */
export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });

/**
 * Maps over a successful Result, passing through errors unchanged.
 *
 * @param result - The Result to map over
 * @param fn - The function to apply to the success value
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> => (result.success ? ok(fn(result.data)) : result);

/**
 * Chains Result-returning operations, short-circuiting on the first error.
 *
 * @param result - The Result to chain from
 * @param fn - The function that returns a new Result
 */
export const flatMapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>,
): Result<U, E> => (result.success ? fn(result.data) : result);

/**
 * Collects an array of Results into a Result of an array,
 * stopping at the first failure.
 */
export const collectResults = <T, E>(
  results: Iterable<Result<T, E>>,
): Result<readonly T[], E> => {
  const values: T[] = [];
  for (const result of results) {
    if (!result.success) return result;
    values.push(result.data);
  }
  return ok(Object.freeze(values));
};
