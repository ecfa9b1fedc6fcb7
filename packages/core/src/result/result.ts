export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

export const map = <T1, T2, E>(
  result: Result<T1, E>,
  fn: (data: T1) => T2
): Result<T2, E> => (result.success ? ok(fn(result.data)) : result);

/**
 * Collects a list of results into a result of a list.
 * Stops at the first failure and returns it.
 */
export const collect = <T, E>(results: Iterable<Result<T, E>>): Result<T[], E> => {
  const values: T[] = [];
  for (const result of results) {
    if (!result.success) return result;
    values.push(result.data);
  }
  return ok(values);
};
