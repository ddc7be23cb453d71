/**
 * @module result
 * @description Success-or-failure values for queue operations. Expected
 * conditions (a full queue, a refused allocation, a bad capacity) travel as
 * data in a `Result` instead of being thrown.
 *
 * @example
 * ```typescript
 * const pushed = queue.push("hello");
 * if (Result.isOk(pushed)) {
 *   console.log(`${pushed.data} slot(s) were free`);
 * } else {
 *   console.log(pushed.error.message);
 * }
 * ```
 */

/**
 * Either a successful operation with data or a failure with an error.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const Result = {
  ok: <T, E = never>(data: T): Result<T, E> => ({ success: true, data }),

  err: <T = never, E = unknown>(error: E): Result<T, E> => ({
    success: false,
    error,
  }),

  isOk: <T, E>(result: Result<T, E>): result is { success: true; data: T } =>
    result.success,

  isErr: <T, E>(result: Result<T, E>): result is { success: false; error: E } =>
    !result.success,

  /**
   * Extracts the success value, or the given default on failure.
   *
   * @example
   * Result.unwrapOr(0)(queue.push("x")); // free slots before the push, or 0
   */
  unwrapOr:
    <T,>(defaultValue: T) =>
    <E,>(result: Result<T, E>): T =>
      result.success ? result.data : defaultValue,
} as const;
