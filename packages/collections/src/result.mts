/**
 * @module result
 * @description Failures as values for the toolkit's non-throwing variants.
 * A Result is either `{ success: true, data }` or `{ success: false, error }`,
 * the same shape `findSafe` returns, so callers can branch on `success`
 * without a try/catch.
 *
 * @example
 * ```typescript
 * import { Result } from './result.mts';
 *
 * const parsed = Result.ok<number, string>(42);
 * if (Result.isOk(parsed)) {
 *   console.log(parsed.data);
 * }
 * ```
 *
 * @category Core
 * @since 2026-10-19
 */

/**
 * Either a successful value or a failure.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to string)
 */
export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

export const Result = {
  ok: <T, E = never>(data: T): Result<T, E> => ({ success: true, data }),

  err: <T = never, E = string>(error: E): Result<T, E> => ({
    success: false,
    error,
  }),

  /**
   * Transform the success value, leaving failures untouched.
   *
   * @example
   * Result.map((m: Map<string, number>) => m.size)(Result.ok(new Map()));
   * // => { success: true, data: 0 }
   */
  map:
    <T, U, E>(fn: (value: T) => U) =>
    (result: Result<T, E>): Result<U, E> =>
      result.success
        ? { success: true, data: fn(result.data) }
        : { success: false, error: result.error },

  /**
   * Extract the success value or fall back to a default.
   */
  unwrapOr:
    <T,>(defaultValue: T) =>
    <E,>(result: Result<T, E>): T =>
      result.success ? result.data : defaultValue,

  isOk: <T, E>(result: Result<T, E>): result is { success: true; data: T } =>
    result.success,

  isErr: <T, E>(
    result: Result<T, E>,
  ): result is { success: false; error: E } => !result.success,
};
