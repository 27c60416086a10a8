/**
 * casewise/result
 *
 * A minimal Result type: matching without exceptions.
 *
 * @example
 * ```typescript
 * import { attempt } from 'casewise/result';
 *
 * const outcome = attempt(() => Match.value(shape)(handlers));
 * if (!outcome.ok) {
 *   console.log(outcome.error.tag); // the variant nobody handled
 * }
 * ```
 */

import { NonExhaustiveMatchError } from "./errors";

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

// =============================================================================
// Matching
// =============================================================================

/**
 * Pattern match on a Result.
 *
 * @example
 * ```typescript
 * matchResult(ok(5), {
 *   ok: (x) => `Success: ${x}`,
 *   err: (e) => `Error: ${e}`,
 * }); // "Success: 5"
 * ```
 */
export function matchResult<T, E, C, R>(
  r: Result<T, E, C>,
  handlers: { ok: (value: T) => R; err: (error: E, cause?: C) => R }
): R {
  return r.ok ? handlers.ok(r.value) : handlers.err(r.error, r.cause);
}

/**
 * Run a match, turning `NonExhaustiveMatchError` into an `Err`.
 * Any other exception propagates.
 */
export function attempt<R>(fn: () => R): Result<R, NonExhaustiveMatchError> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof NonExhaustiveMatchError) {
      return err(error);
    }
    throw error;
  }
}
