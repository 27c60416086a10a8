/**
 * casewise/errors
 *
 * Errors raised by the matchers. Both are tagged errors, so they can be
 * matched like any other tagged union.
 *
 * @example
 * ```typescript
 * import { NonExhaustiveMatchError, isNonExhaustiveMatchError } from 'casewise/errors';
 *
 * try {
 *   Match.value(shape)(handlers);
 * } catch (error) {
 *   if (isNonExhaustiveMatchError(error)) {
 *     console.log(error.tag); // the variant nobody handled
 *   }
 *   throw error;
 * }
 * ```
 */

import { TaggedError } from "./tagged-error/factory";

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Thrown when no case accepts a value and the match has no default.
 *
 * @example
 * ```typescript
 * const error = new NonExhaustiveMatchError({ value: shape, tag: 'hexagon' });
 * console.log(error.message); // 'NonExhaustiveMatchError: no case matched variant "hexagon"'
 * ```
 */
export class NonExhaustiveMatchError extends TaggedError(
  "NonExhaustiveMatchError",
  {
    message: (p: {
      /** The value no case accepted */
      value: unknown;
      /** Its tag, when it carried one */
      tag?: string;
      /** Name of the matcher that gave up */
      matcher?: string;
    }) =>
      `NonExhaustiveMatchError: no case matched ${
        p.tag !== undefined
          ? `variant "${p.tag}"`
          : `value of type ${describeType(p.value)}`
      }${p.matcher ? ` in ${p.matcher}` : ""}`,
  }
) {}

/**
 * Thrown when a match is written wrong: a missing or misplaced terminal,
 * a clause of unknown shape, a bad matcher option.
 *
 * @example
 * ```typescript
 * const error = new MatchDefinitionError({ reason: 'missing terminal' });
 * console.log(error.message); // "MatchDefinitionError: missing terminal"
 * ```
 */
export class MatchDefinitionError extends TaggedError("MatchDefinitionError", {
  message: (p: {
    /** What is wrong with the definition */
    reason: string;
  }) => `MatchDefinitionError: ${p.reason}`,
}) {}

/**
 * Union of every error casewise throws.
 */
export type CasewiseError = NonExhaustiveMatchError | MatchDefinitionError;

// =============================================================================
// Type Guards
// =============================================================================

export const isNonExhaustiveMatchError = (
  e: unknown
): e is NonExhaustiveMatchError => e instanceof NonExhaustiveMatchError;

export const isMatchDefinitionError = (e: unknown): e is MatchDefinitionError =>
  e instanceof MatchDefinitionError;

export const isCasewiseError = (e: unknown): e is CasewiseError =>
  isNonExhaustiveMatchError(e) || isMatchDefinitionError(e);
