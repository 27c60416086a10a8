/**
 * casewise/tagged-error
 *
 * Tagged error classes: errors that form discriminated unions.
 *
 * @example
 * ```typescript
 * import { TaggedError, type TagOf, type PropsOf } from 'casewise/tagged-error';
 *
 * class UserNotFound extends TaggedError('UserNotFound')<{ userId: string }> {}
 * class InsufficientFunds extends TaggedError('InsufficientFunds', {
 *   message: (p: { required: number; available: number }) =>
 *     `Need ${p.required}, have ${p.available}`,
 * }) {}
 *
 * const error = new UserNotFound({ userId: '123' });
 * error._tag // 'UserNotFound'
 * error.userId // '123'
 * ```
 */

export {
  // Factory function
  TaggedError,
  isTaggedError,

  // Types
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorArgs,
  type TaggedErrorClass,
  type TaggedErrorConstructor,

  // Type utilities
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";
