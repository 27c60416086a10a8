/**
 * Tagged errors with exhaustive matching.
 */

import { Match } from "../match";
import type {
  HandledTags,
  HandlerMap,
  HandlerResult,
  PartialHandlerMap,
  WithoutTag,
} from "../match";
import {
  TaggedError as defineTaggedError,
  isTaggedError,
  type TaggedErrorBase,
} from "./factory";

export type {
  ErrorByTag,
  PropsOf,
  TagOf,
  TaggedErrorArgs,
  TaggedErrorBase,
  TaggedErrorClass,
  TaggedErrorConstructor,
  TaggedErrorOptions,
} from "./factory";
export { isTaggedError };

/**
 * Match an error union by tag; one handler per tag is required.
 *
 * @example
 * ```typescript
 * TaggedError.match(error, {
 *   UserNotFound: (e) => `No user ${e.userId}`,
 *   InsufficientFunds: (e) => e.message,
 * });
 * ```
 */
function match<E extends TaggedErrorBase, H extends HandlerMap<E>>(
  error: E,
  handlers: H
): HandlerResult<H> {
  return Match.value(error)(handlers);
}

/**
 * Match some tags of an error union; `fallback` receives the rest.
 */
function matchPartial<E extends TaggedErrorBase, H extends PartialHandlerMap<E>, R>(
  error: E,
  handlers: H,
  fallback: (error: WithoutTag<E, HandledTags<H>>) => R
): HandlerResult<H> | R {
  return Match.partial(error)(handlers, fallback);
}

/**
 * Create tagged error classes, and match unions of their instances.
 *
 * @example
 * ```typescript
 * class UserNotFound extends TaggedError('UserNotFound')<{ userId: string }> {}
 * class InsufficientFunds extends TaggedError('InsufficientFunds', {
 *   message: (p: { required: number; available: number }) =>
 *     `Need ${p.required}, have ${p.available}`,
 * }) {}
 *
 * type PaymentError = UserNotFound | InsufficientFunds;
 *
 * const status = (e: PaymentError) => TaggedError.match(e, {
 *   UserNotFound: () => 404,
 *   InsufficientFunds: () => 402,
 * });
 * ```
 */
export const TaggedError = Object.assign(defineTaggedError, {
  match,
  matchPartial,
  is: isTaggedError,
});
