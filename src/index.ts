/**
 * casewise
 *
 * Variant matching for TypeScript: tagged unions, predicates and classes,
 * checked for exhaustiveness at compile time and at run time.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { matchValue, orElseValue } from 'casewise';
 *
 * type Tree =
 *   | { _tag: 'Leaf'; value: number }
 *   | { _tag: 'Internal'; left: Tree; right: Tree };
 *
 * const depth = (tree: Tree): number =>
 *   matchValue(tree,
 *     { tag: 'Leaf', then: () => 1 },
 *     { tag: 'Internal', then: (n) => 1 + Math.max(depth(n.left), depth(n.right)) },
 *     orElseValue(-1),
 *   );
 * ```
 *
 * ## Entry Points
 *
 * - `casewise` - everything below
 * - `casewise/match` - matchers, cases, terminals, guards
 * - `casewise/tagged-error` - tagged error classes
 * - `casewise/errors` - errors thrown by the matchers
 * - `casewise/result` - Result type and `attempt()`
 */

// =============================================================================
// Matching
// =============================================================================
export {
  type Case,
  type CaseKit,
  type Clause,
  type Clauses,
  type DefaultDiscriminant,
  type Exhaustive,
  type ExhaustiveArgs,
  type HandledTags,
  type HandlerMap,
  type HandlerResult,
  type MatchApi,
  type MatchEvent,
  type MatchFn,
  type MatchTag,
  type MatcherOptions,
  type Otherwise,
  type PartialHandlerMap,
  type TagClause,
  type Tagged,
  type Terminal,
  type VariantOf,
  type WhenClause,
  type WithoutTag,
  Match,
  Matcher,
  ValueMatcher,
  createMatcher,
  matchValue,
  cases,
  when,
  guard,
  instanceOf,
  orElse,
  orElseValue,
  exhaustive,
  absurd,
  is as isTag,
  isOneOf,
  tagOf,
} from "./match";

// =============================================================================
// Tagged Errors
// =============================================================================
export {
  TaggedError,
  isTaggedError,
  type TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorArgs,
  type TaggedErrorClass,
  type TaggedErrorConstructor,
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";

// =============================================================================
// Errors
// =============================================================================
export {
  NonExhaustiveMatchError,
  MatchDefinitionError,
  type CasewiseError,
  isNonExhaustiveMatchError,
  isMatchDefinitionError,
  isCasewiseError,
} from "./errors";

// =============================================================================
// Result
// =============================================================================
export {
  type Ok,
  type Err,
  type Result,
  ok,
  err,
  isOk,
  isErr,
  matchResult,
  attempt,
} from "./result";
