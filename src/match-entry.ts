/**
 * casewise/match
 *
 * Variant matching: ordered cases, first match wins, mandatory default.
 *
 * @example
 * ```typescript
 * import { Match, matchValue, exhaustive, orElseValue } from 'casewise/match';
 *
 * type Tree =
 *   | { _tag: 'Leaf'; value: number }
 *   | { _tag: 'Internal'; left: Tree; right: Tree };
 *
 * const depth = (tree: Tree): number =>
 *   matchValue(tree,
 *     { tag: 'Leaf', then: () => 1 },
 *     { tag: 'Internal', then: (n) => 1 + Math.max(depth(n.left), depth(n.right)) },
 *     exhaustive,
 *   );
 *
 * const handle = (event: Event) => Match.value(event)({
 *   Click: (e) => `Clicked at ${e.x}`,
 *   Scroll: (e) => `Scrolled to ${e.y}`,
 * });
 * ```
 */

export {
  // Types
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

  // Namespace
  Match,

  // Builders
  Matcher,
  ValueMatcher,
  createMatcher,

  // Individual exports
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
