/**
 * Pattern matching over tagged unions and runtime types.
 */

import { attempt, matchResult } from "../result";
import {
  exhaustive,
  guard,
  instanceOf,
  orElse,
  orElseValue,
  when,
} from "./cases";
import { createMatcher } from "./create";
import { absurd } from "./guards";

export type {
  Case,
  CaseKit,
  Clause,
  Clauses,
  DefaultDiscriminant,
  Exhaustive,
  HandledTags,
  HandlerMap,
  HandlerResult,
  MatchEvent,
  MatchTag,
  Otherwise,
  PartialHandlerMap,
  TagClause,
  Tagged,
  Terminal,
  VariantOf,
  WhenClause,
  WithoutTag,
} from "./types";
export type { MatcherOptions } from "./config";
export type { MatchApi } from "./create";
export { Matcher, ValueMatcher, type ExhaustiveArgs, type MatchFn } from "./matcher";
export {
  createMatcher,
  absurd,
  exhaustive,
  guard,
  instanceOf,
  orElse,
  orElseValue,
  when,
};

const defaults = createMatcher();

export const { matchValue, cases, is, isOneOf, tagOf } = defaults;

// =============================================================================
// Match namespace
// =============================================================================

/**
 * Every matching operation under one name, using the `_tag` discriminant.
 *
 * @example
 * ```typescript
 * type Event = { _tag: 'Click'; x: number } | { _tag: 'Scroll'; y: number };
 *
 * Match.value(event)({
 *   Click: (e) => `Clicked at ${e.x}`,
 *   Scroll: (e) => `Scrolled to ${e.y}`,
 * });
 *
 * Match.on(event).tag('Click', (e) => e.x).orElseValue(0);
 *
 * Match.matchValue(event,
 *   { tag: 'Scroll', then: (e) => e.y },
 *   Match.orElseValue(0),
 * );
 * ```
 */
export const Match = {
  ...defaults,
  create: createMatcher,
  when,
  guard,
  instanceOf,
  orElse,
  orElseValue,
  exhaustive,
  absurd,
  attempt,
  result: matchResult,
};
