/**
 * createMatcher: the matching API bound to one configuration.
 */

import { MatchDefinitionError } from "../errors";
import {
  caseKit,
  checkReachability,
  compileClause,
  compileTerminal,
  runCases,
} from "./cases";
import { resolveConfig, type MatcherOptions } from "./config";
import { dispatchAll, dispatchSome } from "./handlers";
import { readTag, tagGuard, tagsGuard } from "./guards";
import { Matcher, ValueMatcher } from "./matcher";
import type {
  CaseKit,
  Clauses,
  DefaultDiscriminant,
  HandledTags,
  HandlerMap,
  HandlerResult,
  MatchTag,
  PartialHandlerMap,
  VariantOf,
  WithoutTag,
} from "./types";

/**
 * Matching operations sharing one discriminant, name and event hook.
 */
export interface MatchApi<D extends string = DefaultDiscriminant> {
  /** Field this API reads tags from. */
  readonly discriminant: string;

  /**
   * Match `value` against cases in order; the last argument is the
   * terminal (`orElse`, `orElseValue`, `{ otherwise }` or `exhaustive`).
   *
   * @example
   * ```typescript
   * const depth = (tree: Tree): number =>
   *   matchValue(tree,
   *     { tag: 'Leaf', then: () => 1 },
   *     { tag: 'Internal', then: (n) => 1 + Math.max(depth(n.left), depth(n.right)) },
   *     exhaustive,
   *   );
   * ```
   */
  matchValue<T, R>(value: T, ...clauses: Clauses<NoInfer<T>, R, D>): R;

  /** Start a reusable matcher for values of type `T`. */
  type<T>(): Matcher<T, never, T, D>;

  /** Typed tag cases for `matchValue`, reading this API's discriminant. */
  cases<T>(): CaseKit<T, D>;

  /** Start a matcher bound to `value`. */
  on<T>(value: T): ValueMatcher<T, never, T, D>;

  /**
   * Exhaustive handler map: one handler per tag.
   *
   * @example
   * ```typescript
   * const handle = (event: Event) => Match.value(event)({
   *   Click: (e) => `Clicked at ${e.x}`,
   *   Scroll: (e) => `Scrolled to ${e.y}`,
   * });
   * ```
   */
  value<T>(value: T): <H extends HandlerMap<T, D>>(handlers: H) => HandlerResult<H>;

  /**
   * Handlers for some tags; `fallback` receives the other variants.
   */
  partial<T>(
    value: T
  ): <H extends PartialHandlerMap<T, D>, R>(
    handlers: H,
    fallback: (value: WithoutTag<T, HandledTags<H>, D>) => R
  ) => HandlerResult<H> | R;

  /** Type guard for one tag. */
  is<T, K extends MatchTag<T, D>>(tag: K): (value: T) => value is VariantOf<T, K, D>;

  /** Type guard for any of several tags. */
  isOneOf<T, Ks extends MatchTag<T, D>[]>(
    ...tags: Ks
  ): (value: T) => value is VariantOf<T, Ks[number], D>;

  /** The value's tag, or `undefined` when it has none. */
  tagOf(value: unknown): string | undefined;
}

/**
 * Create a matching API with its own options.
 *
 * @example
 * ```typescript
 * type Shape =
 *   | { type: 'circle'; radius: number }
 *   | { type: 'square'; side: number };
 *
 * const ShapeMatch = createMatcher({
 *   discriminant: 'type',
 *   name: 'shapes',
 *   onEvent: (event) => metrics.record(event),
 * });
 *
 * const area = (s: Shape) => ShapeMatch.value(s)({
 *   circle: (c) => Math.PI * c.radius ** 2,
 *   square: (q) => q.side ** 2,
 * });
 * ```
 */
export function createMatcher(): MatchApi;
export function createMatcher<D extends string = DefaultDiscriminant>(
  options: MatcherOptions<D>
): MatchApi<D>;
export function createMatcher<D extends string>(
  options?: MatcherOptions<D>
): MatchApi<D> {
  const config = resolveConfig(options);

  function matchValue<T, R>(value: T, ...clauses: Clauses<NoInfer<T>, R, D>): R;
  function matchValue(value: unknown, ...clauses: unknown[]): unknown {
    if (clauses.length === 0) {
      throw new MatchDefinitionError({
        reason: "matchValue needs a terminal as its last argument",
      });
    }
    const terminal = compileTerminal(clauses[clauses.length - 1]);
    const cases = clauses
      .slice(0, -1)
      .map((clause, position) => compileClause(clause, position, config));
    checkReachability(cases, config);
    return runCases(value, cases, terminal, config);
  }

  function is<T, K extends MatchTag<T, D>>(
    tag: K
  ): (value: T) => value is VariantOf<T, K, D> {
    return tagGuard<T, K, D>(config.discriminant, tag);
  }

  function isOneOf<T, Ks extends MatchTag<T, D>[]>(
    ...tags: Ks
  ): (value: T) => value is VariantOf<T, Ks[number], D> {
    return tagsGuard<T, Ks[number], D>(config.discriminant, tags);
  }

  return {
    discriminant: config.discriminant,
    matchValue,
    type: <T>() => new Matcher<T, never, T, D>(config),
    on: <T>(value: T) => new ValueMatcher(value, new Matcher<T, never, T, D>(config)),
    cases: <T>() => caseKit<T, D>(config.discriminant),
    value:
      <T>(value: T) =>
      <H extends HandlerMap<T, D>>(handlers: H): HandlerResult<H> =>
        dispatchAll<T, D, H>(value, handlers, config),
    partial:
      <T>(value: T) =>
      <H extends PartialHandlerMap<T, D>, R>(
        handlers: H,
        fallback: (value: WithoutTag<T, HandledTags<H>, D>) => R
      ): HandlerResult<H> | R =>
        dispatchSome<T, D, H, R>(value, handlers, fallback, config),
    is,
    isOneOf,
    tagOf: (value: unknown) => readTag(value, config.discriminant),
  };
}
