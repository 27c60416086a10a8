/**
 * Shared types for variant matching.
 */

// =============================================================================
// Tagged Values
// =============================================================================

/** Field holding the variant tag unless a matcher is configured otherwise. */
export type DefaultDiscriminant = "_tag";

/**
 * A value whose variant is named by the string in field `D`.
 *
 * @example
 * ```typescript
 * type Leaf = Tagged<'Leaf'> & { value: number };
 * type Shape = Tagged<'circle', 'type'> & { radius: number };
 * ```
 */
export type Tagged<
  Tag extends string = string,
  D extends string = DefaultDiscriminant,
> = Readonly<Record<D, Tag>>;

/**
 * Union of the tag literals of `T`.
 * Members of `T` without a string tag in `D` contribute nothing.
 */
export type MatchTag<T, D extends string = DefaultDiscriminant> =
  T extends Readonly<Record<D, infer K extends string>> ? K : never;

/** The members of `T` tagged `K`. */
export type VariantOf<
  T,
  K extends string,
  D extends string = DefaultDiscriminant,
> = Extract<T, Readonly<Record<D, K>>>;

/** The members of `T` left once the variants tagged `K` are handled. */
export type WithoutTag<
  T,
  K extends string,
  D extends string = DefaultDiscriminant,
> = Exclude<T, Readonly<Record<D, K>>>;

// =============================================================================
// Cases
// =============================================================================

/**
 * A compiled case: offers a thunk running its handler when it accepts the
 * value, `undefined` otherwise. Selecting has no side effects.
 */
export interface Case<T, R> {
  readonly _tag: "Case";
  /** Shown in events, e.g. `tag:Leaf`, `when`, `instanceOf:Leaf`. */
  readonly label: string;
  select(value: T): (() => R) | undefined;
}

/**
 * Literal clause matching one tag. `then` receives the narrowed variant.
 *
 * @example
 * ```typescript
 * { tag: 'Leaf', then: (leaf) => leaf.value }
 * ```
 */
export type TagClause<T, R, D extends string = DefaultDiscriminant> = {
  [K in MatchTag<T, D>]: {
    readonly tag: K;
    readonly then: (value: VariantOf<T, K, D>) => R;
  };
}[MatchTag<T, D>];

/** Literal clause matching whatever `when` accepts. */
export interface WhenClause<T, R> {
  readonly tag?: undefined;
  readonly when: (value: T) => boolean;
  readonly then: (value: T) => R;
}

/**
 * Typed case constructors for values of type `T`, from `Match.cases<T>()`.
 *
 * @example
 * ```typescript
 * const C = Match.cases<Tree>();
 *
 * matchValue(tree,
 *   C.tag('Leaf', (leaf) => leaf.value),
 *   C.tags(['Internal', 'Empty'], () => 0),
 *   exhaustive,
 * );
 * ```
 */
export interface CaseKit<T, D extends string = DefaultDiscriminant> {
  tag<K extends MatchTag<T, D>, R>(
    tag: K,
    handler: (value: VariantOf<T, K, D>) => R
  ): Case<T, R>;
  tags<K extends MatchTag<T, D>, R>(
    tags: readonly K[],
    handler: (value: VariantOf<T, K, D>) => R
  ): Case<T, R>;
}

export type Clause<T, R, D extends string = DefaultDiscriminant> =
  | Case<T, R>
  | TagClause<T, R, D>
  | WhenClause<T, R>;

// =============================================================================
// Terminals
// =============================================================================

/** Default handler, run when no case accepts the value. */
export interface Otherwise<T, R> {
  readonly otherwise: (value: T) => R;
  readonly label?: string;
}

/** Terminal with no default: reaching it throws `NonExhaustiveMatchError`. */
export interface Exhaustive {
  readonly _tag: "Exhaustive";
}

export type Terminal<T, R> = Otherwise<T, R> | Exhaustive;

/** Case list accepted by `matchValue`: any number of cases, then one terminal. */
export type Clauses<T, R, D extends string = DefaultDiscriminant> = [
  ...Clause<T, R, D>[],
  Terminal<T, R>,
];

// =============================================================================
// Handler Maps
// =============================================================================

/** One handler per tag of `T`. */
export type HandlerMap<T, D extends string = DefaultDiscriminant> = {
  readonly [K in MatchTag<T, D>]: (value: VariantOf<T, K, D>) => unknown;
};

/** Handlers for some tags of `T`. */
export type PartialHandlerMap<T, D extends string = DefaultDiscriminant> = {
  readonly [K in MatchTag<T, D>]?: (value: VariantOf<T, K, D>) => unknown;
};

/** Union of the return types of the handlers in `H`. */
export type HandlerResult<H> = {
  [K in keyof H]-?: NonNullable<H[K]> extends (...args: never[]) => infer R
    ? R
    : never;
}[keyof H];

/** Tags whose handler is definitely present in `H`. */
export type HandledTags<H> = {
  [K in keyof H]-?: undefined extends H[K] ? never : K;
}[keyof H] &
  string;

/**
 * A callback type whose parameter is checked bivariantly, so a handler
 * written for a narrowed value can be stored as a handler for the whole
 * input type.
 */
export type NarrowedHandler<T, R> = {
  handle(value: T): R;
}["handle"];

// =============================================================================
// Events
// =============================================================================

/**
 * Instrumentation events, delivered to `onEvent`.
 *
 * - `match_case`: case `index` accepted the value; its handler runs next
 * - `match_default`: no case matched and the default handler runs next
 * - `match_unmatched`: no case matched and there is no default
 */
export type MatchEvent =
  | { type: "match_case"; matcher?: string; index: number; label: string; ts: number }
  | { type: "match_default"; matcher?: string; label: string; ts: number }
  | { type: "match_unmatched"; matcher?: string; tag?: string; ts: number };
