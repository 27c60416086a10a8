/**
 * TaggedError factory: `Error` subclasses carrying a `_tag` discriminant.
 *
 * Kept free of imports so that `errors.ts` can build its classes from it
 * while the matching statics live in `./index.ts`.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Instance shape shared by every tagged error.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options for `TaggedError(tag, options)`.
 */
export interface TaggedErrorOptions<Props> {
  /** Builds `error.message` from the props. Defaults to the tag. */
  message?: (props: Props) => string;
}

/**
 * Constructor arguments: the props object is optional only when every
 * prop is optional.
 */
export type TaggedErrorArgs<Props> =
  Record<never, never> extends Props ? [props?: Props] : [props: Props];

/**
 * Returned by `TaggedError(tag)`; props are given as a type argument when
 * extending: `class E extends TaggedError('E')<{ id: string }> {}`.
 */
export type TaggedErrorConstructor<Tag extends string> = new <
  Props extends object = Record<never, never>,
>(
  ...args: TaggedErrorArgs<Props>
) => TaggedErrorBase<Tag> & Readonly<Props>;

/**
 * Returned by `TaggedError(tag, { message })`; props are inferred from the
 * `message` callback's parameter.
 */
export type TaggedErrorClass<Tag extends string, Props extends object> = new (
  ...args: TaggedErrorArgs<Props>
) => TaggedErrorBase<Tag> & Readonly<Props>;

/** Extract the `_tag` literal of a tagged error (or a union of them). */
export type TagOf<E> = E extends { readonly _tag: infer Tag extends string }
  ? Tag
  : never;

/** Extract the member of an error union carrying `Tag`. */
export type ErrorByTag<E, Tag extends string> = Extract<
  E,
  { readonly _tag: Tag }
>;

/** Props of a tagged error, without the `Error` fields. */
export type PropsOf<E> = Omit<E, keyof TaggedErrorBase>;

// =============================================================================
// Implementation
// =============================================================================

class TaggedErrorInstance extends Error {
  readonly _tag: string;

  constructor(tag: string, props: object | undefined, message: string) {
    super(message, hasCause(props) ? { cause: props.cause } : undefined);
    this._tag = tag;
    this.name = tag;
    if (props !== undefined) {
      Object.assign(this, props);
    }
  }
}

function hasCause(props: object | undefined): props is { cause: unknown } {
  return props !== undefined && "cause" in props;
}

/**
 * Create a tagged error class.
 *
 * Instances are `Error`s with `_tag` and `name` set to the tag and every
 * prop copied onto the instance. A `cause` prop is also passed to `Error`.
 *
 * @example
 * ```typescript
 * // Props via type argument, message = tag
 * class UserNotFound extends TaggedError('UserNotFound')<{ userId: string }> {}
 *
 * // Props inferred from the message callback
 * class InsufficientFunds extends TaggedError('InsufficientFunds', {
 *   message: (p: { required: number; available: number }) =>
 *     `Need ${p.required}, have ${p.available}`,
 * }) {}
 *
 * const error = new UserNotFound({ userId: '123' });
 * error._tag; // 'UserNotFound'
 * error.userId; // '123'
 * error instanceof TaggedError; // true
 * ```
 */
export function TaggedError<Tag extends string>(
  tag: Tag
): TaggedErrorConstructor<Tag>;
export function TaggedError<Tag extends string, Props extends object>(
  tag: Tag,
  options: TaggedErrorOptions<Props>
): TaggedErrorClass<Tag, Props>;
export function TaggedError(
  tag: string,
  options?: { message?: (props: object) => string }
): unknown {
  const describe = options?.message;
  return class extends TaggedErrorInstance {
    constructor(props?: object) {
      super(tag, props, describe ? describe(props ?? {}) : tag);
    }
  };
}

/**
 * Checks whether a value was created by a `TaggedError` class.
 */
export function isTaggedError(value: unknown): value is TaggedErrorBase {
  return value instanceof TaggedErrorInstance;
}

// `error instanceof TaggedError` holds for every tagged error.
Object.defineProperty(TaggedError, Symbol.hasInstance, {
  value: isTaggedError,
});
