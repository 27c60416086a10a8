/**
 * Fluent matchers.
 *
 * `Matcher` collects cases and ends in a terminal returning a reusable
 * `(value) => result` function. `ValueMatcher` is the same builder bound to
 * one value; its terminals return the result.
 *
 * Both are immutable: every step returns a new matcher.
 */

import {
  instanceOf,
  runCases,
  tagCase,
  tagsCase,
  guard,
  when,
  type CompiledTerminal,
} from "./cases";
import { warnUnreachable, type MatcherConfig } from "./config";
import type {
  Case,
  DefaultDiscriminant,
  MatchTag,
  NarrowedHandler,
  VariantOf,
  WithoutTag,
} from "./types";

/**
 * `exhaustive()` takes no argument once every variant is handled. While
 * some remain it demands one, so the call fails to compile and the error
 * names the unhandled variants.
 */
export type ExhaustiveArgs<Remaining> = [Remaining] extends [never]
  ? []
  : [unhandledVariants: Remaining];

/** A compiled matcher. */
export type MatchFn<T, R> = (value: T) => R;

/**
 * Reusable matcher over values of type `T`.
 *
 * @typeParam R - union of the handler results so far
 * @typeParam Remaining - variants no case fully handles yet
 *
 * @example
 * ```typescript
 * const describe = Match.type<Shape>()
 *   .tag('circle', (c) => `circle r=${c.radius}`)
 *   .tag('square', (s) => `square ${s.side}`)
 *   .exhaustive();
 *
 * describe({ _tag: 'circle', radius: 2 }); // "circle r=2"
 * ```
 */
export class Matcher<
  T,
  R = never,
  Remaining extends T = T,
  D extends string = DefaultDiscriminant,
> {
  constructor(
    private readonly config: MatcherConfig,
    private readonly cases: ReadonlyArray<Case<T, R>> = [],
    private readonly handledTags: ReadonlySet<string> = new Set()
  ) {}

  /** Handle one variant. Only unhandled tags are accepted. */
  tag<K extends MatchTag<Remaining, D>, R2>(
    tag: K,
    handler: (value: VariantOf<T, K, D>) => R2
  ): Matcher<T, R | R2, WithoutTag<Remaining, K, D>, D> {
    return this.append<R2, WithoutTag<Remaining, K, D>>(
      tagCase<T, K, R2, D>(this.config.discriminant, tag, handler),
      [tag]
    );
  }

  /** Handle several variants with one handler. */
  tags<K extends MatchTag<Remaining, D>, R2>(
    tags: readonly K[],
    handler: (value: VariantOf<T, K, D>) => R2
  ): Matcher<T, R | R2, WithoutTag<Remaining, K, D>, D> {
    return this.append<R2, WithoutTag<Remaining, K, D>>(
      tagsCase<T, K, R2, D>(this.config.discriminant, tags, handler),
      tags
    );
  }

  /** Handle whatever `predicate` accepts. Handles no variant fully. */
  when<R2>(
    predicate: (value: T) => boolean,
    handler: (value: T) => R2
  ): Matcher<T, R | R2, Remaining, D> {
    return this.append<R2, Remaining>(when(predicate, handler), []);
  }

  /** Handle the values a type guard accepts. */
  guard<S extends T, R2>(
    predicate: (value: T) => value is S,
    handler: (value: S) => R2
  ): Matcher<T, R | R2, Exclude<Remaining, S>, D> {
    return this.append<R2, Exclude<Remaining, S>>(guard(predicate, handler), []);
  }

  /** Handle instances of a class. */
  instanceOf<I, R2>(
    ctor: abstract new (...args: never[]) => I,
    handler: (value: I) => R2
  ): Matcher<T, R | R2, Exclude<Remaining, I>, D> {
    return this.append<R2, Exclude<Remaining, I>>(instanceOf(ctor, handler), []);
  }

  /** End with a default handler, given the unhandled variants. */
  orElse<R2>(handler: (value: Remaining) => R2): MatchFn<T, R | R2> {
    const fallback: NarrowedHandler<T, R2> = handler;
    return this.finish<R2>({ kind: "default", label: "orElse", run: fallback });
  }

  /** End with a constant default. */
  orElseValue<R2>(value: R2): MatchFn<T, R | R2> {
    return this.finish<R2>({
      kind: "default",
      label: "orElseValue",
      run: () => value,
    });
  }

  /**
   * End without a default. Compiles only when every variant is handled;
   * values that still get through (untyped input) throw
   * `NonExhaustiveMatchError`.
   */
  exhaustive(..._proof: ExhaustiveArgs<Remaining>): MatchFn<T, R> {
    return this.finish<never>({ kind: "exhaustive" });
  }

  private append<R2, Rest extends T>(
    next: Case<T, R2>,
    tags: readonly string[]
  ): Matcher<T, R | R2, Rest, D> {
    for (const tag of tags) {
      if (this.handledTags.has(tag)) {
        warnUnreachable(
          this.config,
          `case "${next.label}" can never run for tag "${tag}": an earlier case handles it`
        );
      }
    }
    return new Matcher<T, R | R2, Rest, D>(
      this.config,
      [...this.cases, next],
      new Set([...this.handledTags, ...tags])
    );
  }

  private finish<R2>(terminal: CompiledTerminal<T, R2>): MatchFn<T, R | R2> {
    const { cases, config } = this;
    return (value) => runCases<T, R | R2>(value, cases, terminal, config);
  }
}

/**
 * A `Matcher` bound to one value. Terminals return the result.
 *
 * @example
 * ```typescript
 * const area = Match.on(shape)
 *   .tag('circle', (c) => Math.PI * c.radius ** 2)
 *   .tag('square', (s) => s.side ** 2)
 *   .exhaustive();
 * ```
 */
export class ValueMatcher<
  T,
  R = never,
  Remaining extends T = T,
  D extends string = DefaultDiscriminant,
> {
  constructor(
    private readonly input: T,
    private readonly matcher: Matcher<T, R, Remaining, D>
  ) {}

  tag<K extends MatchTag<Remaining, D>, R2>(
    tag: K,
    handler: (value: VariantOf<T, K, D>) => R2
  ): ValueMatcher<T, R | R2, WithoutTag<Remaining, K, D>, D> {
    return new ValueMatcher(this.input, this.matcher.tag(tag, handler));
  }

  tags<K extends MatchTag<Remaining, D>, R2>(
    tags: readonly K[],
    handler: (value: VariantOf<T, K, D>) => R2
  ): ValueMatcher<T, R | R2, WithoutTag<Remaining, K, D>, D> {
    return new ValueMatcher(this.input, this.matcher.tags(tags, handler));
  }

  when<R2>(
    predicate: (value: T) => boolean,
    handler: (value: T) => R2
  ): ValueMatcher<T, R | R2, Remaining, D> {
    return new ValueMatcher(this.input, this.matcher.when(predicate, handler));
  }

  guard<S extends T, R2>(
    predicate: (value: T) => value is S,
    handler: (value: S) => R2
  ): ValueMatcher<T, R | R2, Exclude<Remaining, S>, D> {
    return new ValueMatcher(this.input, this.matcher.guard(predicate, handler));
  }

  instanceOf<I, R2>(
    ctor: abstract new (...args: never[]) => I,
    handler: (value: I) => R2
  ): ValueMatcher<T, R | R2, Exclude<Remaining, I>, D> {
    return new ValueMatcher(this.input, this.matcher.instanceOf(ctor, handler));
  }

  orElse<R2>(handler: (value: Remaining) => R2): R | R2 {
    return this.matcher.orElse(handler)(this.input);
  }

  orElseValue<R2>(value: R2): R | R2 {
    return this.matcher.orElseValue(value)(this.input);
  }

  exhaustive(...proof: ExhaustiveArgs<Remaining>): R {
    return this.matcher.exhaustive(...proof)(this.input);
  }
}
