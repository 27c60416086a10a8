/**
 * Case constructors, terminals and the case scanner.
 */

import { MatchDefinitionError, NonExhaustiveMatchError } from "../errors";
import {
  emitCase,
  emitDefault,
  emitUnmatched,
  warnUnreachable,
  type MatcherConfig,
} from "./config";
import { hasAnyTag, hasTag, readTag } from "./guards";
import type {
  Case,
  CaseKit,
  Exhaustive,
  MatchTag,
  NarrowedHandler,
  Otherwise,
  VariantOf,
} from "./types";

type Handler = (value: unknown) => unknown;

const isHandler = (value: unknown): value is Handler =>
  typeof value === "function";

const isObject = (value: unknown): value is object =>
  typeof value === "object" && value !== null;

// =============================================================================
// Case Constructors
// =============================================================================

export function tagCase<T, K extends string, R, D extends string>(
  discriminant: string,
  tag: K,
  handler: (value: VariantOf<T, K, D>) => R
): Case<T, R> {
  return {
    _tag: "Case",
    label: `tag:${tag}`,
    select(value) {
      if (!hasTag<T, K, D>(value, discriminant, tag)) return undefined;
      const variant = value;
      return () => handler(variant);
    },
  };
}

export function tagsCase<T, K extends string, R, D extends string>(
  discriminant: string,
  tags: readonly K[],
  handler: (value: VariantOf<T, K, D>) => R
): Case<T, R> {
  return {
    _tag: "Case",
    label: `tags:${tags.join("|")}`,
    select(value) {
      if (!hasAnyTag<T, K, D>(value, discriminant, tags)) return undefined;
      const variant = value;
      return () => handler(variant);
    },
  };
}

export function caseKit<T, D extends string>(discriminant: string): CaseKit<T, D> {
  return {
    tag<K extends MatchTag<T, D>, R>(
      tag: K,
      handler: (value: VariantOf<T, K, D>) => R
    ): Case<T, R> {
      return tagCase<T, K, R, D>(discriminant, tag, handler);
    },
    tags<K extends MatchTag<T, D>, R>(
      tags: readonly K[],
      handler: (value: VariantOf<T, K, D>) => R
    ): Case<T, R> {
      return tagsCase<T, K, R, D>(discriminant, tags, handler);
    },
  };
}

/**
 * Case accepting whatever `predicate` accepts.
 */
export function when<T, R>(
  predicate: (value: T) => boolean,
  handler: (value: T) => R
): Case<T, R> {
  return {
    _tag: "Case",
    label: "when",
    select: (value) => (predicate(value) ? () => handler(value) : undefined),
  };
}

/**
 * Case accepting the values a type guard accepts; the handler receives the
 * narrowed value.
 *
 * @example
 * ```typescript
 * const isCircle = (s: Shape): s is Circle => s.kind === 'circle';
 *
 * matchValue(shape,
 *   guard(isCircle, (c) => Math.PI * c.radius ** 2),
 *   orElseValue(0),
 * );
 * ```
 */
export function guard<T, S extends T, R>(
  predicate: (value: T) => value is S,
  handler: (value: S) => R
): Case<T, R> {
  return {
    _tag: "Case",
    label: predicate.name ? `guard:${predicate.name}` : "guard",
    select(value) {
      if (!predicate(value)) return undefined;
      const narrowed = value;
      return () => handler(narrowed);
    },
  };
}

/**
 * Case accepting instances of a class (runtime type dispatch).
 *
 * @example
 * ```typescript
 * matchValue(node,
 *   instanceOf(Leaf, (leaf) => leaf.value),
 *   instanceOf(Internal, (n) => n.left.size + n.right.size),
 *   exhaustive,
 * );
 * ```
 */
export function instanceOf<I, R>(
  ctor: abstract new (...args: never[]) => I,
  handler: (value: I) => R
): Case<unknown, R> {
  return {
    _tag: "Case",
    label: `instanceOf:${ctor.name}`,
    select(value) {
      if (!(value instanceof ctor)) return undefined;
      const instance = value;
      return () => handler(instance);
    },
  };
}

// =============================================================================
// Terminals
// =============================================================================

/**
 * Default handler, given the value no case accepted.
 */
export const orElse = <T, R>(handler: (value: T) => R): Otherwise<T, R> => ({
  otherwise: handler,
  label: "orElse",
});

/**
 * Constant default.
 */
export const orElseValue = <R>(value: R): Otherwise<unknown, R> => ({
  otherwise: () => value,
  label: "orElseValue",
});

/**
 * Terminal without a default: a value no case accepts throws
 * `NonExhaustiveMatchError`.
 */
export const exhaustive: Exhaustive = { _tag: "Exhaustive" };

export type CompiledTerminal<T, R> =
  | { readonly kind: "default"; readonly label: string; readonly run: NarrowedHandler<T, R> }
  | { readonly kind: "exhaustive" };

// =============================================================================
// Compiling Untyped Clauses
// =============================================================================

function isCase(value: unknown): value is Case<unknown, unknown> {
  return (
    isObject(value) &&
    Reflect.get(value, "_tag") === "Case" &&
    isHandler(Reflect.get(value, "select"))
  );
}

function isTerminal(value: unknown): boolean {
  return (
    isObject(value) &&
    (Reflect.get(value, "_tag") === "Exhaustive" ||
      isHandler(Reflect.get(value, "otherwise")))
  );
}

/**
 * Turn one clause of a `matchValue` call into a case.
 * `position` is the clause's 0-based index, used in error messages.
 */
export function compileClause(
  clause: unknown,
  position: number,
  config: MatcherConfig
): Case<unknown, unknown> {
  if (isCase(clause)) return clause;

  if (isTerminal(clause)) {
    throw new MatchDefinitionError({
      reason: `clause ${position} is a terminal; the terminal must be the last argument`,
    });
  }

  if (isObject(clause)) {
    const tag: unknown = Reflect.get(clause, "tag");
    const predicate: unknown = Reflect.get(clause, "when");
    const then: unknown = Reflect.get(clause, "then");

    if (typeof tag === "string" && isHandler(then)) {
      return tagCase(config.discriminant, tag, then);
    }
    if (isHandler(predicate) && isHandler(then)) {
      return when((value) => Boolean(predicate(value)), then);
    }
  }

  throw new MatchDefinitionError({
    reason: `clause ${position} is not a case: expected { tag, then }, { when, then } or a constructed case`,
  });
}

export function compileTerminal(terminal: unknown): CompiledTerminal<unknown, unknown> {
  if (isObject(terminal)) {
    if (Reflect.get(terminal, "_tag") === "Exhaustive") {
      return { kind: "exhaustive" };
    }
    const otherwise: unknown = Reflect.get(terminal, "otherwise");
    if (isHandler(otherwise)) {
      const label: unknown = Reflect.get(terminal, "label");
      return {
        kind: "default",
        label: typeof label === "string" ? label : "otherwise",
        run: otherwise,
      };
    }
  }

  throw new MatchDefinitionError({
    reason:
      "the last argument must be a terminal: { otherwise }, orElse(), orElseValue() or exhaustive",
  });
}

/**
 * Warn about tag cases repeating the tag of an earlier tag case.
 */
export function checkReachability(
  cases: ReadonlyArray<Case<unknown, unknown>>,
  config: MatcherConfig
): void {
  if (!config.warnUnreachable) return;
  const seen = new Set<string>();
  for (const [index, candidate] of cases.entries()) {
    if (!candidate.label.startsWith("tag:")) continue;
    const tag = candidate.label.slice("tag:".length);
    if (seen.has(tag)) {
      warnUnreachable(
        config,
        `case ${index} (tag "${tag}") can never run: an earlier case handles that tag`
      );
    }
    seen.add(tag);
  }
}

// =============================================================================
// Scanning
// =============================================================================

/**
 * Run the first case accepting `value`, else the terminal.
 * Cases after the winner are never consulted.
 */
export function runCases<T, R>(
  value: T,
  cases: ReadonlyArray<Case<T, R>>,
  terminal: CompiledTerminal<T, R>,
  config: MatcherConfig
): R {
  for (const [index, candidate] of cases.entries()) {
    const run = candidate.select(value);
    if (run !== undefined) {
      emitCase(config, index, candidate.label);
      return run();
    }
  }

  if (terminal.kind === "default") {
    emitDefault(config, terminal.label);
    return terminal.run(value);
  }

  const tag = readTag(value, config.discriminant);
  emitUnmatched(config, tag);
  throw new NonExhaustiveMatchError({ value, tag, matcher: config.name });
}
