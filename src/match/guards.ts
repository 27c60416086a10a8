/**
 * Reading tags and narrowing tagged values.
 */

import { NonExhaustiveMatchError } from "../errors";
import { DEFAULT_DISCRIMINANT } from "./config";
import type { MatchTag, VariantOf } from "./types";

/**
 * Read the tag stored in `discriminant`.
 * Returns `undefined` for primitives and for objects without a string tag.
 */
export function readTag(value: unknown, discriminant: string): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const tag: unknown = Reflect.get(value, discriminant);
  return typeof tag === "string" ? tag : undefined;
}

export function hasTag<T, K extends string, D extends string>(
  value: T,
  discriminant: string,
  tag: K
): value is VariantOf<T, K, D> {
  return readTag(value, discriminant) === tag;
}

export function hasAnyTag<T, K extends string, D extends string>(
  value: T,
  discriminant: string,
  tags: readonly K[]
): value is VariantOf<T, K, D> {
  const tag = readTag(value, discriminant);
  return tag !== undefined && tags.some((candidate) => candidate === tag);
}

export function tagGuard<T, K extends MatchTag<T, D>, D extends string>(
  discriminant: string,
  tag: K
): (value: T) => value is VariantOf<T, K, D> {
  return (value): value is VariantOf<T, K, D> =>
    hasTag<T, K, D>(value, discriminant, tag);
}

export function tagsGuard<T, K extends MatchTag<T, D>, D extends string>(
  discriminant: string,
  tags: readonly K[]
): (value: T) => value is VariantOf<T, K, D> {
  return (value): value is VariantOf<T, K, D> =>
    hasAnyTag<T, K, D>(value, discriminant, tags);
}

/**
 * Close a hand-written `switch` over a discriminant. TypeScript rejects the
 * call while a variant is unhandled; reaching it at runtime throws
 * `NonExhaustiveMatchError`.
 *
 * @example
 * ```typescript
 * function area(shape: Shape): number {
 *   switch (shape._tag) {
 *     case 'circle': return Math.PI * shape.radius ** 2;
 *     case 'square': return shape.side ** 2;
 *     default: return absurd(shape);
 *   }
 * }
 * ```
 */
export function absurd(value: never, discriminant: string = DEFAULT_DISCRIMINANT): never {
  throw new NonExhaustiveMatchError({
    value,
    tag: readTag(value, discriminant),
  });
}
