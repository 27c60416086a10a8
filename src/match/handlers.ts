/**
 * Handler-map matching: one handler per tag, looked up by the value's tag.
 */

import { NonExhaustiveMatchError } from "../errors";
import { emitCase, emitDefault, emitUnmatched, type MatcherConfig } from "./config";
import { readTag } from "./guards";
import type {
  HandledTags,
  HandlerMap,
  HandlerResult,
  PartialHandlerMap,
  WithoutTag,
} from "./types";

type Handler = (value: unknown) => unknown;

const isHandler = (value: unknown): value is Handler =>
  typeof value === "function";

function lookup(
  handlers: object,
  tag: string | undefined
): { handler: Handler; index: number } | undefined {
  if (tag === undefined || !Object.hasOwn(handlers, tag)) return undefined;
  const handler: unknown = Reflect.get(handlers, tag);
  if (!isHandler(handler)) return undefined;
  return { handler, index: Object.keys(handlers).indexOf(tag) };
}

/**
 * Run the handler registered for the value's tag.
 * Throws `NonExhaustiveMatchError` when there is none.
 */
export function dispatchAll<T, D extends string, H extends HandlerMap<T, D>>(
  value: T,
  handlers: H,
  config: MatcherConfig
): HandlerResult<H>;
export function dispatchAll(
  value: unknown,
  handlers: object,
  config: MatcherConfig
): unknown {
  const tag = readTag(value, config.discriminant);
  const found = lookup(handlers, tag);
  if (found !== undefined) {
    emitCase(config, found.index, `tag:${tag}`);
    return found.handler(value);
  }
  emitUnmatched(config, tag);
  throw new NonExhaustiveMatchError({ value, tag, matcher: config.name });
}

/**
 * Run the handler registered for the value's tag, or `fallback`.
 */
export function dispatchSome<
  T,
  D extends string,
  H extends PartialHandlerMap<T, D>,
  R,
>(
  value: T,
  handlers: H,
  fallback: (value: WithoutTag<T, HandledTags<H>, D>) => R,
  config: MatcherConfig
): HandlerResult<H> | R;
export function dispatchSome(
  value: unknown,
  handlers: object,
  fallback: Handler,
  config: MatcherConfig
): unknown {
  const tag = readTag(value, config.discriminant);
  const found = lookup(handlers, tag);
  if (found !== undefined) {
    emitCase(config, found.index, `tag:${tag}`);
    return found.handler(value);
  }
  emitDefault(config, "fallback");
  return fallback(value);
}
