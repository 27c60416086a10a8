/**
 * Matcher options, resolved configuration and event delivery.
 */

import { MatchDefinitionError } from "../errors";
import type { DefaultDiscriminant, MatchEvent } from "./types";

// =============================================================================
// Options
// =============================================================================

/**
 * Options for `createMatcher()`.
 */
export interface MatcherOptions<D extends string = DefaultDiscriminant> {
  /**
   * Field holding the variant tag.
   * @default "_tag"
   */
  discriminant?: D;
  /** Label put on events and on `NonExhaustiveMatchError`. */
  name?: string;
  /**
   * Called for every match: which case won, whether the default ran,
   * or that nothing matched. Errors thrown here reach the caller.
   */
  onEvent?: (event: MatchEvent) => void;
  /**
   * Warn through `console.warn` about cases that can never run.
   * @default true
   */
  warnUnreachable?: boolean;
}

export interface MatcherConfig {
  readonly discriminant: string;
  readonly name?: string;
  readonly onEvent?: (event: MatchEvent) => void;
  readonly warnUnreachable: boolean;
  /** Warnings already printed; each is printed once. */
  readonly warned: Set<string>;
}

export const DEFAULT_DISCRIMINANT: DefaultDiscriminant = "_tag";

const KNOWN_OPTION_KEYS = new Set([
  "discriminant",
  "name",
  "onEvent",
  "warnUnreachable",
]);

export function resolveConfig(options: MatcherOptions<string> = {}): MatcherConfig {
  const unknownKeys = Object.keys(options).filter(
    (key) => !KNOWN_OPTION_KEYS.has(key)
  );
  if (unknownKeys.length > 0) {
    console.warn(
      `casewise: Unknown matcher options (${unknownKeys.join(", ")}) are ignored.\n` +
        `Known options: ${[...KNOWN_OPTION_KEYS].join(", ")}`
    );
  }

  const discriminant = options.discriminant ?? DEFAULT_DISCRIMINANT;
  if (discriminant.length === 0) {
    throw new MatchDefinitionError({
      reason: "discriminant must be a non-empty field name",
    });
  }

  return {
    discriminant,
    name: options.name,
    onEvent: options.onEvent,
    warnUnreachable: options.warnUnreachable ?? true,
    warned: new Set(),
  };
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * Print an unreachable-case warning, once per matcher. A recursive or hot
 * call site would otherwise repeat it on every call.
 */
export function warnUnreachable(config: MatcherConfig, message: string): void {
  if (!config.warnUnreachable || config.warned.has(message)) return;
  config.warned.add(message);
  console.warn(`casewise: ${message}`);
}

export function emitCase(config: MatcherConfig, index: number, label: string): void {
  config.onEvent?.({
    type: "match_case",
    matcher: config.name,
    index,
    label,
    ts: Date.now(),
  });
}

export function emitDefault(config: MatcherConfig, label: string): void {
  config.onEvent?.({
    type: "match_default",
    matcher: config.name,
    label,
    ts: Date.now(),
  });
}

export function emitUnmatched(config: MatcherConfig, tag: string | undefined): void {
  config.onEvent?.({
    type: "match_unmatched",
    matcher: config.name,
    tag,
    ts: Date.now(),
  });
}
