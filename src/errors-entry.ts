/**
 * casewise/errors entry point
 *
 * Errors thrown by the matchers.
 */
export {
  NonExhaustiveMatchError,
  MatchDefinitionError,
  // Union type
  type CasewiseError,
  // Type guards
  isNonExhaustiveMatchError,
  isMatchDefinitionError,
  isCasewiseError,
} from "./errors";
