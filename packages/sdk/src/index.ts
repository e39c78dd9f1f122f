// Types
export type {
  ArgDescriptor,
  ArgGroupDescriptor,
  ArgValidator,
} from "./types/arg.js";
export { VARIADIC_INDEX, isPositional } from "./types/arg.js";

export type { CommandDescriptor } from "./types/command.js";

export type {
  ArgValue,
  ArgMatches,
  SubcommandMatch,
} from "./types/matches.js";
export {
  singleValue,
  multipleValues,
  flagValue,
  asString,
  asBoolean,
  asList,
} from "./types/matches.js";

export type {
  EnvSource,
  ParseSignal,
  ParseOutcome,
} from "./types/parse.js";

// Errors
export {
  CliError,
  ParseError,
  MissingArgumentError,
  UnknownArgumentError,
  UnknownSubcommandError,
  ValidationError,
  InvalidValueError,
  ArgumentConflictError,
  MissingDependencyError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
