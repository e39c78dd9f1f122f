/**
 * Error hierarchy for argument parsing.
 *
 * ParseError subclasses describe bad user input and are returned inside a
 * ParseOutcome. ConfigError describes a bad descriptor and is thrown at
 * build time.
 */

import { ErrorCode } from "./codes.js";

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "CliError";
  }
}

/** Base class for every failure caused by the argument vector itself. */
export class ParseError extends CliError {
  constructor(message: string, code: string, options?: { cause?: Error }) {
    super(message, code, options);
    this.name = "ParseError";
  }
}

export class MissingArgumentError extends ParseError {
  constructor(public readonly argName: string) {
    super(`error: the argument '${argName}' is required`, ErrorCode.MISSING_ARGUMENT);
    this.name = "MissingArgumentError";
  }
}

export class UnknownArgumentError extends ParseError {
  /**
   * @param argName - the flag name without its dashes (`x` for `-x`)
   * @param token - the flag as it was typed
   */
  constructor(
    public readonly argName: string,
    public readonly token: string = argName,
  ) {
    super(`error: unknown argument '${token}'`, ErrorCode.UNKNOWN_ARGUMENT);
    this.name = "UnknownArgumentError";
  }
}

export class UnknownSubcommandError extends ParseError {
  constructor(public readonly token: string) {
    super(`error: unknown subcommand '${token}'`, ErrorCode.UNKNOWN_SUBCOMMAND);
    this.name = "UnknownSubcommandError";
  }
}

export class ValidationError extends ParseError {
  constructor(
    public readonly argName: string,
    public readonly detail: string,
    public readonly value?: string,
    options?: { cause?: Error },
  ) {
    super(`error: validation failed for '${argName}': ${detail}`, ErrorCode.VALIDATION_ERROR, options);
    this.name = "ValidationError";
  }
}

/** A value was given to an argument that cannot hold one, e.g. `--verbose=yes`. */
export class InvalidValueError extends ParseError {
  constructor(
    public readonly argName: string,
    public readonly value: string,
  ) {
    super(`error: invalid value '${value}' for '${argName}'`, ErrorCode.INVALID_VALUE);
    this.name = "InvalidValueError";
  }
}

export class ArgumentConflictError extends ParseError {
  constructor(
    public readonly argName: string,
    public readonly otherName: string,
  ) {
    super(`error: the argument '${argName}' cannot be used with '${otherName}'`, ErrorCode.ARGUMENT_CONFLICT);
    this.name = "ArgumentConflictError";
  }
}

export class MissingDependencyError extends ParseError {
  constructor(
    public readonly argName: string,
    public readonly requiredName: string,
  ) {
    super(`error: the argument '${argName}' requires '${requiredName}'`, ErrorCode.MISSING_DEPENDENCY);
    this.name = "MissingDependencyError";
  }
}

/**
 * Thrown while building descriptors.
 * Common causes:
 * - duplicate argument names, short or long flags
 * - positional indices with gaps
 * - references to undeclared arguments
 */
export class ConfigError extends CliError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}
