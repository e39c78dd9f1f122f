/**
 * Stable error codes carried by every CliError.
 */

export const ErrorCode = {
  MISSING_ARGUMENT: "MISSING_ARGUMENT",
  UNKNOWN_ARGUMENT: "UNKNOWN_ARGUMENT",
  UNKNOWN_SUBCOMMAND: "UNKNOWN_SUBCOMMAND",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  INVALID_VALUE: "INVALID_VALUE",
  ARGUMENT_CONFLICT: "ARGUMENT_CONFLICT",
  MISSING_DEPENDENCY: "MISSING_DEPENDENCY",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
