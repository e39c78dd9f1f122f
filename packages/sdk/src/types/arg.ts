/**
 * Argument descriptor types.
 */

/** Index given to the variadic positional; sorts after every real slot. */
export const VARIADIC_INDEX = Number.MAX_SAFE_INTEGER;

/**
 * Custom value check. Return an error message to reject the value,
 * or undefined to accept it.
 */
export type ArgValidator = (value: string) => string | undefined;

/** One declared argument: a flag, an option or a positional. Frozen once built. */
export interface ArgDescriptor {
  readonly name: string;
  /** Single character matched as `-x`. */
  readonly short?: string;
  /** Name matched as `--name`. */
  readonly long?: string;
  readonly help?: string;
  /** Positional slot, 0-based. VARIADIC_INDEX for the variadic positional. */
  readonly index?: number;
  readonly required: boolean;
  /** False for pure flags whose presence alone matters. */
  readonly takesValue: boolean;
  readonly multiple: boolean;
  /** Stored as a single value, never split on valueDelimiter. */
  readonly defaultValue?: string;
  /** Environment variable consulted before defaultValue. */
  readonly env?: string;
  readonly possibleValues?: readonly string[];
  readonly validator?: ArgValidator;
  readonly requires: readonly string[];
  readonly conflictsWith: readonly string[];
  readonly valueDelimiter?: string;
  readonly last: boolean;
}

/** Named set of mutually exclusive arguments. */
export interface ArgGroupDescriptor {
  readonly name: string;
  readonly args: readonly string[];
  /** At least one member must be present. */
  readonly required: boolean;
}

export function isPositional(arg: ArgDescriptor): boolean {
  return arg.index !== undefined;
}
