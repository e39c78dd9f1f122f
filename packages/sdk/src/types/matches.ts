/**
 * Parsed values and the per-level result model.
 */

export type ArgValue =
  | { readonly kind: "single"; readonly value: string }
  | { readonly kind: "multiple"; readonly values: readonly string[] }
  | { readonly kind: "flag"; readonly present: boolean };

export function singleValue(value: string): ArgValue {
  return { kind: "single", value };
}

export function multipleValues(values: readonly string[]): ArgValue {
  return { kind: "multiple", values: [...values] };
}

export function flagValue(present = true): ArgValue {
  return { kind: "flag", present };
}

/** The value as a string, if it is a single value. */
export function asString(value: ArgValue): string | undefined {
  return value.kind === "single" ? value.value : undefined;
}

/** The value as a boolean, if it is a flag. */
export function asBoolean(value: ArgValue): boolean | undefined {
  return value.kind === "flag" ? value.present : undefined;
}

/** The values as a list, if multiple. */
export function asList(value: ArgValue): readonly string[] | undefined {
  return value.kind === "multiple" ? value.values : undefined;
}

export interface SubcommandMatch {
  /** The token that selected the subcommand (its name or one of its aliases). */
  readonly name: string;
  readonly matches: ArgMatches;
}

/**
 * Resolved arguments of one command level.
 *
 * Lookups are by argument name and case-sensitive; absence is reported as
 * undefined or false, never as an error.
 */
export interface ArgMatches {
  readonly commandName: string;
  get(name: string): ArgValue | undefined;
  isPresent(name: string): boolean;
  valueOf(name: string): string | undefined;
  isFlagSet(name: string): boolean;
  valuesOf(name: string): readonly string[] | undefined;
  /** Present argument names in the order they were resolved. */
  names(): string[];
  subcommand(): SubcommandMatch | undefined;
  subcommandName(): string | undefined;
  subcommandMatches(name: string): ArgMatches | undefined;
}
