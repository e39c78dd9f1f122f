/**
 * Value processor - checks raw values and stores them on a match state.
 */

import {
  ValidationError,
  multipleValues,
  singleValue,
  type ArgDescriptor,
} from "@argsmith/sdk";
import type { MatchState } from "../matches/index.js";

/**
 * Check one value against the allowed set, then the custom validator.
 *
 * @throws ValidationError naming the argument and the rejected value
 */
export function checkValue(arg: ArgDescriptor, value: string): void {
  if (arg.possibleValues && !arg.possibleValues.includes(value)) {
    throw new ValidationError(
      arg.name,
      `invalid value '${value}', expected one of: ${arg.possibleValues.join(", ")}`,
      value,
    );
  }
  const message = arg.validator?.(value);
  if (message !== undefined) {
    throw new ValidationError(arg.name, message, value);
  }
}

export interface ProcessOptions {
  /** Append delimited pieces to the stored list instead of replacing it. */
  append?: boolean;
}

function storedList(state: MatchState, name: string): readonly string[] {
  const stored = state.values.get(name);
  return stored?.kind === "multiple" ? stored.values : [];
}

/**
 * Check a raw value and store it.
 *
 * Delimited values replace whatever was stored unless `append` is set; other
 * multiple values are appended; single values overwrite. Nothing is stored
 * when a check fails.
 */
export function processValue(
  state: MatchState,
  arg: ArgDescriptor,
  raw: string,
  options: ProcessOptions = {},
): void {
  if (arg.valueDelimiter !== undefined) {
    const pieces = raw.split(arg.valueDelimiter).map((piece) => piece.trim());
    for (const piece of pieces) checkValue(arg, piece);
    const previous = options.append ? storedList(state, arg.name) : [];
    state.values.set(arg.name, multipleValues([...previous, ...pieces]));
    return;
  }

  checkValue(arg, raw);

  if (arg.multiple) {
    state.values.set(arg.name, multipleValues([...storedList(state, arg.name), raw]));
    return;
  }

  state.values.set(arg.name, singleValue(raw));
}
