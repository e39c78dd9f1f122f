/**
 * Validator pipeline - runs once per level after its scan, stopping at the
 * first failure.
 *
 *   required → backfill → requires → conflicts → groups
 */

import {
  ArgumentConflictError,
  MissingArgumentError,
  MissingDependencyError,
  singleValue,
  type CommandDescriptor,
  type EnvSource,
} from "@argsmith/sdk";
import type { MatchState } from "../matches/index.js";

/** Required arguments must have been given on the command line. */
export function checkRequired(command: CommandDescriptor, state: MatchState): void {
  for (const arg of command.args) {
    if (arg.required && !state.values.has(arg.name)) {
      throw new MissingArgumentError(arg.name);
    }
  }
}

/** Fill absent arguments from the environment, then from their default. */
export function backfill(command: CommandDescriptor, state: MatchState, env: EnvSource): void {
  for (const arg of command.args) {
    if (state.values.has(arg.name)) continue;
    const fromEnv = arg.env !== undefined ? env(arg.env) : undefined;
    const value = fromEnv ?? arg.defaultValue;
    if (value !== undefined) state.values.set(arg.name, singleValue(value));
  }
}

export function checkDependencies(command: CommandDescriptor, state: MatchState): void {
  for (const arg of command.args) {
    if (!state.values.has(arg.name)) continue;
    const missing = arg.requires.find((name) => !state.values.has(name));
    if (missing !== undefined) throw new MissingDependencyError(arg.name, missing);
  }
}

export function checkConflicts(command: CommandDescriptor, state: MatchState): void {
  for (const arg of command.args) {
    if (!state.values.has(arg.name)) continue;
    const other = arg.conflictsWith.find((name) => state.values.has(name));
    if (other !== undefined) throw new ArgumentConflictError(arg.name, other);
  }
}

/** Groups are mutually exclusive; required groups need one member. */
export function checkGroups(command: CommandDescriptor, state: MatchState): void {
  for (const group of command.groups) {
    const present = group.args.filter((name) => state.values.has(name));
    const [first, second] = present;
    if (group.required && first === undefined) {
      throw new MissingArgumentError(`${group.name} (one of: ${group.args.join(", ")})`);
    }
    if (first !== undefined && second !== undefined) {
      throw new ArgumentConflictError(first, second);
    }
  }
}

export function runValidation(command: CommandDescriptor, state: MatchState, env: EnvSource): void {
  checkRequired(command, state);
  backfill(command, state, env);
  checkDependencies(command, state);
  checkConflicts(command, state);
  checkGroups(command, state);
}
