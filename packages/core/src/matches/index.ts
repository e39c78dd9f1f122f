/**
 * Matches - the resolved values of one command level.
 *
 * A MatchState is filled while a level is scanned and validated; freezeMatches()
 * turns it into the read-only ArgMatches handed back to callers.
 */

import type { ArgMatches, ArgValue, SubcommandMatch } from "@argsmith/sdk";
import { asBoolean, asList, asString } from "@argsmith/sdk";

export interface MatchState {
  readonly commandName: string;
  readonly values: Map<string, ArgValue>;
  subcommand?: SubcommandMatch;
}

export function createMatchState(commandName: string): MatchState {
  return { commandName, values: new Map() };
}

export function freezeMatches(state: MatchState): ArgMatches {
  return createArgMatches(state.commandName, new Map(state.values), state.subcommand);
}

export function createArgMatches(
  commandName: string,
  values: ReadonlyMap<string, ArgValue> = new Map(),
  subcommand?: SubcommandMatch,
): ArgMatches {
  return {
    commandName,

    get(name: string): ArgValue | undefined {
      return values.get(name);
    },

    isPresent(name: string): boolean {
      return values.has(name);
    },

    valueOf(name: string): string | undefined {
      const value = values.get(name);
      return value ? asString(value) : undefined;
    },

    isFlagSet(name: string): boolean {
      const value = values.get(name);
      return value ? asBoolean(value) ?? false : false;
    },

    valuesOf(name: string): readonly string[] | undefined {
      const value = values.get(name);
      return value ? asList(value) : undefined;
    },

    names(): string[] {
      return [...values.keys()];
    },

    subcommand(): SubcommandMatch | undefined {
      return subcommand;
    },

    subcommandName(): string | undefined {
      return subcommand?.name;
    },

    subcommandMatches(name: string): ArgMatches | undefined {
      return subcommand?.name === name ? subcommand.matches : undefined;
    },
  };
}
