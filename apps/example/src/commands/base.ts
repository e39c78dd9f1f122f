/**
 * Base command interface for all forge subcommands.
 */

import type { ArgMatches } from "@argsmith/sdk";
import type { CommandBuilder } from "@argsmith/core";

/** Options declared on the root command and shared by every subcommand. */
export interface GlobalOptions {
  verbose: boolean;
  /** Path to the project config file. */
  config: string;
}

export interface CliCommand {
  /** Command name (e.g., "init", "build") */
  name: string;

  /** Command description for help text */
  description: string;

  /** Declare the command's arguments. */
  define(): CommandBuilder;

  /** Execute the command with its own matches */
  execute(matches: ArgMatches, globals: GlobalOptions): Promise<number>; // Exit code: 0 = success, 1+ = error
}
