/**
 * forge entry logic - parse, then route to the selected subcommand.
 */

import type { EnvSource } from "@argsmith/sdk";
import type { AppIO } from "@argsmith/core";
import { createLogger } from "@argsmith/shared";
import type { CliCommand, GlobalOptions } from "./commands/base.js";
import { DEFAULT_CONFIG, createCli, defaultCommands } from "./cli.js";

const logger = createLogger("forge");

export interface MainOptions {
  commands?: readonly CliCommand[];
  /** Environment lookup for backfill. Defaults to process.env. */
  env?: EnvSource;
  io?: AppIO;
}

/** Runs forge against `argv` (program name first) and resolves to the exit code. */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const commands = options.commands ?? defaultCommands();
  const matches = createCli(commands, options.env).getMatches(argv, options.io);

  const sub = matches.subcommand();
  const command = sub && commands.find((cmd) => cmd.name === sub.matches.commandName);
  if (!sub || !command) {
    console.error(`Unknown command: ${sub?.name ?? ""}`);
    return 1;
  }

  const globals: GlobalOptions = {
    verbose: matches.isFlagSet("verbose"),
    config: matches.valueOf("config") ?? DEFAULT_CONFIG,
  };
  logger.debug("Dispatching", { command: command.name, token: sub.name });
  return command.execute(sub.matches, globals);
}
