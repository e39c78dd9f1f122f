/**
 * Deploy command - validate a deployment request and report what would run.
 *
 * The deploy token may come from FORGE_DEPLOY_TOKEN instead of the command line.
 */

import type { ArgMatches } from "@argsmith/sdk";
import { createArg, createCommand, createGroup, type CommandBuilder } from "@argsmith/core";
import type { CliCommand, GlobalOptions } from "./base.js";

export const ENVIRONMENTS = ["development", "staging", "production"] as const;

export const TOKEN_ENV = "FORGE_DEPLOY_TOKEN";

function strategyOf(matches: ArgMatches): string {
  if (matches.isFlagSet("blue-green")) return "blue-green";
  return "rolling";
}

export class DeployCommand implements CliCommand {
  name = "deploy";
  description = "Deploy the application";

  define(): CommandBuilder {
    return createCommand(this.name)
      .about(this.description)
      .arg(
        createArg("environment")
          .short("e")
          .long("env")
          .help("Deployment environment")
          .possibleValues(ENVIRONMENTS)
          .required(),
      )
      .arg(createArg("token").long("token").help("Deploy token").env(TOKEN_ENV))
      .arg(createArg("dry-run").long("dry-run").help("Simulate without making changes").takesValue(false))
      .arg(createArg("rolling").long("rolling").help("Replace instances one at a time").takesValue(false))
      .arg(createArg("blue-green").long("blue-green").help("Switch traffic to a new fleet").takesValue(false))
      .group(createGroup("strategy").args(["rolling", "blue-green"]));
  }

  async execute(matches: ArgMatches, globals: GlobalOptions): Promise<number> {
    const environment = matches.valueOf("environment") ?? "";
    const dryRun = matches.isFlagSet("dry-run");

    if (!dryRun && !matches.isPresent("token")) {
      console.error(`A deploy token is required. Pass --token or set ${TOKEN_ENV}.`);
      return 1;
    }

    const prefix = dryRun ? "[dry-run] " : "";
    console.log(`${prefix}Deploying to ${environment} (${strategyOf(matches)})`);
    if (globals.verbose) {
      console.log(`Using config: ${globals.config}`);
    }
    return 0;
  }
}
