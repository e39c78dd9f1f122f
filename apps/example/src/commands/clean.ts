/**
 * Clean command - report which artifact directories would be removed.
 */

import type { ArgMatches } from "@argsmith/sdk";
import { createArg, createCommand, type CommandBuilder } from "@argsmith/core";
import type { CliCommand, GlobalOptions } from "./base.js";

export class CleanCommand implements CliCommand {
  name = "clean";
  description = "Clean build artifacts";

  define(): CommandBuilder {
    return createCommand(this.name)
      .about(this.description)
      .arg(createArg("all").short("a").long("all").help("Also clean dependency caches").takesValue(false));
  }

  async execute(matches: ArgMatches, _globals: GlobalOptions): Promise<number> {
    const dirs = matches.isFlagSet("all") ? ["target", ".cache"] : ["target"];
    console.log(`Cleaning ${dirs.join(", ")}`);
    return 0;
  }
}
