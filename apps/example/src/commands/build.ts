/**
 * Build command - print the build plan for the current project.
 */

import { z } from "zod";
import type { ArgMatches } from "@argsmith/sdk";
import { schemaValidator } from "@argsmith/shared";
import { createArg, createCommand, type CommandBuilder } from "@argsmith/core";
import type { CliCommand, GlobalOptions } from "./base.js";

export const TARGETS = ["x86_64", "arm64", "wasm32"] as const;

const jobsSchema = z.coerce.number().int().min(1, "must be at least 1").max(256, "must be at most 256");

export interface BuildPlan {
  profile: "debug" | "release";
  target: string;
  jobs: number;
  features: readonly string[];
}

export function planBuild(matches: ArgMatches): BuildPlan {
  return {
    profile: matches.isFlagSet("release") ? "release" : "debug",
    target: matches.valueOf("target") ?? "native",
    jobs: Number(matches.valueOf("jobs") ?? "4"),
    features: matches.valuesOf("features") ?? [],
  };
}

export class BuildCommand implements CliCommand {
  name = "build";
  description = "Build the project";

  define(): CommandBuilder {
    return createCommand(this.name)
      .alias("b")
      .about(this.description)
      .arg(createArg("release").short("r").long("release").help("Build in release mode").takesValue(false))
      .arg(createArg("target").long("target").help("Target platform").possibleValues(TARGETS))
      .arg(
        createArg("jobs")
          .short("j")
          .long("jobs")
          .help("Number of parallel jobs")
          .defaultValue("4")
          .validator(schemaValidator(jobsSchema)),
      )
      .arg(createArg("features").long("features").help("Comma-separated features").valueDelimiter(","));
  }

  async execute(matches: ArgMatches, globals: GlobalOptions): Promise<number> {
    const plan = planBuild(matches);

    console.log(`Building (${plan.profile}) for ${plan.target} with ${plan.jobs} jobs`);
    if (plan.features.length > 0) {
      console.log(`Features: ${plan.features.join(", ")}`);
    }
    if (globals.verbose) {
      console.log(`Using config: ${globals.config}`);
    }
    return 0;
  }
}
