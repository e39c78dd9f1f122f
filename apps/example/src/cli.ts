/**
 * The forge command tree.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { EnvSource } from "@argsmith/sdk";
import { createApp, createArg, type App } from "@argsmith/core";
import type { CliCommand } from "./commands/base.js";
import { BuildCommand } from "./commands/build.js";
import { CleanCommand } from "./commands/clean.js";
import { DeployCommand } from "./commands/deploy.js";
import { InitCommand } from "./commands/init.js";

export const DEFAULT_CONFIG = "forge.toml";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export function defaultCommands(): CliCommand[] {
  return [new InitCommand(), new BuildCommand(), new DeployCommand(), new CleanCommand()];
}

export function createCli(commands: readonly CliCommand[], env?: EnvSource): App {
  const builder = createApp("forge")
    .version(readVersion())
    .about("A small project tool")
    .arg(createArg("verbose").short("v").long("verbose").help("Enable verbose output").takesValue(false))
    .arg(
      createArg("config")
        .short("c")
        .long("config")
        .help("Path to config file")
        .env("FORGE_CONFIG")
        .defaultValue(DEFAULT_CONFIG),
    )
    .subcommandRequired()
    .subcommands(commands.map((command) => command.define()));
  if (env) builder.envSource(env);
  return builder.build();
}
