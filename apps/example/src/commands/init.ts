/**
 * Init command - write a new forge.json project manifest.
 */

import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { ArgMatches } from "@argsmith/sdk";
import { createArg, createCommand, type CommandBuilder } from "@argsmith/core";
import type { CliCommand, GlobalOptions } from "./base.js";

export const MANIFEST_FILE = "forge.json";

export const TEMPLATES = ["basic", "advanced", "minimal"] as const;

export interface ProjectManifest {
  name: string;
  template: string;
  version: string;
}

export class InitCommand implements CliCommand {
  name = "init";
  description = "Initialize a new project";

  define(): CommandBuilder {
    return createCommand(this.name)
      .about(this.description)
      .arg(createArg("name").short("n").long("name").help("Project name").required())
      .arg(
        createArg("template")
          .long("template")
          .help("Project template to use")
          .possibleValues(TEMPLATES)
          .defaultValue("basic"),
      )
      .arg(createArg("force").short("f").long("force").help("Overwrite an existing manifest").takesValue(false))
      .arg(createArg("dir").index(0).help("Target directory"));
  }

  async execute(matches: ArgMatches, globals: GlobalOptions): Promise<number> {
    const name = matches.valueOf("name") ?? "";
    const dir = resolve(matches.valueOf("dir") ?? ".");
    const targetPath = resolve(dir, MANIFEST_FILE);

    if (existsSync(targetPath) && !matches.isFlagSet("force")) {
      console.error(`${MANIFEST_FILE} already exists at ${targetPath}`);
      console.error("Use --force to overwrite.");
      return 1;
    }

    const manifest: ProjectManifest = {
      name,
      template: matches.valueOf("template") ?? "basic",
      version: "0.1.0",
    };

    await mkdir(dir, { recursive: true });
    await writeFile(targetPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");

    if (globals.verbose) {
      console.log(`Using config: ${globals.config}`);
    }
    console.log(`Initialized project '${name}' (${manifest.template}) in ${dir}`);
    return 0;
  }
}
