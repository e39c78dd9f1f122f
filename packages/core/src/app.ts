/**
 * App - the root command plus the process-facing shim.
 *
 * getMatches() is the only place in the library that prints or exits.
 */

import type {
  ArgDescriptor,
  ArgGroupDescriptor,
  ArgMatches,
  CommandDescriptor,
  EnvSource,
  ParseOutcome,
} from "@argsmith/sdk";
import type { Logger } from "@argsmith/shared";
import { CommandBuilder } from "./descriptors/command.js";
import { generateHelp, renderVersion } from "./help/renderer.js";
import { parse, type ParseOptions } from "./parser/index.js";

/** Output and exit hooks used by getMatches(). */
export interface AppIO {
  stdout(text: string): void;
  stderr(text: string): void;
  exit(code: number): never;
}

const processIO: AppIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  exit: (code) => process.exit(code),
};

/** Default argument vector: the script path followed by the user's arguments. */
function processArgv(): string[] {
  return process.argv.slice(1);
}

export class App implements CommandDescriptor {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly args: readonly ArgDescriptor[];
  readonly subcommands: readonly CommandDescriptor[];
  readonly groups: readonly ArgGroupDescriptor[];
  readonly about?: string;
  readonly longAbout?: string;
  readonly version?: string;
  readonly subcommandRequired: boolean;

  constructor(
    readonly command: CommandDescriptor,
    private readonly options: ParseOptions = {},
  ) {
    this.name = command.name;
    this.aliases = command.aliases;
    this.args = command.args;
    this.subcommands = command.subcommands;
    this.groups = command.groups;
    this.about = command.about;
    this.longAbout = command.longAbout;
    this.version = command.version;
    this.subcommandRequired = command.subcommandRequired;
  }

  /** Parse without side effects. */
  tryGetMatches(argv: readonly string[] = processArgv()): ParseOutcome {
    return parse(this.command, argv, this.options);
  }

  /**
   * Parse, or print help/version and exit 0, or print the error and exit 1.
   */
  getMatches(argv: readonly string[] = processArgv(), io: AppIO = processIO): ArgMatches {
    const outcome = this.tryGetMatches(argv);
    if (outcome.success) return outcome.matches;

    const signal = outcome.signal;
    switch (signal.kind) {
      case "help":
        io.stdout(generateHelp(signal.command, { usageName: signal.path.join(" ") }));
        return io.exit(0);
      case "version":
        io.stdout(renderVersion(signal.command));
        return io.exit(0);
      case "error":
        io.stderr(signal.error.message);
        io.stderr("\nFor more information try --help");
        return io.exit(1);
    }
  }

  help(): string {
    return generateHelp(this.command);
  }
}

/** Root builder; build() yields an App. */
export class AppBuilder extends CommandBuilder {
  private parseOptions: ParseOptions = {};

  /** Environment lookup for backfill, in place of process.env. */
  envSource(env: EnvSource): this {
    this.parseOptions = { ...this.parseOptions, env };
    return this;
  }

  logger(logger: Logger): this {
    this.parseOptions = { ...this.parseOptions, logger };
    return this;
  }

  override build(): App {
    return new App(super.build(), this.parseOptions);
  }
}

export function createApp(name: string): AppBuilder {
  return new AppBuilder(name);
}
