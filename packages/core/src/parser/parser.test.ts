import { describe, it, expect, vi } from "vitest";
import {
  ArgumentConflictError,
  InvalidValueError,
  MissingArgumentError,
  MissingDependencyError,
  UnknownArgumentError,
  UnknownSubcommandError,
  ValidationError,
  type ArgMatches,
  type CommandDescriptor,
  type ParseError,
  type ParseSignal,
} from "@argsmith/sdk";
import { createLogger, type Logger } from "@argsmith/shared";
import { createArg } from "../descriptors/arg.js";
import { createCommand } from "../descriptors/command.js";
import { createGroup } from "../descriptors/group.js";
import { parse, type ParseOptions } from "./index.js";

const noEnv: ParseOptions = { env: () => undefined };

function matchesOf(cmd: CommandDescriptor, args: string[], options: ParseOptions = noEnv): ArgMatches {
  const outcome = parse(cmd, ["prog", ...args], options);
  if (!outcome.success) throw new Error(`unexpected ${outcome.signal.kind} signal`);
  return outcome.matches;
}

function signalOf(cmd: CommandDescriptor, args: string[], options: ParseOptions = noEnv): ParseSignal {
  const outcome = parse(cmd, ["prog", ...args], options);
  if (outcome.success) throw new Error("expected the parse to stop");
  return outcome.signal;
}

function errorOf(cmd: CommandDescriptor, args: string[], options: ParseOptions = noEnv): ParseError {
  const signal = signalOf(cmd, args, options);
  if (signal.kind !== "error") throw new Error(`unexpected ${signal.kind} signal`);
  return signal.error;
}

const tool = createCommand("tool")
  .version("1.2.0")
  .arg(createArg("verbose").short("v").long("verbose").takesValue(false))
  .arg(createArg("debug").short("d").takesValue(false))
  .arg(createArg("output").short("o").long("output"))
  .arg(createArg("level").long("level").defaultValue("info"))
  .arg(createArg("input").index(0))
  .build();

describe("parse - tokens", () => {
  it("skips the program name", () => {
    expect(matchesOf(tool, []).names()).toEqual(["level"]);
  });

  it("reads long options with a separate value", () => {
    expect(matchesOf(tool, ["--output", "out.txt"]).valueOf("output")).toBe("out.txt");
  });

  it("splits --key=value on the first equals sign", () => {
    expect(matchesOf(tool, ["--output=a=b"]).valueOf("output")).toBe("a=b");
  });

  it("accepts an empty value after the equals sign", () => {
    expect(matchesOf(tool, ["--output="]).valueOf("output")).toBe("");
  });

  it("never consumes a dash-prefixed token as a value", () => {
    const matches = matchesOf(tool, ["--level", "-v"]);
    expect(matches.valueOf("level")).toBe("info");
    expect(matches.isFlagSet("verbose")).toBe(true);
  });

  it("leaves a value-taking option without a value or default unresolved", () => {
    const matches = matchesOf(tool, ["--output"]);
    expect(matches.isPresent("output")).toBe(false);
  });

  it("lets only the last short flag of a combo take a value", () => {
    const matches = matchesOf(tool, ["-vdo", "file.txt"]);
    expect(matches.isFlagSet("verbose")).toBe(true);
    expect(matches.isFlagSet("debug")).toBe(true);
    expect(matches.valueOf("output")).toBe("file.txt");
    expect(matches.isPresent("input")).toBe(false);
  });

  it("does not hand the lookahead to a value-taking flag in the middle of a combo", () => {
    const matches = matchesOf(tool, ["-ov", "file.txt"]);
    expect(matches.isPresent("output")).toBe(false);
    expect(matches.isFlagSet("verbose")).toBe(true);
    expect(matches.valueOf("input")).toBe("file.txt");
  });

  it("lets the last occurrence of a single-valued option win", () => {
    expect(matchesOf(tool, ["-o", "a", "--output", "b"]).valueOf("output")).toBe("b");
  });

  it("reports unknown long flags as typed", () => {
    const err = errorOf(tool, ["--colour"]);
    expect(err).toBeInstanceOf(UnknownArgumentError);
    expect(err.message).toBe("error: unknown argument '--colour'");
  });

  it("reports the unknown character of a short combo", () => {
    expect(errorOf(tool, ["-vx"]).message).toBe("error: unknown argument '-x'");
  });

  it("resolves long flags by their long name only", () => {
    const cmd = createCommand("app").arg(createArg("dry_run").long("dry-run").takesValue(false)).build();
    expect(errorOf(cmd, ["--dry_run"]).message).toBe("error: unknown argument '--dry_run'");
  });

  it("treats a bare dash and a bare double dash as unknown", () => {
    expect(errorOf(tool, ["-"]).message).toBe("error: unknown argument '-'");
    expect(errorOf(tool, ["--"]).message).toBe("error: unknown argument '--'");
  });

  it("rejects a value given to a flag", () => {
    const err = errorOf(tool, ["--verbose=yes"]);
    expect(err).toBeInstanceOf(InvalidValueError);
    expect(err.message).toBe("error: invalid value 'yes' for 'verbose'");
  });

  it("ignores surplus positionals when there is no variadic", () => {
    const matches = matchesOf(tool, ["a.txt", "b.txt"]);
    expect(matches.valueOf("input")).toBe("a.txt");
  });

  it("checks positional values", () => {
    const cmd = createCommand("app").arg(createArg("mode").index(0).possibleValues(["fast", "slow"])).build();
    expect(errorOf(cmd, ["medium"])).toBeInstanceOf(ValidationError);
  });

  it("collects delimited pieces from every variadic candidate", () => {
    const cmd = createCommand("app").arg(createArg("files").last().valueDelimiter(",")).build();
    expect(matchesOf(cmd, ["a,b", "c,d"]).valuesOf("files")).toEqual(["a", "b", "c", "d"]);
  });
});

describe("parse - signals", () => {
  it("stops with help for --help and -h", () => {
    for (const token of ["--help", "-h"]) {
      const signal = signalOf(tool, ["-v", token, "--bogus"]);
      expect(signal.kind).toBe("help");
      expect(signal.path).toEqual(["tool"]);
    }
  });

  it("stops with version only when one is declared", () => {
    expect(signalOf(tool, ["-V"]).kind).toBe("version");
    const plain = createCommand("plain").build();
    expect(errorOf(plain, ["--version"]).message).toBe("error: unknown argument '--version'");
  });

  it("reports help from a subcommand with its command and path", () => {
    const git = createCommand("git").subcommand(createCommand("commit").alias("ci")).build();
    const signal = signalOf(git, ["ci", "--help"]);
    expect(signal.kind).toBe("help");
    expect(signal.path).toEqual(["git", "commit"]);
    if (signal.kind === "help") expect(signal.command.name).toBe("commit");
  });
});

describe("parse - subcommands", () => {
  const git = createCommand("git")
    .arg(createArg("verbose").short("v").takesValue(false))
    .subcommand(
      createCommand("commit")
        .alias("ci")
        .arg(createArg("message").short("m").long("message").required()),
    )
    .subcommand(createCommand("status"))
    .build();

  it("records the token that selected the subcommand", () => {
    const matches = matchesOf(git, ["-v", "ci", "-m", "msg"]);
    expect(matches.isFlagSet("verbose")).toBe(true);
    expect(matches.subcommandName()).toBe("ci");
    expect(matches.subcommandMatches("ci")?.valueOf("message")).toBe("msg");
    expect(matches.subcommandMatches("ci")?.commandName).toBe("commit");
  });

  it("stops scanning the parent once a subcommand is found", () => {
    const err = errorOf(git, ["status", "-v"]);
    expect(err.message).toBe("error: unknown argument '-v'");
  });

  it("reports the child's failure with the child's path", () => {
    const signal = signalOf(git, ["commit"]);
    expect(signal.kind).toBe("error");
    expect(signal.path).toEqual(["git", "commit"]);
    if (signal.kind === "error") expect(signal.error).toBeInstanceOf(MissingArgumentError);
  });

  it("treats an unrecognized word as a positional candidate", () => {
    const matches = matchesOf(git, ["push"]);
    expect(matches.subcommand()).toBeUndefined();
  });

  describe("when a subcommand is required", () => {
    const strict = createCommand("tool")
      .subcommandRequired()
      .subcommand(createCommand("run"))
      .build();

    it("names the first unrecognized word", () => {
      const err = errorOf(strict, ["walk"]);
      expect(err).toBeInstanceOf(UnknownSubcommandError);
      expect(err.message).toBe("error: unknown subcommand 'walk'");
    });

    it("reports a missing command when no word was given", () => {
      expect(errorOf(strict, []).message).toBe("error: the argument '<COMMAND>' is required");
    });

    it("accepts a recognized subcommand", () => {
      expect(matchesOf(strict, ["run"]).subcommandName()).toBe("run");
    });
  });
});

describe("parse - validation pipeline", () => {
  it("checks required arguments before backfill", () => {
    const cmd = createCommand("app").arg(createArg("config").long("config").required().defaultValue("a.toml")).build();
    expect(errorOf(cmd, []).message).toBe("error: the argument 'config' is required");
  });

  it("prefers the environment over the default", () => {
    const cmd = createCommand("app").arg(createArg("config").env("APP_CONFIG").defaultValue("config.toml")).build();
    const env = vi.fn((name: string) => (name === "APP_CONFIG" ? "env.toml" : undefined));
    expect(matchesOf(cmd, [], { env }).valueOf("config")).toBe("env.toml");
    expect(env).toHaveBeenCalledWith("APP_CONFIG");
    expect(matchesOf(cmd, []).valueOf("config")).toBe("config.toml");
  });

  it("stores a default on a delimited argument as one unsplit value", () => {
    const cmd = createCommand("app").arg(createArg("features").long("features").valueDelimiter(",").defaultValue("a,b")).build();
    const matches = matchesOf(cmd, []);
    expect(matches.valueOf("features")).toBe("a,b");
    expect(matches.valuesOf("features")).toBeUndefined();
  });

  it("counts an empty environment value as set", () => {
    const cmd = createCommand("app").arg(createArg("token").env("APP_TOKEN").defaultValue("none")).build();
    expect(matchesOf(cmd, [], { env: () => "" }).valueOf("token")).toBe("");
  });

  it("does not consult the environment for explicit values", () => {
    const cmd = createCommand("app").arg(createArg("config").long("config").env("APP_CONFIG")).build();
    const env = vi.fn(() => "env.toml");
    expect(matchesOf(cmd, ["--config", "cli.toml"], { env }).valueOf("config")).toBe("cli.toml");
    expect(env).not.toHaveBeenCalled();
  });

  it("checks dependencies after backfill", () => {
    const cmd = createCommand("app")
      .arg(createArg("output").long("output").requires("format"))
      .arg(createArg("format").long("format"))
      .build();
    const err = errorOf(cmd, ["--output", "out.txt"]);
    expect(err).toBeInstanceOf(MissingDependencyError);

    const withDefault = createCommand("app")
      .arg(createArg("output").long("output").requires("format"))
      .arg(createArg("format").long("format").defaultValue("json"))
      .build();
    expect(matchesOf(withDefault, ["--output", "out.txt"]).valueOf("format")).toBe("json");
  });

  it("reports conflicts in declaration order", () => {
    const cmd = createCommand("app")
      .arg(createArg("verbose").short("v").takesValue(false).conflictsWith("quiet"))
      .arg(createArg("quiet").short("q").takesValue(false))
      .build();
    const err = errorOf(cmd, ["-q", "-v"]);
    expect(err).toBeInstanceOf(ArgumentConflictError);
    expect(err.message).toBe("error: the argument 'verbose' cannot be used with 'quiet'");
  });

  it("requires one member of a required group", () => {
    const cmd = createCommand("app")
      .arg(createArg("json").long("json").takesValue(false))
      .arg(createArg("yaml").long("yaml").takesValue(false))
      .group(createGroup("format").args(["json", "yaml"]).required())
      .build();
    expect(errorOf(cmd, []).message).toBe("error: the argument 'format (one of: json, yaml)' is required");
    expect(errorOf(cmd, ["--yaml", "--json"]).message).toBe(
      "error: the argument 'json' cannot be used with 'yaml'",
    );
    expect(matchesOf(cmd, ["--yaml"]).isFlagSet("yaml")).toBe(true);
  });

  it("validates the child before the parent", () => {
    const cmd = createCommand("app")
      .arg(createArg("token").long("token").required())
      .subcommand(createCommand("run").arg(createArg("target").index(0).required()))
      .build();
    expect(errorOf(cmd, ["run"]).message).toBe("error: the argument 'target' is required");
  });
});

describe("parse - faults", () => {
  it("propagates errors thrown by a validator", () => {
    const cmd = createCommand("app")
      .arg(
        createArg("name").long("name").validator(() => {
          throw new RangeError("broken validator");
        }),
      )
      .build();
    expect(() => parse(cmd, ["prog", "--name", "x"], noEnv)).toThrow(RangeError);
  });

  it("logs through the given logger at debug level", () => {
    const debug = vi.fn();
    const logger: Logger = {
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
      setContext: vi.fn(),
      time: () => () => 0,
    };
    matchesOf(tool, ["-v"], { env: () => undefined, logger });
    expect(logger.setContext).toHaveBeenCalledWith({ command: "tool" });
    expect(debug).toHaveBeenCalledWith("Scanned level", {
      present: ["verbose"],
      positionals: 0,
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("scopes each level's log entries to its command path", () => {
    const consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const git = createCommand("git")
      .subcommand(createCommand("commit").arg(createArg("message").short("m")))
      .build();

    matchesOf(git, ["commit", "-m", "wip"], { env: () => undefined, logger: createLogger("parser", "debug") });

    const lines = consoleErrorSpy.mock.calls.map((call) => String(call[0]));
    consoleErrorSpy.mockRestore();
    expect(lines).toContainEqual(
      expect.stringMatching(/\[DEBUG\] \[parser:commit\] \(git commit\) Scanned level \{"present":\["message"\],"positionals":0\}$/),
    );
  });
});
