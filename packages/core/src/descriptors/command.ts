/**
 * Command descriptors - named-field construction, layout checks and the
 * fluent builder.
 *
 * Children are built before their parent, so a finished tree cannot hold a
 * cycle. Every descriptor is frozen on the way out.
 */

import {
  ConfigError,
  ErrorCode,
  VARIADIC_INDEX,
  isPositional,
  type ArgDescriptor,
  type ArgGroupDescriptor,
  type CommandDescriptor,
} from "@argsmith/sdk";
import { CommandConfigSchema, validateInput, type CommandConfig } from "@argsmith/shared";
import { ArgBuilder, finalizeArg } from "./arg.js";
import { GroupBuilder } from "./group.js";

/** Positional arguments in slot order, the variadic one last. */
export function positionalArgs(command: CommandDescriptor): ArgDescriptor[] {
  return command.args
    .filter(isPositional)
    .sort((a, b) => (a.index ?? VARIADIC_INDEX) - (b.index ?? VARIADIC_INDEX));
}

function findDuplicate(values: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

/**
 * Check the rules that span several arguments of one command.
 *
 * @throws ConfigError on the first violation
 */
export function checkCommandLayout(command: CommandDescriptor): void {
  const where = `command "${command.name}"`;
  const args = command.args;

  const duplicateName = findDuplicate(args.map((arg) => arg.name));
  if (duplicateName !== undefined) {
    throw new ConfigError(`Duplicate argument "${duplicateName}" in ${where}`);
  }

  const duplicateShort = findDuplicate(args.flatMap((arg) => (arg.short === undefined ? [] : [arg.short])));
  if (duplicateShort !== undefined) {
    throw new ConfigError(`Duplicate short flag "-${duplicateShort}" in ${where}`);
  }

  const duplicateLong = findDuplicate(args.flatMap((arg) => (arg.long === undefined ? [] : [arg.long])));
  if (duplicateLong !== undefined) {
    throw new ConfigError(`Duplicate long flag "--${duplicateLong}" in ${where}`);
  }

  const variadic = args.filter((arg) => arg.last);
  if (variadic.length > 1) {
    throw new ConfigError(
      `Only one variadic positional is allowed in ${where}, found: ${variadic.map((arg) => arg.name).join(", ")}`,
    );
  }

  const slots = positionalArgs(command).filter((arg) => !arg.last);
  slots.forEach((arg, slot) => {
    if (arg.index !== slot) {
      throw new ConfigError(
        `Positional "${arg.name}" in ${where} has index ${arg.index}, expected ${slot} (indices must be unique and contiguous from 0)`,
      );
    }
  });

  const declared = new Set(args.map((arg) => arg.name));
  for (const arg of args) {
    for (const name of [...arg.requires, ...arg.conflictsWith]) {
      if (!declared.has(name)) {
        throw new ConfigError(`Argument "${arg.name}" in ${where} refers to undeclared argument "${name}"`);
      }
    }
  }
  for (const group of command.groups) {
    for (const name of group.args) {
      if (!declared.has(name)) {
        throw new ConfigError(`Group "${group.name}" in ${where} refers to undeclared argument "${name}"`);
      }
    }
  }

  const duplicateToken = findDuplicate(command.subcommands.flatMap((sub) => [sub.name, ...sub.aliases]));
  if (duplicateToken !== undefined) {
    throw new ConfigError(`Subcommand name or alias "${duplicateToken}" is used twice in ${where}`);
  }

  if (command.subcommandRequired && command.subcommands.length === 0) {
    throw new ConfigError(`${where} requires a subcommand but declares none`);
  }
}

/**
 * Build a command from a plain configuration object.
 *
 * @throws ConfigError when the configuration or the layout is invalid
 */
export function defineCommand(config: CommandConfig): CommandDescriptor {
  const result = validateInput(CommandConfigSchema, config);
  if (!result.success || result.data === undefined) {
    throw new ConfigError(`Invalid command "${config.name}": ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  const data = result.data;
  const command: CommandDescriptor = {
    ...data,
    args: Object.freeze(data.args.map(finalizeArg)),
    groups: Object.freeze(data.groups.map((group) => Object.freeze(group))),
  };
  checkCommandLayout(command);
  return Object.freeze(command);
}

export class CommandBuilder {
  private readonly argList: ArgDescriptor[] = [];
  private readonly childList: CommandDescriptor[] = [];
  private readonly groupList: ArgGroupDescriptor[] = [];
  private readonly aliasList: string[] = [];
  private text: { about?: string; longAbout?: string; version?: string } = {};
  private needsSubcommand = false;

  constructor(readonly name: string) {}

  about(text: string): this {
    this.text = { ...this.text, about: text };
    return this;
  }

  longAbout(text: string): this {
    this.text = { ...this.text, longAbout: text };
    return this;
  }

  /** Declaring a version enables `--version` / `-V` at this level. */
  version(version: string): this {
    this.text = { ...this.text, version };
    return this;
  }

  alias(alias: string): this {
    this.aliasList.push(alias);
    return this;
  }

  aliases(aliases: readonly string[]): this {
    this.aliasList.push(...aliases);
    return this;
  }

  arg(arg: ArgBuilder | ArgDescriptor): this {
    this.argList.push(arg instanceof ArgBuilder ? arg.build() : arg);
    return this;
  }

  args(args: ReadonlyArray<ArgBuilder | ArgDescriptor>): this {
    for (const arg of args) this.arg(arg);
    return this;
  }

  subcommand(command: CommandBuilder | CommandDescriptor): this {
    this.childList.push(command instanceof CommandBuilder ? command.build() : command);
    return this;
  }

  subcommands(commands: ReadonlyArray<CommandBuilder | CommandDescriptor>): this {
    for (const command of commands) this.subcommand(command);
    return this;
  }

  group(group: GroupBuilder | ArgGroupDescriptor): this {
    this.groupList.push(group instanceof GroupBuilder ? group.build() : group);
    return this;
  }

  /** Reject parses that do not name one of the subcommands. */
  subcommandRequired(required = true): this {
    this.needsSubcommand = required;
    return this;
  }

  build(): CommandDescriptor {
    return defineCommand({
      name: this.name,
      aliases: [...this.aliasList],
      args: [...this.argList],
      subcommands: [...this.childList],
      groups: [...this.groupList],
      ...this.text,
      subcommandRequired: this.needsSubcommand,
    });
  }
}

export function createCommand(name: string): CommandBuilder {
  return new CommandBuilder(name);
}
