/**
 * Help renderer - plain-text help for one command level.
 *
 * Output is a pure function of the descriptor: no terminal width, no color.
 */

import { isPositional, type ArgDescriptor, type CommandDescriptor } from "@argsmith/sdk";
import { positionalArgs } from "../descriptors/command.js";

const HELP_COLUMN = 30;
const INDENT = "    ";

export interface HelpOptions {
  /** Program name shown in USAGE, e.g. "git commit". Defaults to the command name. */
  usageName?: string;
}

/** Pad an entry to the help column; an entry already past it gets one space. */
function column(entry: string): string {
  return entry.length >= HELP_COLUMN ? `${entry} ` : entry.padEnd(HELP_COLUMN);
}

function placeholder(arg: ArgDescriptor): string {
  return arg.name.toUpperCase();
}

function usagePositional(arg: ArgDescriptor): string {
  if (arg.last) return `[${placeholder(arg)}]...`;
  return arg.required ? `<${placeholder(arg)}>` : `[${placeholder(arg)}]`;
}

function renderUsage(command: CommandDescriptor, usageName: string, positionals: readonly ArgDescriptor[]): string {
  const parts = [usageName];
  if (command.args.some((arg) => !isPositional(arg))) parts.push("[OPTIONS]");
  parts.push(...positionals.map(usagePositional));
  if (command.subcommands.length > 0) parts.push("<COMMAND>");
  return `\nUSAGE:\n${INDENT}${parts.join(" ")}\n`;
}

function renderPositional(arg: ArgDescriptor): string {
  let line = column(`${INDENT}<${placeholder(arg)}>`) + (arg.help ?? "");
  if (arg.required) line += " [required]";
  return `${line}\n`;
}

function renderOption(arg: ArgDescriptor): string {
  const flags = [
    arg.short !== undefined ? `-${arg.short}` : undefined,
    arg.long !== undefined ? `--${arg.long}` : undefined,
  ].filter((flag): flag is string => flag !== undefined);
  let entry = `${INDENT}${flags.join(", ")}`;
  if (arg.takesValue) entry += ` <${placeholder(arg)}>`;

  let line = column(entry) + (arg.help ?? "");
  if (arg.required) line += " [required]";
  if (arg.defaultValue !== undefined) line += ` [default: ${arg.defaultValue}]`;
  return `${line}\n`;
}

function renderSubcommand(command: CommandDescriptor): string {
  let entry = `${INDENT}${command.name}`;
  if (command.aliases.length > 0) entry += ` (${command.aliases.join(", ")})`;
  return `${column(entry)}${command.about ?? ""}\n`;
}

export function generateHelp(command: CommandDescriptor, options: HelpOptions = {}): string {
  const positionals = positionalArgs(command);
  const optionArgs = command.args.filter((arg) => !isPositional(arg));
  let help = "";

  if (command.about !== undefined) help += `${command.about}\n`;
  if (command.longAbout !== undefined) help += `\n${command.longAbout}\n`;
  if (command.version !== undefined) help += `\nVersion: ${command.version}\n`;

  help += renderUsage(command, options.usageName ?? command.name, positionals);

  if (positionals.length > 0) {
    help += "\nARGS:\n" + positionals.map(renderPositional).join("");
  }

  if (optionArgs.length > 0) {
    help += "\nOPTIONS:\n" + optionArgs.map(renderOption).join("");
  }

  if (command.subcommands.length > 0) {
    help += "\nCOMMANDS:\n" + command.subcommands.map(renderSubcommand).join("");
    help += "\nRun '<COMMAND> --help' for more information on a specific command.\n";
  }

  return help;
}

/** `"<name> <version>"`, or the bare name when no version is declared. */
export function renderVersion(command: CommandDescriptor): string {
  return command.version !== undefined ? `${command.name} ${command.version}` : command.name;
}
