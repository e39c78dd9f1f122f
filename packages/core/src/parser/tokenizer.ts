/**
 * Tokenizer & matcher - one left-to-right pass over the tokens of a single
 * command level, with one token of lookahead.
 *
 * Tokens that start with `-` are never values or positionals. A recognized
 * subcommand token hands the rest of the vector to the child level and ends
 * the scan here.
 */

import {
  InvalidValueError,
  MissingArgumentError,
  UnknownArgumentError,
  UnknownSubcommandError,
  flagValue,
  singleValue,
  type ArgDescriptor,
  type ArgMatches,
  type CommandDescriptor,
} from "@argsmith/sdk";
import { positionalArgs } from "../descriptors/command.js";
import type { MatchState } from "../matches/index.js";
import { processValue } from "./value-processor.js";

/** Help or version was requested at the level being scanned. */
export class LevelSignal extends Error {
  constructor(public readonly kind: "help" | "version") {
    super(`${kind} requested`);
    this.name = "LevelSignal";
  }
}

/** Parses a child level and returns its matches. */
export type Descend = (child: CommandDescriptor, tail: readonly string[], token: string) => ArgMatches;

export function findLong(command: CommandDescriptor, long: string): ArgDescriptor | undefined {
  return command.args.find((arg) => arg.long === long);
}

export function findShort(command: CommandDescriptor, short: string): ArgDescriptor | undefined {
  return command.args.find((arg) => arg.short === short);
}

export function findSubcommand(command: CommandDescriptor, token: string): CommandDescriptor | undefined {
  return command.subcommands.find((sub) => sub.name === token || sub.aliases.includes(token));
}

/**
 * Record one occurrence of an argument.
 *
 * `value` is the explicit or looked-ahead value, if any. A value-taking
 * argument without one falls back to its default.
 */
export function applyOccurrence(state: MatchState, arg: ArgDescriptor, value: string | undefined): void {
  if (!arg.takesValue) {
    if (value !== undefined) throw new InvalidValueError(arg.name, value);
    state.values.set(arg.name, flagValue());
    return;
  }
  if (value !== undefined) {
    processValue(state, arg, value);
  } else if (arg.defaultValue !== undefined) {
    state.values.set(arg.name, singleValue(arg.defaultValue));
  }
}

/** Returns true when the lookahead token was consumed as a value. */
function scanLong(command: CommandDescriptor, state: MatchState, token: string, lookahead: string | undefined): boolean {
  const body = token.slice(2);
  const eq = body.indexOf("=");
  const key = eq === -1 ? body : body.slice(0, eq);
  const arg = key === "" ? undefined : findLong(command, key);
  if (!arg) {
    throw new UnknownArgumentError(key, eq === -1 ? token : `--${key}`);
  }

  if (eq !== -1) {
    applyOccurrence(state, arg, body.slice(eq + 1));
    return false;
  }
  const consumes = arg.takesValue && lookahead !== undefined;
  applyOccurrence(state, arg, consumes ? lookahead : undefined);
  return consumes;
}

/** Returns true when the lookahead token was consumed as a value. */
function scanShort(command: CommandDescriptor, state: MatchState, token: string, lookahead: string | undefined): boolean {
  const chars = Array.from(token.slice(1));
  if (chars.length === 0) throw new UnknownArgumentError(token);

  let consumed = false;
  chars.forEach((char, position) => {
    const arg = findShort(command, char);
    if (!arg) throw new UnknownArgumentError(char, `-${char}`);

    const isLast = position === chars.length - 1;
    const consumes = arg.takesValue && isLast && lookahead !== undefined;
    applyOccurrence(state, arg, consumes ? lookahead : undefined);
    consumed = consumes;
  });
  return consumed;
}

/**
 * Scan the tokens of one level into `state`.
 *
 * @returns the positional candidates, in order
 * @throws LevelSignal for help and version
 * @throws ParseError subclasses for bad input
 */
export function scanTokens(
  command: CommandDescriptor,
  tokens: readonly string[],
  state: MatchState,
  descend: Descend,
): string[] {
  const candidates: string[] = [];
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];
    if (token === undefined) break;

    if (token === "--help" || token === "-h") throw new LevelSignal("help");
    if ((token === "--version" || token === "-V") && command.version !== undefined) {
      throw new LevelSignal("version");
    }

    if (!token.startsWith("-")) {
      const child = findSubcommand(command, token);
      if (child) {
        state.subcommand = { name: token, matches: descend(child, tokens.slice(i + 1), token) };
        break;
      }
      candidates.push(token);
      i += 1;
      continue;
    }

    const next = tokens[i + 1];
    const lookahead = next !== undefined && !next.startsWith("-") ? next : undefined;
    const consumed = token.startsWith("--")
      ? scanLong(command, state, token, lookahead)
      : scanShort(command, state, token, lookahead);
    i += consumed ? 2 : 1;
  }

  return candidates;
}

/**
 * Fail when a subcommand is required at this level but none was recognized.
 */
export function checkSubcommand(command: CommandDescriptor, state: MatchState, candidates: readonly string[]): void {
  if (!command.subcommandRequired || state.subcommand !== undefined) return;
  const first = candidates[0];
  if (first !== undefined) throw new UnknownSubcommandError(first);
  throw new MissingArgumentError("<COMMAND>");
}

/**
 * Hand positional candidates to the positional arguments in slot order.
 * The variadic positional takes the rest; surplus candidates are dropped.
 */
export function assignPositionals(command: CommandDescriptor, state: MatchState, candidates: readonly string[]): void {
  positionalArgs(command).forEach((arg, slot) => {
    if (arg.last) {
      candidates.slice(slot).forEach((value, n) => processValue(state, arg, value, { append: n > 0 }));
      return;
    }
    const value = candidates[slot];
    if (value !== undefined) processValue(state, arg, value);
  });
}
