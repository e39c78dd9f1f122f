/**
 * parse() - turns a process argument vector into matches or a signal.
 *
 * Each level is scanned, then its positionals are assigned, then the
 * validator pipeline runs. A child level finishes before its parent's
 * pipeline starts, so the deepest failure wins.
 */

import {
  ParseError,
  type ArgMatches,
  type CommandDescriptor,
  type EnvSource,
  type ParseOutcome,
  type ParseSignal,
} from "@argsmith/sdk";
import { createLogger, type Logger } from "@argsmith/shared";
import { createMatchState, freezeMatches } from "../matches/index.js";
import { LevelSignal, assignPositionals, checkSubcommand, scanTokens } from "./tokenizer.js";
import { runValidation } from "./validator.js";

const logger = createLogger("parser");

export interface ParseOptions {
  /** Environment lookup for backfill. Defaults to process.env. */
  env?: EnvSource;
  logger?: Logger;
}

interface ParseContext {
  readonly env: EnvSource;
  readonly logger: Logger;
}

/** Carries a signal out of nested levels untouched. */
class ParseStop extends Error {
  constructor(public readonly signal: ParseSignal) {
    super(`parse stopped: ${signal.kind}`);
    this.name = "ParseStop";
  }
}

const processEnv: EnvSource = (name) => process.env[name];

function parseLevel(
  command: CommandDescriptor,
  tokens: readonly string[],
  path: readonly string[],
  ctx: ParseContext,
): ArgMatches {
  const state = createMatchState(command.name);
  const log = ctx.logger.child(command.name);
  log.setContext({ command: path.join(" ") });
  try {
    const candidates = scanTokens(command, tokens, state, (child, tail) =>
      parseLevel(child, tail, [...path, child.name], ctx),
    );
    checkSubcommand(command, state, candidates);
    assignPositionals(command, state, candidates);
    log.debug("Scanned level", {
      present: [...state.values.keys()],
      positionals: candidates.length,
    });
    runValidation(command, state, ctx.env);
  } catch (err) {
    if (err instanceof ParseStop) throw err;
    if (err instanceof LevelSignal) {
      throw new ParseStop({ kind: err.kind, command, path });
    }
    if (err instanceof ParseError) {
      log.debug("Parse failed", { code: err.code });
      throw new ParseStop({ kind: "error", error: err, path });
    }
    throw err;
  }
  return freezeMatches(state);
}

/**
 * Parse `argv` against a command tree.
 *
 * `argv[0]` is the program name and is skipped. Bad input never throws; it
 * comes back as an error signal. Anything else thrown (a validator that
 * throws, for instance) propagates.
 */
export function parse(
  command: CommandDescriptor,
  argv: readonly string[],
  options: ParseOptions = {},
): ParseOutcome {
  const ctx: ParseContext = {
    env: options.env ?? processEnv,
    logger: options.logger ?? logger,
  };
  const done = ctx.logger.time("parse");
  try {
    const matches = parseLevel(command, argv.slice(1), [command.name], ctx);
    return { success: true, matches };
  } catch (err) {
    if (err instanceof ParseStop) return { success: false, signal: err.signal };
    throw err;
  } finally {
    done();
  }
}
