/**
 * Parse entry point contracts.
 */

import type { CommandDescriptor } from "./command.js";
import type { ArgMatches } from "./matches.js";
import type { ParseError } from "../errors/base.js";

/** Environment lookup used for backfill. */
export type EnvSource = (name: string) => string | undefined;

/**
 * Why a parse did not produce matches.
 *
 * `path` lists command names from the root to the level that stopped the
 * parse, so callers can render help for the right subcommand.
 */
export type ParseSignal =
  | { readonly kind: "help"; readonly command: CommandDescriptor; readonly path: readonly string[] }
  | { readonly kind: "version"; readonly command: CommandDescriptor; readonly path: readonly string[] }
  | { readonly kind: "error"; readonly error: ParseError; readonly path: readonly string[] };

export type ParseOutcome =
  | { readonly success: true; readonly matches: ArgMatches }
  | { readonly success: false; readonly signal: ParseSignal };
