/**
 * Command descriptor types.
 */

import type { ArgDescriptor, ArgGroupDescriptor } from "./arg.js";

/** A node of the command tree. The root is the application itself. */
export interface CommandDescriptor {
  /** Also the token matched on the command line. */
  readonly name: string;
  readonly aliases: readonly string[];
  /** Declaration order is help order; positionals are ordered by index. */
  readonly args: readonly ArgDescriptor[];
  readonly subcommands: readonly CommandDescriptor[];
  readonly groups: readonly ArgGroupDescriptor[];
  readonly about?: string;
  readonly longAbout?: string;
  readonly version?: string;
  /** Fail the parse when no subcommand token is recognized at this level. */
  readonly subcommandRequired: boolean;
}
