// Descriptors
export { defineArg, createArg, ArgBuilder, finalizeArg } from "./descriptors/arg.js";
export { defineGroup, createGroup, GroupBuilder } from "./descriptors/group.js";
export {
  defineCommand,
  createCommand,
  CommandBuilder,
  checkCommandLayout,
  positionalArgs,
} from "./descriptors/command.js";

// Matches
export { createArgMatches } from "./matches/index.js";

// Parser
export { parse } from "./parser/index.js";
export type { ParseOptions } from "./parser/index.js";
export { checkValue } from "./parser/value-processor.js";

// Help
export { generateHelp, renderVersion } from "./help/renderer.js";
export type { HelpOptions } from "./help/renderer.js";

// App
export { App, AppBuilder, createApp } from "./app.js";
export type { AppIO } from "./app.js";

// Quick parser
export { parseRawArgs, hasFlag, getOption } from "./args/raw-args.js";
export type { RawArgs } from "./args/raw-args.js";
