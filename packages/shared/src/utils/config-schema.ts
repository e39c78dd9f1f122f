/**
 * Zod schemas for argument and command configuration.
 *
 * Validates descriptor configuration at build time, before any parse runs,
 * providing clear error messages for misconfigured fields. Cross-argument
 * rules (uniqueness, positional layout, references) are checked by the
 * command builder on top of these.
 */

import { z } from "zod";
import type { ArgValidator, CommandDescriptor } from "@argsmith/sdk";

const singleChar = (label: string) =>
  z.string().refine((value) => Array.from(value).length === 1, `${label} must be a single character`);

export const ArgConfigSchema = z.object({
  name: z.string().min(1, "Argument name must not be empty"),
  short: singleChar("Short flag")
    .refine((value) => value !== "-", "Short flag must not be '-'")
    .optional(),
  long: z
    .string()
    .min(1, "Long flag must not be empty")
    .refine((value) => !value.startsWith("-"), "Long flag must be given without leading dashes")
    .refine((value) => !value.includes("="), "Long flag must not contain '='")
    .optional(),
  help: z.string().optional(),
  index: z.number().int().nonnegative().optional(),
  required: z.boolean().default(false),
  takesValue: z.boolean().default(true),
  multiple: z.boolean().default(false),
  defaultValue: z.string().optional(),
  env: z.string().min(1, "Environment variable name must not be empty").optional(),
  possibleValues: z.array(z.string()).min(1, "Possible values must not be empty").readonly().optional(),
  validator: z
    .custom<ArgValidator>((value) => typeof value === "function", "Validator must be a function")
    .optional(),
  requires: z.array(z.string().min(1)).readonly().default([]),
  conflictsWith: z.array(z.string().min(1)).readonly().default([]),
  valueDelimiter: singleChar("Value delimiter").optional(),
  last: z.boolean().default(false),
});

export const GroupConfigSchema = z.object({
  name: z.string().min(1, "Group name must not be empty"),
  args: z.array(z.string().min(1)).readonly().default([]),
  required: z.boolean().default(false),
});

const commandToken = (label: string) =>
  z
    .string()
    .min(1, `${label} must not be empty`)
    .refine((value) => !value.startsWith("-"), `${label} must not start with '-'`);

/** Subcommands are validated when they are built, so only their shape is checked here. */
const BuiltCommandSchema = z.custom<CommandDescriptor>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    "args" in value &&
    "subcommands" in value,
  "Subcommand must be a built command descriptor",
);

export const CommandConfigSchema = z.object({
  name: commandToken("Command name"),
  aliases: z.array(commandToken("Command alias")).readonly().default([]),
  args: z.array(ArgConfigSchema).readonly().default([]),
  subcommands: z.array(BuiltCommandSchema).readonly().default([]),
  groups: z.array(GroupConfigSchema).readonly().default([]),
  about: z.string().optional(),
  longAbout: z.string().optional(),
  version: z.string().optional(),
  subcommandRequired: z.boolean().default(false),
});

export type ArgConfig = z.input<typeof ArgConfigSchema>;
export type ValidatedArgConfig = z.infer<typeof ArgConfigSchema>;
export type GroupConfig = z.input<typeof GroupConfigSchema>;
export type ValidatedGroupConfig = z.infer<typeof GroupConfigSchema>;
export type CommandConfig = z.input<typeof CommandConfigSchema>;
export type ValidatedCommandConfig = z.infer<typeof CommandConfigSchema>;
