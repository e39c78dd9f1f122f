export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError, schemaValidator } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  ArgConfigSchema,
  GroupConfigSchema,
  CommandConfigSchema,
} from "./utils/config-schema.js";
export type {
  ArgConfig,
  ValidatedArgConfig,
  GroupConfig,
  ValidatedGroupConfig,
  CommandConfig,
  ValidatedCommandConfig,
} from "./utils/config-schema.js";
