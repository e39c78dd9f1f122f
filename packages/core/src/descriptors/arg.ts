/**
 * Argument descriptors - named-field construction and the fluent builder.
 */

import {
  ConfigError,
  ErrorCode,
  VARIADIC_INDEX,
  type ArgDescriptor,
  type ArgValidator,
} from "@argsmith/sdk";
import {
  ArgConfigSchema,
  validateInput,
  type ArgConfig,
  type ValidatedArgConfig,
} from "@argsmith/shared";

/** Apply the flags implied by other fields and freeze. */
export function finalizeArg(config: ValidatedArgConfig): ArgDescriptor {
  return Object.freeze({
    ...config,
    multiple: config.multiple || config.last || config.valueDelimiter !== undefined,
    index: config.last ? VARIADIC_INDEX : config.index,
  });
}

/**
 * Build an argument from a plain configuration object.
 *
 * @throws ConfigError when the configuration does not validate
 */
export function defineArg(config: ArgConfig): ArgDescriptor {
  const result = validateInput(ArgConfigSchema, config);
  if (!result.success || result.data === undefined) {
    throw new ConfigError(`Invalid argument "${config.name}": ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  return finalizeArg(result.data);
}

type ArgDraft = { -readonly [K in keyof ArgConfig]: ArgConfig[K] };

export class ArgBuilder {
  private readonly draft: ArgDraft;

  constructor(name: string) {
    this.draft = { name };
  }

  get name(): string {
    return this.draft.name;
  }

  short(flag: string): this {
    this.draft.short = flag;
    return this;
  }

  long(flag: string): this {
    this.draft.long = flag;
    return this;
  }

  help(text: string): this {
    this.draft.help = text;
    return this;
  }

  required(required = true): this {
    this.draft.required = required;
    return this;
  }

  takesValue(takesValue = true): this {
    this.draft.takesValue = takesValue;
    return this;
  }

  multiple(multiple = true): this {
    this.draft.multiple = multiple;
    return this;
  }

  /**
   * Value used when the argument is absent. It is stored as one value even
   * on a multiple or delimited argument, and is never split.
   */
  defaultValue(value: string): this {
    this.draft.defaultValue = value;
    return this;
  }

  possibleValues(values: readonly string[]): this {
    this.draft.possibleValues = [...values];
    return this;
  }

  validator(validator: ArgValidator): this {
    this.draft.validator = validator;
    return this;
  }

  /** Make this a positional argument at the given 0-based slot. */
  index(index: number): this {
    this.draft.index = index;
    return this;
  }

  env(variable: string): this {
    this.draft.env = variable;
    return this;
  }

  requires(name: string): this {
    this.draft.requires = [...(this.draft.requires ?? []), name];
    return this;
  }

  conflictsWith(name: string): this {
    this.draft.conflictsWith = [...(this.draft.conflictsWith ?? []), name];
    return this;
  }

  /** Split each value on this character. Implies multiple. */
  valueDelimiter(delimiter: string): this {
    this.draft.valueDelimiter = delimiter;
    this.draft.multiple = true;
    return this;
  }

  /** Make this the variadic positional that takes every remaining value. */
  last(last = true): this {
    this.draft.last = last;
    if (last) {
      this.draft.multiple = true;
      this.draft.index = VARIADIC_INDEX;
    }
    return this;
  }

  build(): ArgDescriptor {
    return defineArg(this.draft);
  }
}

export function createArg(name: string): ArgBuilder {
  return new ArgBuilder(name);
}
