/**
 * Argument groups - sets of mutually exclusive arguments.
 */

import { ConfigError, ErrorCode, type ArgGroupDescriptor } from "@argsmith/sdk";
import { GroupConfigSchema, validateInput, type GroupConfig } from "@argsmith/shared";

export function defineGroup(config: GroupConfig): ArgGroupDescriptor {
  const result = validateInput(GroupConfigSchema, config);
  if (!result.success || result.data === undefined) {
    throw new ConfigError(`Invalid group "${config.name}": ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  return Object.freeze(result.data);
}

export class GroupBuilder {
  private readonly members: string[] = [];
  private isRequired = false;

  constructor(private readonly name: string) {}

  arg(name: string): this {
    this.members.push(name);
    return this;
  }

  args(names: readonly string[]): this {
    this.members.push(...names);
    return this;
  }

  /** Require at least one member to be present. */
  required(required = true): this {
    this.isRequired = required;
    return this;
  }

  build(): ArgGroupDescriptor {
    return defineGroup({ name: this.name, args: [...this.members], required: this.isRequired });
  }
}

export function createGroup(name: string): GroupBuilder {
  return new GroupBuilder(name);
}
