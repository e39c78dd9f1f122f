/**
 * Zod validation helpers.
 */

import type { ZodType, ZodTypeDef, ZodError } from "zod";
import type { ArgValidator } from "@argsmith/sdk";

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: string;
}

/** Validate input against a Zod schema, returning a structured result. */
export function validateInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: formatZodError(result.error),
  };
}

/** Format a ZodError into a human-readable string. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}

/**
 * Adapt a Zod schema to an argument validator.
 *
 *   createArg("port").validator(schemaValidator(z.coerce.number().int().min(1).max(65535)))
 */
export function schemaValidator(schema: ZodType<unknown, ZodTypeDef, unknown>): ArgValidator {
  return (value) => {
    const result = validateInput(schema, value);
    return result.success ? undefined : result.error;
  };
}
