import { RemapConfigurationError, type ValidationIssue } from "@hashroute/errors";
import { z } from "zod";
import type { HashRemapOptions, RemapLogger } from "./types.js";

function isRemapLogger(value: unknown): value is RemapLogger {
  return (
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    typeof value.debug === "function" &&
    "warn" in value &&
    typeof value.warn === "function"
  );
}

const HashRemapOptionsSchema = z.object({
  suffix: z
    .string({
      required_error: "suffix is required",
      invalid_type_error: "suffix must be a string",
    })
    .min(1, "suffix must not be empty"),
  debug: z.boolean().optional(),
  logger: z
    .custom<RemapLogger>(isRemapLogger, { message: "logger must provide debug() and warn()" })
    .optional(),
});

/**
 * Validate remap rule options, throwing RemapConfigurationError on invalid input.
 * A bare string is taken as the suffix.
 */
export function validateRemapOptions(input: unknown): HashRemapOptions {
  const candidate =
    typeof input === "string" ? { suffix: input } : input === null || input === undefined ? {} : input;

  const result = HashRemapOptionsSchema.safeParse(candidate);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((i) => ({
      field: i.path.join("."),
      message: i.message,
      code: i.code,
    }));
    throw new RemapConfigurationError(issues.map((i) => i.message).join("; "), issues, {
      cause: result.error,
    });
  }

  const { suffix, debug, logger } = result.data;
  return {
    suffix,
    ...(debug !== undefined ? { debug } : {}),
    ...(logger !== undefined ? { logger } : {}),
  };
}
