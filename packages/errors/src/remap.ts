/**
 * Remap errors (hash-based host rewriting)
 *
 * Concrete:
 *   - RemapConfigurationError        (REMAP_CONFIGURATION_INVALID)  ValidationError
 *   - RemapInvalidRequestStateError  (REMAP_INVALID_REQUEST_STATE)  ValidationError
 *   - RemapScratchOverflowError      (REMAP_SCRATCH_OVERFLOW)       InternalError
 *   - RemapHostMutationRejectedError (REMAP_HOST_MUTATION_REJECTED) ConflictError
 *
 * Only the configuration error is thrown. The others travel inside a
 * "no remap" result so the proxy can fall back to the rule's static host.
 */

import { ConflictError } from "./bases/conflict-error.js";
import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

export class RemapConfigurationError extends ValidationError {
  override readonly code = "REMAP_CONFIGURATION_INVALID" as const;

  constructor(message: string, issues?: readonly ValidationIssue[], options?: ErrorOptions) {
    super({
      code: "REMAP_CONFIGURATION_INVALID",
      message: `Remap configuration invalid: ${message}`,
      ...(issues ? { issues } : {}),
      ...(options?.cause instanceof Error ? { cause: options.cause } : {}),
    });
  }
}

export class RemapInvalidRequestStateError extends ValidationError {
  override readonly code = "REMAP_INVALID_REQUEST_STATE" as const;

  constructor(message: string, options?: ErrorOptions) {
    super({
      code: "REMAP_INVALID_REQUEST_STATE",
      message,
      ...(options?.cause instanceof Error ? { cause: options.cause } : {}),
    });
  }
}

export class RemapScratchOverflowError extends InternalError {
  override readonly code = "REMAP_SCRATCH_OVERFLOW" as const;
  readonly required: number;
  readonly capacity: number;

  constructor(required: number, capacity: number) {
    super({
      code: "REMAP_SCRATCH_OVERFLOW",
      message: `Formatted host needs ${required} bytes but scratch capacity is ${capacity}`,
      metadata: { required: String(required), capacity: String(capacity) },
    });
    this.required = required;
    this.capacity = capacity;
  }
}

export class RemapHostMutationRejectedError extends ConflictError {
  override readonly code = "REMAP_HOST_MUTATION_REJECTED" as const;
  readonly attemptedHost: string;

  constructor(attemptedHost: string, options?: ErrorOptions) {
    super({
      code: "REMAP_HOST_MUTATION_REJECTED",
      message: `Failed to modify the host in request URL to "${attemptedHost}"`,
      metadata: { attemptedHost },
      ...(options?.cause instanceof Error ? { cause: options.cause } : {}),
    });
    this.attemptedHost = attemptedHost;
  }
}

/** Errors that degrade a single request to "no remap" */
export type RemapRuntimeError =
  | RemapInvalidRequestStateError
  | RemapScratchOverflowError
  | RemapHostMutationRejectedError;

/** Every error the remap domain produces */
export type RemapError = RemapConfigurationError | RemapRuntimeError;
