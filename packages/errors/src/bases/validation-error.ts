import { HashrouteError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import type { HashrouteErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError extends HashrouteError {
  readonly _tag = "ValidationError" as const;
  override readonly code: ValidationCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (populated for VALIDATION_FAILED) */
  readonly issues: readonly ValidationIssue[];

  constructor(
    options: HashrouteErrorOptions<ValidationCodes> & { issues?: readonly ValidationIssue[] },
  );
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions:
      | string
      | (HashrouteErrorOptions<ValidationCodes> & { issues?: readonly ValidationIssue[] }),
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? {
            code: "VALIDATION_FAILED" as const,
            message: messageOrOptions,
            metadata,
            traceId,
            cause: undefined,
            issues,
          }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = opts.issues ?? [];
  }
}
