import { HashrouteError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import type { ConflictCodes, HashrouteErrorOptions } from "../types.js";

/**
 * Errors caused by an operation that conflicts with current state,
 * including a collaborator refusing a mutation.
 * HTTP 409. The `.code` field discriminates the specific error.
 */
export class ConflictError extends HashrouteError {
  readonly _tag = "ConflictError" as const;
  override readonly code: ConflictCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: HashrouteErrorOptions<ConflictCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | HashrouteErrorOptions<ConflictCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? { code: "STATE_CONFLICT" as const, message: messageOrOptions, metadata, traceId, cause: undefined }
        : messageOrOptions;
    super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
