import { HashrouteError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain, type GrpcStatusCode, type HttpStatusCode } from "../catalog.js";
import type { HashrouteErrorOptions, InternalCodes } from "../types.js";

/**
 * Errors caused by bugs or violated internal invariants.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError extends HashrouteError {
  readonly _tag = "InternalError" as const;
  override readonly code: InternalCodes;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: HashrouteErrorOptions<InternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | HashrouteErrorOptions<InternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR" as const, message: messageOrOptions, metadata, traceId, cause: undefined }
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
