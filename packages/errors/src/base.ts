import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * JSON shape produced by {@link HashrouteError.toJSON}
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  isExpected: boolean;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  timestamp: string;
  stack?: string | undefined;
}

/**
 * Root of the hashroute error hierarchy.
 *
 * Concrete classes pin `code` to a catalog entry and copy the entry's
 * HTTP/gRPC mapping onto the instance, so callers can branch on
 * `error.code` or on the base type with `instanceof`.
 */
export abstract class HashrouteError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      metadata: this.metadata,
      traceId: this.traceId,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/** Check if a value is any hashroute error */
export function isHashrouteError(error: unknown): error is HashrouteError {
  return error instanceof HashrouteError;
}

/** Check if a value is an Error instance */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
