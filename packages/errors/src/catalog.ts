/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the hashroute monorepo.
 * Each error code maps to an HTTP status code, a gRPC canonical code, and a
 * base error type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, REMAP
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ConflictError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input did not pass validation",
  },
  STATE_CONFLICT: {
    domain: "validation",
    httpStatus: 409,
    grpcCode: "ABORTED" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "State conflict",
    description: "The operation conflicts with the current state",
  },

  // ============================================================================
  // REMAP ERRORS - Hash-based host rewriting
  // ============================================================================
  REMAP_CONFIGURATION_INVALID: {
    domain: "remap",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Remap configuration invalid",
    description: "The remap rule is missing its routing suffix or it is malformed",
  },
  REMAP_INVALID_REQUEST_STATE: {
    domain: "remap",
    httpStatus: 400,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid request state",
    description: "The remap instance or request was absent or unreadable",
  },
  REMAP_SCRATCH_OVERFLOW: {
    domain: "remap",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Remap scratch overflow",
    description: "The formatted hostname exceeded the precomputed scratch capacity",
  },
  REMAP_HOST_MUTATION_REJECTED: {
    domain: "remap",
    httpStatus: 409,
    grpcCode: "ABORTED" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Host mutation rejected",
    description: "The request object refused the rewritten hostname",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
