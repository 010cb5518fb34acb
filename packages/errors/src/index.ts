/**
 * @hashroute/errors
 *
 * Shared error taxonomy for hashroute.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof BaseType` for category matching.
 */

export { type ErrorJSON, HashrouteError, isError, isHashrouteError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

export { ConflictError, InternalError, ValidationError } from "./bases/index.js";

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isInternalError,
  isValidationError,
} from "./guards.js";

export type {
  ConflictCodes,
  HashrouteErrorOptions,
  InternalCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

export {
  RemapConfigurationError,
  type RemapError,
  RemapHostMutationRejectedError,
  RemapInvalidRequestStateError,
  type RemapRuntimeError,
  RemapScratchOverflowError,
} from "./remap.js";

export const PACKAGE_NAME = "@hashroute/errors" as const;
