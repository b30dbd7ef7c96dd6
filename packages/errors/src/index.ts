/**
 * @dbnav/errors
 *
 * Shared error taxonomy for the dbnav shell.
 *
 * The error system is built on behavioral base types:
 * ValidationError, NotFoundError, ConflictError, TimeoutError,
 * ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { DbnavError, isDbnavError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage, wrapError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ConflictError,
  ExternalError,
  InternalError,
  NotFoundError,
  TimeoutError,
  ValidationError,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ConflictCodes,
  DbnavErrorOptions,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// GUARDS
// ============================================================================

export { isExpectedError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { BackendCallError, BackendTimeoutError, ConnectionFailedError } from "./backend.js";
export { ShellConfigurationError } from "./config.js";
export {
  CollectionNotFoundError,
  DatabaseNotFoundError,
  DocumentNotFoundError,
  InvalidDocumentIdError,
  InvalidNamePatternError,
  InvalidPathDepthError,
} from "./navigation.js";
export { CommandInFlightError, UnknownCommandError } from "./shell.js";
