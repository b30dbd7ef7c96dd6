/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the dbnav packages.
 * Each error code maps to a domain, a base error type and an "expected"
 * flag that tells the shell whether the failure is an operator mistake
 * (expected) or a fault in the backend or in dbnav itself.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, SHELL, NAV, BACKEND, CONFIG
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export type ErrorDomain = "internal" | "shell" | "navigation" | "backend" | "config";

export interface ErrorCatalogEntry {
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
  },

  // ============================================================================
  // SHELL ERRORS - Command line handling
  // ============================================================================
  SHELL_UNKNOWN_COMMAND: {
    domain: "shell",
    baseType: "ValidationError",
    isExpected: true,
  },
  SHELL_COMMAND_IN_FLIGHT: {
    domain: "shell",
    baseType: "ConflictError",
    isExpected: false,
  },

  // ============================================================================
  // NAVIGATION ERRORS - Path validation and listing
  // ============================================================================
  NAV_DATABASE_NOT_FOUND: {
    domain: "navigation",
    baseType: "NotFoundError",
    isExpected: true,
  },
  NAV_COLLECTION_NOT_FOUND: {
    domain: "navigation",
    baseType: "NotFoundError",
    isExpected: true,
  },
  NAV_DOCUMENT_NOT_FOUND: {
    domain: "navigation",
    baseType: "NotFoundError",
    isExpected: true,
  },
  NAV_INVALID_DOCUMENT_ID: {
    domain: "navigation",
    baseType: "ValidationError",
    isExpected: true,
  },
  NAV_INVALID_PATH_DEPTH: {
    domain: "navigation",
    baseType: "ValidationError",
    isExpected: false,
  },
  NAV_INVALID_PATTERN: {
    domain: "navigation",
    baseType: "ValidationError",
    isExpected: true,
  },

  // ============================================================================
  // BACKEND ERRORS - Database server calls
  // ============================================================================
  BACKEND_ERROR: {
    domain: "backend",
    baseType: "ExternalError",
    isExpected: false,
  },
  BACKEND_TIMEOUT: {
    domain: "backend",
    baseType: "TimeoutError",
    isExpected: false,
  },
  BACKEND_CONNECTION_FAILED: {
    domain: "backend",
    baseType: "ExternalError",
    isExpected: false,
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    baseType: "ValidationError",
    isExpected: true,
  },
} as const satisfies Record<string, ErrorCatalogEntry>;

export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Error codes whose catalog entry maps to the given base type.
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
