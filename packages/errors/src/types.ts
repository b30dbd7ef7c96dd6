/**
 * Type infrastructure for the error system.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

/**
 * Options for constructing a base error type.
 * The code determines domain and isExpected via catalog lookup.
 */
export interface DbnavErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  cause?: Error | undefined;
}

export type { BaseErrorType, CodesForBase };

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
export type TimeoutCodes = CodesForBase<"TimeoutError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
