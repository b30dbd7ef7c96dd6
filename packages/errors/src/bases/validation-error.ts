import { DbnavError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DbnavErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid operator input or configuration.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCodes = ValidationCodes> extends DbnavError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues (populated for CONFIG_INVALID) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: DbnavErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = options.issues ?? [];
  }
}
