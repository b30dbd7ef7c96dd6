import { DbnavError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DbnavErrorOptions, ConflictCodes } from "../types.js";

/**
 * Errors caused by a request that conflicts with the current session state.
 * The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictCodes = ConflictCodes> extends DbnavError {
  readonly _tag = "ConflictError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: DbnavErrorOptions<C>) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
