import { DbnavError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DbnavErrorOptions, TimeoutCodes } from "../types.js";

/**
 * Errors raised when a call exceeds its deadline.
 * The `.code` field discriminates the specific error.
 */
export class TimeoutError<C extends TimeoutCodes = TimeoutCodes> extends DbnavError {
  readonly _tag = "TimeoutError" as const;
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
