import { DbnavError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DbnavErrorOptions, ExternalCodes } from "../types.js";

/**
 * Errors caused by failures of the database server or the connection to it.
 * The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCodes = ExternalCodes> extends DbnavError {
  readonly _tag = "ExternalError" as const;
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
