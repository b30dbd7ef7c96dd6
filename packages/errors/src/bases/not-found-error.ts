import { DbnavError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { DbnavErrorOptions, NotFoundCodes } from "../types.js";

/**
 * Errors when a requested database, collection or document does not exist.
 * The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCodes = NotFoundCodes> extends DbnavError {
  readonly _tag = "NotFoundError" as const;
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
