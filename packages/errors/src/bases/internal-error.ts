import { DbnavError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";

/**
 * Errors caused by bugs in dbnav itself, or by values thrown that are not
 * dbnav errors (see `wrapError`).
 */
export class InternalError extends DbnavError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  override readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  override readonly isExpected: boolean = ERROR_CATALOG.INTERNAL_ERROR.isExpected;
}
