import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Root of every error raised by dbnav packages.
 *
 * Subclasses pin `_tag` (the behavioral base type) and `code` (the catalog
 * entry); `domain` and `isExpected` are copied from the catalog.
 */
export abstract class DbnavError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function isDbnavError(error: unknown): error is DbnavError {
  return error instanceof DbnavError;
}
