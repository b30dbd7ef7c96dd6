import { DbnavError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";

/**
 * Wrap an unknown error into a DbnavError.
 * If the error is already a DbnavError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): DbnavError {
  if (error instanceof DbnavError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}
