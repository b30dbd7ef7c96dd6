import { isDbnavError } from "./base.js";

/**
 * Check if an error represents an expected condition (operator mistake).
 * Returns false for non-DbnavError values.
 */
export function isExpectedError(error: unknown): boolean {
  return isDbnavError(error) && error.isExpected;
}
