import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Raised when the shell configuration (argv, environment) fails validation.
 */
export class ShellConfigurationError extends ValidationError<"CONFIG_INVALID"> {
  constructor(issues: readonly ValidationIssue[]) {
    super({
      code: "CONFIG_INVALID",
      message: `Shell configuration invalid: ${issues
        .map((issue) => `${issue.field}: ${issue.message}`)
        .join("; ")}`,
      issues,
    });
  }
}
