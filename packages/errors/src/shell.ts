/**
 * Shell errors: input line handling
 *
 * Concrete:
 *   - UnknownCommandError   (SHELL_UNKNOWN_COMMAND)
 *   - CommandInFlightError  (SHELL_COMMAND_IN_FLIGHT)
 */

import { ConflictError } from "./bases/conflict-error.js";
import { ValidationError } from "./bases/validation-error.js";

export class UnknownCommandError extends ValidationError<"SHELL_UNKNOWN_COMMAND"> {
  readonly verb: string;

  constructor(verb: string) {
    super({ code: "SHELL_UNKNOWN_COMMAND", message: `unknown command: ${verb}` });
    this.verb = verb;
  }
}

export class CommandInFlightError extends ConflictError<"SHELL_COMMAND_IN_FLIGHT"> {
  readonly pendingLine: string;

  constructor(pendingLine: string) {
    super({ code: "SHELL_COMMAND_IN_FLIGHT", message: "command already in progress" });
    this.pendingLine = pendingLine;
  }
}
