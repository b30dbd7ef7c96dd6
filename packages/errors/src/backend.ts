/**
 * Backend errors: calls to the database server
 *
 * Concrete:
 *   - BackendCallError       (BACKEND_ERROR)
 *   - BackendTimeoutError    (BACKEND_TIMEOUT)
 *   - ConnectionFailedError  (BACKEND_CONNECTION_FAILED)
 *
 * `context` names the call that failed ("list databases", ...) and prefixes
 * the message; the underlying driver message follows verbatim.
 */

import { ExternalError } from "./bases/external-error.js";
import { TimeoutError } from "./bases/timeout-error.js";

export class BackendCallError extends ExternalError<"BACKEND_ERROR"> {
  readonly context: string;

  constructor(context: string, message: string, cause?: Error) {
    super({ code: "BACKEND_ERROR", message: `${context}: ${message}`, cause });
    this.context = context;
  }
}

export class BackendTimeoutError extends TimeoutError<"BACKEND_TIMEOUT"> {
  readonly context: string;
  readonly timeoutMs: number;

  constructor(context: string, timeoutMs: number) {
    super({
      code: "BACKEND_TIMEOUT",
      message: `${context}: operation timed out after ${timeoutMs}ms`,
    });
    this.context = context;
    this.timeoutMs = timeoutMs;
  }
}

export class ConnectionFailedError extends ExternalError<"BACKEND_CONNECTION_FAILED"> {
  constructor(context: string, message: string, cause?: Error) {
    super({ code: "BACKEND_CONNECTION_FAILED", message: `${context}: ${message}`, cause });
  }
}
