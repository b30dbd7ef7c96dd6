/**
 * Prompt and result rendering for the line-based shell.
 */

import { formatPath, type NavigationPath, type SessionState } from "@dbnav/core";
import { getErrorMessage, isExpectedError } from "@dbnav/errors";
import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

export function renderPrompt(path: NavigationPath, colors: Colors = pc): string {
  return `${colors.bold("dbnav")} (${colors.cyan(formatPath(path))}) > `;
}

/**
 * Text shown after a command: the error when there is one, otherwise the
 * command's output as-is (already newline-terminated, or empty).
 */
export function renderResult(state: SessionState, colors: Colors = pc): string {
  if (state.error !== undefined) {
    return renderError(state.error, colors);
  }
  return state.output;
}

/**
 * Operator mistakes (unknown verb, missing database, ...) are shown in
 * yellow; server and internal failures in red.
 */
export function renderError(error: unknown, colors: Colors = pc): string {
  const paint = isExpectedError(error) ? colors.yellow : colors.red;
  return `${paint(`Error: ${getErrorMessage(error)}`)}\n`;
}
