/**
 * Line-at-a-time loop over a ShellSession.
 *
 * Each line is submitted and its outcome applied before the next line is
 * read. Quits on end of input, or on Ctrl+C and Escape when attached to a
 * terminal.
 */

import type { ShellSession } from "@dbnav/core";
import { isDbnavError } from "@dbnav/errors";
import type { Key } from "node:readline";
import { createInterface } from "node:readline/promises";
import pc from "picocolors";
import { type Colors, renderError, renderPrompt, renderResult } from "./view.js";

export interface ReplOptions {
  readonly session: ShellSession;
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
  /** Enables line editing, Ctrl+C and Escape handling */
  readonly terminal: boolean;
  readonly colors?: Colors;
}

export async function runRepl(options: ReplOptions): Promise<void> {
  const { session, input, output, terminal, colors = pc } = options;
  const rl = createInterface({ input, output, terminal });

  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  rl.on("SIGINT", () => {
    rl.close();
  });

  const onKeypress = (_sequence: string | undefined, key: Key | undefined): void => {
    if (key?.name === "escape") {
      rl.close();
    }
  };
  if (terminal) {
    input.on("keypress", onKeypress);
  }

  const showPrompt = (): void => {
    const prompt = renderPrompt(session.state.path, colors);
    if (!terminal) {
      output.write(prompt);
      return;
    }
    if (!closed) {
      rl.setPrompt(prompt);
      rl.prompt();
    }
  };

  try {
    showPrompt();
    for await (const line of rl) {
      try {
        const state = await session.submit(line);
        output.write(renderResult(state, colors));
      } catch (error) {
        if (!isDbnavError(error)) throw error;
        output.write(renderError(error, colors));
      }
      showPrompt();
    }
  } finally {
    input.removeListener("keypress", onKeypress);
    if (!closed) rl.close();
    if (terminal) {
      output.write("\n");
    }
  }
}
