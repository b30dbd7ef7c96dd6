/**
 * ShellSession: navigation state of one interactive session.
 *
 * Created at startup, mutated by one command at a time, dropped at quit.
 * `submit` runs the dispatcher and applies the resulting outcome; the UI
 * awaits it before reading the next line.
 */

import { CommandInFlightError } from "@dbnav/errors";
import type { CommandDispatcher } from "./dispatcher.js";
import { ROOT_PATH } from "./path.js";
import type { CommandOutcome, SessionState } from "./types.js";

const INITIAL_STATE: SessionState = { path: ROOT_PATH, output: "", error: undefined };

export class ShellSession {
  private current: SessionState = INITIAL_STATE;
  private inFlight = false;

  constructor(private readonly dispatcher: CommandDispatcher) {}

  get state(): SessionState {
    return this.current;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  /**
   * @throws CommandInFlightError when the previous command has not completed;
   *   state is left untouched
   */
  async submit(line: string): Promise<SessionState> {
    if (this.inFlight) {
      throw new CommandInFlightError(line);
    }
    this.inFlight = true;
    try {
      const outcome = await this.dispatcher.dispatch(line, this.current.path);
      this.apply(outcome);
      return this.current;
    } finally {
      this.inFlight = false;
    }
  }

  apply(outcome: CommandOutcome): void {
    const state = this.current;
    switch (outcome.kind) {
      case "noop":
        return;
      case "reset":
        this.current = INITIAL_STATE;
        return;
      case "navigated":
        this.current = { path: outcome.path, output: "", error: undefined };
        return;
      case "listed":
        this.current = { path: state.path, output: outcome.output, error: undefined };
        return;
      case "failed": {
        // Verb-level failures leave the previous output on screen; backend
        // and navigation failures replace it with nothing.
        const keepOutput = outcome.error.domain === "shell";
        this.current = {
          path: state.path,
          output: keepOutput ? state.output : "",
          error: outcome.error,
        };
        return;
      }
    }
  }
}
