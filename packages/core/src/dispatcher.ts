/**
 * Command dispatcher: input line → verb + args → resolver or lister.
 */

import { UnknownCommandError, isDbnavError, wrapError } from "@dbnav/errors";
import { type Lister, renderListing } from "./lister.js";
import { logWarn } from "./log.js";
import type { PathResolver } from "./resolver.js";
import type { CommandOutcome, CommandRequest, NavigationPath } from "./types.js";

/** `ls` argument that lifts the listing limit */
export const SHOW_ALL_FLAG = "-la";

/**
 * Split on whitespace. No quoting and no escaping: every token is literal.
 */
export function tokenizeCommand(line: string): string[] {
  return line.trim().split(/\s+/).filter((token) => token.length > 0);
}

/**
 * @returns The request, or undefined for a blank line
 */
export function parseCommand(line: string): CommandRequest | undefined {
  const [verb, ...args] = tokenizeCommand(line);
  if (verb === undefined) return undefined;
  return { verb, args };
}

export class CommandDispatcher {
  constructor(
    private readonly resolver: PathResolver,
    private readonly lister: Lister,
  ) {}

  /**
   * Run one input line against `currentPath`. Never rejects: every failure
   * is delivered as a `failed` outcome.
   */
  async dispatch(line: string, currentPath: NavigationPath): Promise<CommandOutcome> {
    const request = parseCommand(line);
    if (request === undefined) {
      return { kind: "noop" };
    }

    try {
      switch (request.verb) {
        case "cd":
          return await this.cd(request.args, currentPath);
        case "ls":
          return await this.ls(request.args, currentPath);
        default:
          return { kind: "failed", error: new UnknownCommandError(request.verb) };
      }
    } catch (error) {
      if (!isDbnavError(error)) {
        logWarn("dispatcher", `Unexpected failure running '${request.verb}': ${String(error)}`);
      }
      return { kind: "failed", error: wrapError(error) };
    }
  }

  private async cd(args: readonly string[], currentPath: NavigationPath): Promise<CommandOutcome> {
    const [target] = args;
    if (target === undefined) {
      return { kind: "reset" };
    }
    const path = await this.resolver.resolve(currentPath, target);
    return { kind: "navigated", path };
  }

  private async ls(args: readonly string[], currentPath: NavigationPath): Promise<CommandOutcome> {
    const result = await this.lister.list(currentPath, { showAll: args[0] === SHOW_ALL_FLAG });
    return { kind: "listed", output: renderListing(result) };
  }
}
