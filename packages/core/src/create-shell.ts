import type { ShellConfig } from "./config.js";
import { CommandDispatcher } from "./dispatcher.js";
import { Lister } from "./lister.js";
import { PathResolver } from "./resolver.js";
import { ShellSession } from "./session.js";
import type { DataSource, DocumentRenderer } from "./types.js";

export interface CreateShellOptions {
  readonly config?: Partial<Pick<ShellConfig, "listLimit" | "resolveTimeoutMs" | "listTimeoutMs">>;
  readonly renderDocument?: DocumentRenderer;
}

/**
 * Wire resolver, lister and dispatcher over one data source into a fresh session.
 */
export function createShellSession(
  dataSource: DataSource,
  options: CreateShellOptions = {},
): ShellSession {
  const { config = {}, renderDocument } = options;
  const resolver = new PathResolver(dataSource, { timeoutMs: config.resolveTimeoutMs });
  const lister = new Lister(dataSource, {
    limit: config.listLimit,
    timeoutMs: config.listTimeoutMs,
    renderDocument,
  });
  return new ShellSession(new CommandDispatcher(resolver, lister));
}
