/**
 * @dbnav/core: path resolution and listing engine
 *
 * Public API surface.
 */

export const PACKAGE_NAME = "@dbnav/core" as const;

// Configuration
export {
  CONNECTION_STRING_ENV,
  resolveShellConfig,
  type ShellConfig,
  ShellConfigSchema,
  type ShellConfigSources,
} from "./config.js";
export { type CreateShellOptions, createShellSession } from "./create-shell.js";
// Dispatcher
export { CommandDispatcher, parseCommand, SHOW_ALL_FLAG, tokenizeCommand } from "./dispatcher.js";
export { isDocumentId } from "./document-id.js";
// Lister
export { Lister, type ListerOptions, renderListing } from "./lister.js";
export { logWarn } from "./log.js";
export { compileNamePattern, findMatchingName } from "./name-match.js";
// Paths
export {
  formatPath,
  isWellFormedPath,
  pathDepth,
  ROOT_PATH,
  resolveCandidatePath,
} from "./path.js";
export { renderDocumentJson } from "./render.js";
// Resolver
export { PathResolver, type PathResolverOptions } from "./resolver.js";
// Session
export { ShellSession } from "./session.js";
// Types
export type {
  CommandOutcome,
  CommandRequest,
  DataSource,
  DataSourceCallOptions,
  Document,
  DocumentRenderer,
  ListingResult,
  ListOptions,
  NavigationPath,
  SessionState,
} from "./types.js";
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_CONNECTION_STRING,
  DEFAULT_LIST_LIMIT,
  DEFAULT_LIST_TIMEOUT_MS,
  DEFAULT_RESOLVE_TIMEOUT_MS,
  MAX_PATH_DEPTH,
  TRUNCATION_MARKER,
} from "./types.js";
export { withDeadline } from "./with-deadline.js";
