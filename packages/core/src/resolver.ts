/**
 * PathResolver: turns a `cd` target into a validated NavigationPath.
 */

import {
  CollectionNotFoundError,
  DatabaseNotFoundError,
  InvalidPathDepthError,
} from "@dbnav/errors";
import { compileNamePattern, findMatchingName } from "./name-match.js";
import { isWellFormedPath, resolveCandidatePath } from "./path.js";
import { type DataSource, DEFAULT_RESOLVE_TIMEOUT_MS, type NavigationPath } from "./types.js";
import { withDeadline } from "./with-deadline.js";

export interface PathResolverOptions {
  /** Deadline for each backend call (default 5_000) */
  readonly timeoutMs?: number;
}

export class PathResolver {
  private readonly timeoutMs: number;

  constructor(
    private readonly dataSource: DataSource,
    options: PathResolverOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RESOLVE_TIMEOUT_MS;
  }

  /**
   * Resolve `target` relative to `current` and validate the result against
   * the server. The database and collection segments must each match a
   * server-reported name (anchored pattern, first match wins); the document
   * segment is not checked here.
   *
   * @returns The candidate path, with its segments as typed
   * @throws DatabaseNotFoundError | CollectionNotFoundError | InvalidNamePatternError
   * @throws InvalidPathDepthError when the target goes below the document level
   * @throws BackendCallError | BackendTimeoutError
   */
  async resolve(current: NavigationPath, target: string): Promise<NavigationPath> {
    const candidate = resolveCandidatePath(current, target);
    if (!isWellFormedPath(candidate)) {
      throw new InvalidPathDepthError(candidate.length);
    }

    const [database, collection] = candidate;
    const databasePattern = database === undefined ? undefined : compileNamePattern(database);
    const collectionPattern =
      collection === undefined ? undefined : compileNamePattern(collection);

    if (database !== undefined && databasePattern !== undefined) {
      const databases = await withDeadline("list databases", this.timeoutMs, (options) =>
        this.dataSource.listDatabaseNames(options),
      );
      if (findMatchingName(databases, databasePattern) === undefined) {
        throw new DatabaseNotFoundError(database);
      }
    }

    if (database !== undefined && collection !== undefined && collectionPattern !== undefined) {
      const collections = await withDeadline(
        `list collections of '${database}'`,
        this.timeoutMs,
        (options) => this.dataSource.listCollectionNames(database, options),
      );
      if (findMatchingName(collections, collectionPattern) === undefined) {
        throw new CollectionNotFoundError(collection, database);
      }
    }

    return candidate;
  }
}
