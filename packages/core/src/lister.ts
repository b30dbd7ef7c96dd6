/**
 * Lister: `ls` at the current path. Behavior is chosen by path depth alone:
 *
 *   0 → database names
 *   1 → collection names of the current database
 *   2 → documents of the current collection (server order, unfiltered)
 *   3 → the single document named by the last segment
 *
 * Truncation differs by kind. Name listings are capped locally, so
 * `truncated` means more names remained. Document listings send the cap to
 * the server and report `truncated` whenever the cap is reached; "exactly
 * `limit` documents" and "more than `limit`" look the same and both are
 * reported as truncated.
 */

import { DocumentNotFoundError, InvalidDocumentIdError, InvalidPathDepthError } from "@dbnav/errors";
import { isDocumentId } from "./document-id.js";
import { isWellFormedPath } from "./path.js";
import { renderDocumentJson } from "./render.js";
import {
  type DataSource,
  DEFAULT_LIST_LIMIT,
  DEFAULT_LIST_TIMEOUT_MS,
  type DocumentRenderer,
  type ListingResult,
  type ListOptions,
  type NavigationPath,
  TRUNCATION_MARKER,
} from "./types.js";
import { withDeadline } from "./with-deadline.js";

export interface ListerOptions {
  /** Entries shown when `showAll` is off (default 5) */
  readonly limit?: number;
  /** Deadline for each backend call (default 5_000) */
  readonly timeoutMs?: number;
  /** Single-line document rendering (default compact JSON) */
  readonly renderDocument?: DocumentRenderer;
}

export class Lister {
  private readonly limit: number;
  private readonly timeoutMs: number;
  private readonly renderDocument: DocumentRenderer;

  constructor(
    private readonly dataSource: DataSource,
    options: ListerOptions = {},
  ) {
    this.limit = options.limit ?? DEFAULT_LIST_LIMIT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LIST_TIMEOUT_MS;
    this.renderDocument = options.renderDocument ?? renderDocumentJson;
  }

  async list(path: NavigationPath, options: ListOptions): Promise<ListingResult> {
    const limit = options.showAll ? undefined : this.limit;

    if (!isWellFormedPath(path)) {
      throw new InvalidPathDepthError(path.length);
    }
    const [database, collection, documentId] = path;

    if (database === undefined) {
      const names = await withDeadline("list databases", this.timeoutMs, (callOptions) =>
        this.dataSource.listDatabaseNames(callOptions),
      );
      return capNames(names, limit);
    }

    if (collection === undefined) {
      const names = await withDeadline(
        `list collections of '${database}'`,
        this.timeoutMs,
        (callOptions) => this.dataSource.listCollectionNames(database, callOptions),
      );
      return capNames(names, limit);
    }

    if (documentId === undefined) {
      const documents = await withDeadline(
        `find documents in '${database}.${collection}'`,
        this.timeoutMs,
        (callOptions) => this.dataSource.findDocuments(database, collection, limit, callOptions),
      );
      return {
        kind: "documents",
        entries: documents.map((document) => this.renderDocument(document)),
        truncated: limit !== undefined && documents.length >= limit,
      };
    }

    if (!isDocumentId(documentId)) {
      throw new InvalidDocumentIdError(documentId);
    }
    const document = await withDeadline(
      `find document '${documentId}' in '${database}.${collection}'`,
      this.timeoutMs,
      (callOptions) =>
        this.dataSource.findDocumentById(database, collection, documentId, callOptions),
    );
    if (document === null) {
      throw new DocumentNotFoundError(documentId);
    }
    return { kind: "documents", entries: [this.renderDocument(document)], truncated: false };
  }
}

function capNames(names: readonly string[], limit: number | undefined): ListingResult {
  if (limit === undefined || names.length <= limit) {
    return { kind: "names", entries: names, truncated: false };
  }
  return { kind: "names", entries: names.slice(0, limit), truncated: true };
}

/**
 * One line per entry, then the truncation marker when the listing was capped.
 */
export function renderListing(result: ListingResult): string {
  const lines = result.entries.map((entry) => `${entry}\n`).join("");
  return result.truncated ? `${lines}${TRUNCATION_MARKER}` : lines;
}
