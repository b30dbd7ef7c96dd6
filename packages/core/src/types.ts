/**
 * Core types for the navigation shell.
 */

import type { DbnavError } from "@dbnav/errors";

/**
 * Ordered `[database, collection, documentId]` prefix, 0–3 segments long.
 * Replaced wholesale on every successful `cd`.
 */
export type NavigationPath = readonly string[];

/**
 * A document as returned by the backend. Values are driver-specific
 * (ObjectId, Date, Decimal128, ...); rendering is left to a DocumentRenderer.
 */
export type Document = Readonly<Record<string, unknown>>;

/** Renders one document as a single human-readable line. */
export type DocumentRenderer = (document: Document) => string;

/**
 * Per-call options. `timeoutMs` is forwarded to the server so the call
 * is bounded there too. `signal` aborts when the caller's deadline passes;
 * a data source releases any cursor it holds for the call at that point.
 */
export interface DataSourceCallOptions {
  readonly timeoutMs: number;
  readonly signal: AbortSignal;
}

/**
 * Read-only query surface of the database server.
 */
export interface DataSource {
  listDatabaseNames(options: DataSourceCallOptions): Promise<readonly string[]>;
  listCollectionNames(
    database: string,
    options: DataSourceCallOptions,
  ): Promise<readonly string[]>;
  /** `limit` undefined means no cap. */
  findDocuments(
    database: string,
    collection: string,
    limit: number | undefined,
    options: DataSourceCallOptions,
  ): Promise<readonly Document[]>;
  /** Resolves `null` when no document has the identifier. */
  findDocumentById(
    database: string,
    collection: string,
    id: string,
    options: DataSourceCallOptions,
  ): Promise<Document | null>;
}

/**
 * Result of one `ls`. Name listings come from depth 0 and 1, document
 * listings from depth 2 and 3.
 */
export interface ListingResult {
  readonly kind: "names" | "documents";
  readonly entries: readonly string[];
  readonly truncated: boolean;
}

export interface ListOptions {
  readonly showAll: boolean;
}

/**
 * One parsed input line.
 */
export interface CommandRequest {
  readonly verb: string;
  readonly args: readonly string[];
}

/**
 * Message delivered back to the session once a command's backend work
 * is done.
 */
export type CommandOutcome =
  | { readonly kind: "noop" }
  | { readonly kind: "reset" }
  | { readonly kind: "navigated"; readonly path: NavigationPath }
  | { readonly kind: "listed"; readonly output: string }
  | { readonly kind: "failed"; readonly error: DbnavError };

export interface SessionState {
  readonly path: NavigationPath;
  readonly output: string;
  readonly error: DbnavError | undefined;
}

/** Default number of entries shown by a bare `ls` */
export const DEFAULT_LIST_LIMIT = 5;

/** Default deadline for the backend calls made by `cd` */
export const DEFAULT_RESOLVE_TIMEOUT_MS = 5_000;

/** Default deadline for the backend calls made by `ls` */
export const DEFAULT_LIST_TIMEOUT_MS = 5_000;

/** Default deadline for connecting and pinging the server at startup */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Server used when no connection string is given */
export const DEFAULT_CONNECTION_STRING = "mongodb://localhost:27017";

/** Line appended to a listing capped below the full result set */
export const TRUNCATION_MARKER = "... (results truncated)\n";

/** Maximum number of segments in a NavigationPath */
export const MAX_PATH_DEPTH = 3;
