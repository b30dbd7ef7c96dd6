import type { Document } from "./types.js";

/**
 * Fallback renderer: compact JSON, with bigints written as strings.
 * Backend packages provide a richer renderer (see `@dbnav/mongodb`).
 */
export function renderDocumentJson(document: Document): string {
  return JSON.stringify(document, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
}
