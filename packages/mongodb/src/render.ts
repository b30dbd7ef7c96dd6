import type { Document } from "@dbnav/core";
import { BSON } from "mongodb";

/**
 * One-line relaxed Extended JSON: ObjectIds as `{"$oid": ...}`, dates as
 * `{"$date": ...}`, plain numbers as numbers.
 */
export function renderMongoDocument(document: Document): string {
  return BSON.EJSON.stringify(document, { relaxed: true });
}
