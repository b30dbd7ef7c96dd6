/**
 * Navigation errors: `cd` validation and `ls` depth handling
 *
 * Concrete:
 *   - DatabaseNotFoundError    (NAV_DATABASE_NOT_FOUND)
 *   - CollectionNotFoundError  (NAV_COLLECTION_NOT_FOUND)
 *   - DocumentNotFoundError    (NAV_DOCUMENT_NOT_FOUND)
 *   - InvalidDocumentIdError   (NAV_INVALID_DOCUMENT_ID)
 *   - InvalidPathDepthError    (NAV_INVALID_PATH_DEPTH)
 *   - InvalidNamePatternError  (NAV_INVALID_PATTERN)
 */

import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

export class DatabaseNotFoundError extends NotFoundError<"NAV_DATABASE_NOT_FOUND"> {
  readonly database: string;

  constructor(database: string) {
    super({
      code: "NAV_DATABASE_NOT_FOUND",
      message: `database '${database}' does not exist`,
    });
    this.database = database;
  }
}

export class CollectionNotFoundError extends NotFoundError<"NAV_COLLECTION_NOT_FOUND"> {
  readonly database: string;
  readonly collection: string;

  constructor(collection: string, database: string) {
    super({
      code: "NAV_COLLECTION_NOT_FOUND",
      message: `collection '${collection}' does not exist in database '${database}'`,
    });
    this.database = database;
    this.collection = collection;
  }
}

export class DocumentNotFoundError extends NotFoundError<"NAV_DOCUMENT_NOT_FOUND"> {
  readonly documentId: string;

  constructor(documentId: string) {
    super({
      code: "NAV_DOCUMENT_NOT_FOUND",
      message: `document with ID '${documentId}' not found`,
    });
    this.documentId = documentId;
  }
}

export class InvalidDocumentIdError extends ValidationError<"NAV_INVALID_DOCUMENT_ID"> {
  readonly value: string;

  constructor(value: string) {
    super({
      code: "NAV_INVALID_DOCUMENT_ID",
      message: `invalid document ID: ${value}`,
    });
    this.value = value;
  }
}

export class InvalidPathDepthError extends ValidationError<"NAV_INVALID_PATH_DEPTH"> {
  readonly depth: number;

  constructor(depth: number) {
    super({
      code: "NAV_INVALID_PATH_DEPTH",
      message: "invalid path depth",
    });
    this.depth = depth;
  }
}

export class InvalidNamePatternError extends ValidationError<"NAV_INVALID_PATTERN"> {
  readonly pattern: string;

  constructor(pattern: string, reason: string, cause?: Error) {
    super({
      code: "NAV_INVALID_PATTERN",
      message: `invalid name pattern '${pattern}': ${reason}`,
      cause,
    });
    this.pattern = pattern;
  }
}
