import { describe, expect, it } from "vitest";
import {
  BackendCallError,
  BackendTimeoutError,
  CollectionNotFoundError,
  CommandInFlightError,
  ConnectionFailedError,
  DatabaseNotFoundError,
  DbnavError,
  DocumentNotFoundError,
  InternalError,
  InvalidDocumentIdError,
  InvalidNamePatternError,
  InvalidPathDepthError,
  isDbnavError,
  NotFoundError,
  ShellConfigurationError,
  UnknownCommandError,
  ValidationError,
} from "../../index.js";

describe("DbnavError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(DbnavError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
  });

  it("should preserve stack traces", () => {
    const error = new InternalError("Stack test");
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain("InternalError");
  });
});

describe("navigation errors", () => {
  it("DatabaseNotFoundError formats the database name", () => {
    const error = new DatabaseNotFoundError("inventory");

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe("database 'inventory' does not exist");
    expect(error.code).toBe("NAV_DATABASE_NOT_FOUND");
    expect(error.domain).toBe("navigation");
    expect(error.isExpected).toBe(true);
    expect(error.database).toBe("inventory");
    expect(error.name).toBe("DatabaseNotFoundError");
  });

  it("CollectionNotFoundError names collection and database", () => {
    const error = new CollectionNotFoundError("orders", "shop");

    expect(error.message).toBe("collection 'orders' does not exist in database 'shop'");
    expect(error.collection).toBe("orders");
    expect(error.database).toBe("shop");
  });

  it("DocumentNotFoundError quotes the identifier", () => {
    const error = new DocumentNotFoundError("6512abf0c0ffee0000000001");

    expect(error.message).toBe("document with ID '6512abf0c0ffee0000000001' not found");
    expect(error._tag).toBe("NotFoundError");
  });

  it("InvalidDocumentIdError is a validation error", () => {
    const error = new InvalidDocumentIdError("not-an-id");

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe("invalid document ID: not-an-id");
    expect(error.issues).toEqual([]);
  });

  it("InvalidPathDepthError records the depth", () => {
    const error = new InvalidPathDepthError(4);

    expect(error.message).toBe("invalid path depth");
    expect(error.depth).toBe(4);
    expect(error.isExpected).toBe(false);
  });

  it("InvalidNamePatternError keeps the cause", () => {
    const cause = new SyntaxError("Unterminated group");
    const error = new InvalidNamePatternError("(abc", "Unterminated group", cause);

    expect(error.message).toBe("invalid name pattern '(abc': Unterminated group");
    expect(error.cause).toBe(cause);
  });
});

describe("shell errors", () => {
  it("UnknownCommandError names the verb", () => {
    const error = new UnknownCommandError("foo");

    expect(error.message).toBe("unknown command: foo");
    expect(error.verb).toBe("foo");
    expect(error.code).toBe("SHELL_UNKNOWN_COMMAND");
  });

  it("CommandInFlightError is a conflict", () => {
    const error = new CommandInFlightError("ls");

    expect(error._tag).toBe("ConflictError");
    expect(error.message).toBe("command already in progress");
    expect(error.pendingLine).toBe("ls");
  });
});

describe("backend errors", () => {
  it("BackendCallError prefixes the call context", () => {
    const cause = new Error("connection reset");
    const error = new BackendCallError("list databases", "connection reset", cause);

    expect(error.message).toBe("list databases: connection reset");
    expect(error.context).toBe("list databases");
    expect(error.cause).toBe(cause);
    expect(error._tag).toBe("ExternalError");
  });

  it("BackendTimeoutError reports the deadline", () => {
    const error = new BackendTimeoutError("list collections", 5000);

    expect(error.message).toBe("list collections: operation timed out after 5000ms");
    expect(error.timeoutMs).toBe(5000);
    expect(error._tag).toBe("TimeoutError");
  });

  it("ConnectionFailedError uses the connection code", () => {
    const error = new ConnectionFailedError("failed to connect to MongoDB", "ECONNREFUSED");

    expect(error.message).toBe("failed to connect to MongoDB: ECONNREFUSED");
    expect(error.code).toBe("BACKEND_CONNECTION_FAILED");
  });
});

describe("ShellConfigurationError", () => {
  it("joins issues into the message", () => {
    const error = new ShellConfigurationError([
      { field: "connectionString", message: "must start with mongodb://", code: "invalid_string" },
      { field: "listLimit", message: "too small", code: "too_small" },
    ]);

    expect(error.message).toBe(
      "Shell configuration invalid: connectionString: must start with mongodb://; listLimit: too small",
    );
    expect(error.issues).toHaveLength(2);
  });
});

describe("isDbnavError", () => {
  it("distinguishes dbnav errors from plain errors", () => {
    const dbnavError = new InternalError("x");
    const regularError = new Error("y");

    expect(isDbnavError(dbnavError)).toBe(true);
    expect(isDbnavError(regularError)).toBe(false);
    expect(isDbnavError("nope")).toBe(false);
  });
});
