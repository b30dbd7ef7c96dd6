import { describe, expect, it } from "vitest";
import {
  BackendCallError,
  BackendTimeoutError,
  CommandInFlightError,
  type DbnavError,
  DocumentNotFoundError,
  ERROR_CATALOG,
  InternalError,
  InvalidPathDepthError,
  ShellConfigurationError,
} from "../../index.js";

function describeError(error: DbnavError): string {
  switch (error._tag) {
    case "ValidationError":
      return "validation";
    case "NotFoundError":
      return "not_found";
    case "ConflictError":
      return "conflict";
    case "TimeoutError":
      return "timeout";
    case "ExternalError":
      return "external";
    case "InternalError":
      return "internal";
    default: {
      const unreachable: never = error._tag;
      throw new Error(`Exhaustive check failed: ${String(unreachable)}`);
    }
  }
}

describe("Exhaustive type checking with _tag discriminant (6 base types)", () => {
  it("routes every concrete error through its base _tag", () => {
    expect(describeError(new InvalidPathDepthError(4))).toBe("validation");
    expect(describeError(new ShellConfigurationError([]))).toBe("validation");
    expect(describeError(new DocumentNotFoundError("6512abf0c0ffee0000000001"))).toBe("not_found");
    expect(describeError(new CommandInFlightError("ls"))).toBe("conflict");
    expect(describeError(new BackendTimeoutError("list databases", 5000))).toBe("timeout");
    expect(describeError(new BackendCallError("list databases", "boom"))).toBe("external");
    expect(describeError(new InternalError("bug"))).toBe("internal");
  });

  it("keeps every catalog code in a known domain", () => {
    const domains = new Set(["internal", "shell", "navigation", "backend", "config"]);
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(domains.has(entry.domain)).toBe(true);
    }
  });
});
