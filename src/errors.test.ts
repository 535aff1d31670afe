import { describe, it, expect } from "vitest";
import {
  GatewayError,
  QueryError,
  ReadOnlyViolationError,
  TableAccessError,
  errorMessage,
} from "./errors.js";

describe("GatewayError", () => {
  it("carries a type and suggestion", () => {
    const error = new ReadOnlyViolationError();
    expect(error).toBeInstanceOf(GatewayError);
    expect(error.toJSON()).toEqual({
      type: "read_only_violation",
      message: "Query contains non-SELECT operations",
      suggestion: "Only SELECT statements are accepted.",
    });
  });

  it("keeps the offending table", () => {
    const error = new TableAccessError("secrets", "Table 'secrets' is in the excluded list");
    expect(error.table).toBe("secrets");
    expect(error.type).toBe("table_access");
  });
});

describe("QueryError", () => {
  it("marks database trouble as retryable", () => {
    const cause = new Error("socket hang up");
    const error = new QueryError("connection_failed", "shop", "socket hang up", 12, { cause });
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      type: "connection_failed",
      message: "socket hang up",
      suggestion: "Check network connectivity and database availability.",
      database: "shop",
      duration_ms: 12,
      retryable: true,
    });
  });

  it("does not retry SQL errors", () => {
    expect(new QueryError("query_error", "shop", "syntax error", 1).retryable).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
