/**
 * Gateway failure taxonomy
 *
 * Every error raised by the gateway carries a machine-readable `type` and a
 * suggestion the caller can act on. Tool handlers render these as
 * `Error: <message>` results.
 */

export type FailureType =
  | "invalid_sql"
  | "read_only_violation"
  | "invalid_pagination"
  | "table_access"
  | "table_not_found"
  | "unsupported_dialect"
  | "configuration"
  | QueryFailureType;

export type QueryFailureType =
  | "query_error"
  | "timeout"
  | "connection_failed"
  | "circuit_open";

export class GatewayError extends Error {
  readonly type: FailureType;
  readonly suggestion: string;

  constructor(type: FailureType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayError";
    this.type = type;
    this.suggestion = GatewayError.getSuggestion(type);
  }

  static getSuggestion(type: FailureType): string {
    switch (type) {
      case "invalid_sql":
        return "Check SQL syntax for the database dialect.";
      case "read_only_violation":
        return "Only SELECT statements are accepted.";
      case "invalid_pagination":
        return "Use a positive limit and page number.";
      case "table_access":
        return "Query only tables permitted for this database.";
      case "table_not_found":
        return "Check the table and schema names with the search tool.";
      case "unsupported_dialect":
        return "This operation is not available for the database type.";
      case "configuration":
        return "Fix the configuration file and reload.";
      case "timeout":
        return "Consider limiting scope or increasing query_timeout_ms.";
      case "connection_failed":
        return "Check network connectivity and database availability.";
      case "circuit_open":
        return "Database marked unhealthy. Automatic retry pending.";
      case "query_error":
        return "Check SQL syntax and referenced objects.";
    }
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      suggestion: this.suggestion,
    };
  }
}

export class InvalidSqlError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid_sql", message, options);
    this.name = "InvalidSqlError";
  }
}

export class ReadOnlyViolationError extends GatewayError {
  constructor(message = "Query contains non-SELECT operations") {
    super("read_only_violation", message);
    this.name = "ReadOnlyViolationError";
  }
}

export class InvalidPaginationError extends GatewayError {
  constructor(message: string) {
    super("invalid_pagination", message);
    this.name = "InvalidPaginationError";
  }
}

export class TableAccessError extends GatewayError {
  readonly table: string;

  constructor(table: string, message: string) {
    super("table_access", message);
    this.name = "TableAccessError";
    this.table = table;
  }
}

export class TableNotFoundError extends GatewayError {
  constructor(table: string, database: string) {
    super("table_not_found", `Table '${table}' not found in database '${database}'`);
    this.name = "TableNotFoundError";
  }
}

export class UnsupportedDialectError extends GatewayError {
  constructor(dialect: string, operation: string) {
    super("unsupported_dialect", `No ${operation} query available for database type '${dialect}'`);
    this.name = "UnsupportedDialectError";
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

export class QueryError extends GatewayError {
  readonly database: string;
  readonly duration_ms: number;
  readonly retryable: boolean;

  constructor(
    type: QueryFailureType,
    database: string,
    message: string,
    duration_ms: number,
    options?: { cause?: unknown }
  ) {
    super(type, message, options);
    this.name = "QueryError";
    this.database = database;
    this.duration_ms = duration_ms;
    this.retryable = type !== "query_error";
  }

  override toJSON() {
    return {
      ...super.toJSON(),
      database: this.database,
      duration_ms: this.duration_ms,
      retryable: this.retryable,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
