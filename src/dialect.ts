/**
 * Dialect mapping between configured database types and the SQL parser.
 */

export const SUPPORTED_DIALECTS = ["postgresql", "mysql", "sqlite", "mssql", "snowflake"] as const;

export type Dialect = (typeof SUPPORTED_DIALECTS)[number];

const ALIASES: Record<string, Dialect> = {
  postgres: "postgresql",
  postgresql: "postgresql",
  pg: "postgresql",
  mysql: "mysql",
  mariadb: "mysql",
  sqlite: "sqlite",
  sqlite3: "sqlite",
  mssql: "mssql",
  sqlserver: "mssql",
  tsql: "mssql",
  snowflake: "snowflake",
};

// node-sql-parser database option per dialect
const PARSER_DATABASES: Record<Dialect, string> = {
  postgresql: "PostgresQL",
  mysql: "MySQL",
  sqlite: "Sqlite",
  mssql: "TransactSQL",
  snowflake: "Snowflake",
};

export function isSupportedDialect(name: string): name is Dialect {
  return SUPPORTED_DIALECTS.some((dialect) => dialect === name);
}

/**
 * Normalize a database type to a known dialect. Unknown names are returned
 * lower-cased so they can still be passed through to the parser.
 */
export function normalizeDialect(name: string): Dialect | string {
  const key = name.trim().toLowerCase();
  return ALIASES[key] ?? key;
}

/**
 * Parser database option for a dialect name. Unknown names pass through
 * unchanged and are left for the parser to accept or reject.
 */
export function parserDatabase(name: string): string {
  const dialect = normalizeDialect(name);
  return isSupportedDialect(dialect) ? PARSER_DATABASES[dialect] : name;
}

export function quoteIdentifier(dialect: Dialect, identifier: string): string {
  switch (dialect) {
    case "mysql":
    case "sqlite":
      return "`" + identifier.replace(/`/g, "``") + "`";
    case "mssql":
      return "[" + identifier.replace(/]/g, "]]") + "]";
    case "postgresql":
    case "snowflake":
      return `"${identifier.replace(/"/g, '""')}"`;
  }
}

export function qualifiedName(dialect: Dialect, schema: string | undefined, table: string): string {
  const quotedTable = quoteIdentifier(dialect, table);
  return schema ? `${quoteIdentifier(dialect, schema)}.${quotedTable}` : quotedTable;
}

/**
 * Default schema of a dialect when the database config names none.
 * MySQL and Snowflake use the configured database name.
 */
export function defaultSchema(dialect: Dialect, database?: string): string | undefined {
  switch (dialect) {
    case "postgresql":
      return "public";
    case "mssql":
      return "dbo";
    case "sqlite":
      return "main";
    case "mysql":
      return database;
    case "snowflake":
      return database ? "PUBLIC" : undefined;
  }
}

/**
 * Escape a value for use inside a single-quoted SQL string literal. MySQL
 * reads backslashes as escapes inside literals, so both characters are
 * backslash-escaped there.
 */
export function escapeLiteral(value: string, dialect?: Dialect): string {
  if (dialect === "mysql") {
    return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  }
  return value.replace(/'/g, "''");
}
