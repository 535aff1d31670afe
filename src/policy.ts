/**
 * Schema and table filters derived from a database's configuration.
 *
 * The evaluator only produces WHERE fragments and allow/deny sets; the
 * QueryTransformer applies them.
 */

import type { DatabaseConfig } from "./config.js";
import { type Dialect, escapeLiteral } from "./dialect.js";
import { TableAccessError } from "./errors.js";
import type { TableAccess } from "./transformer.js";

export type FilterMode = "include" | "exclude";

export interface NameFilter {
  mode: FilterMode;
  names: string[];
}

function literalList(names: readonly string[], dialect: Dialect): string {
  return names.map((name) => `'${escapeLiteral(name.toLowerCase(), dialect)}'`).join(", ");
}

/** An empty list configures no filter. */
function namesOf(list: string[] | undefined): string[] | undefined {
  return list && list.length > 0 ? list : undefined;
}

export function schemaFilterOf(db: DatabaseConfig): NameFilter | null {
  const include = namesOf(db.include_schemas);
  if (include) return { mode: "include", names: include };
  const exclude = namesOf(db.exclude_schemas);
  if (exclude) return { mode: "exclude", names: exclude };
  return null;
}

export function tableFilterOf(db: DatabaseConfig): NameFilter | null {
  const allowed = namesOf(db.allowed_tables);
  if (allowed) return { mode: "include", names: allowed };
  const disallowed = namesOf(db.disallowed_tables);
  if (disallowed) return { mode: "exclude", names: disallowed };
  return null;
}

/**
 * Schema restriction for catalog queries. An explicit schema wins over the
 * configured include/exclude lists.
 */
export function schemaConditions(
  db: DatabaseConfig,
  schema?: string,
  column = "schema_name"
): string[] {
  if (schema) {
    return [`LOWER(${column}) = LOWER('${escapeLiteral(schema, db.type)}')`];
  }
  const filter = schemaFilterOf(db);
  if (!filter) return [];
  const operator = filter.mode === "include" ? "IN" : "NOT IN";
  return [`LOWER(${column}) ${operator} (${literalList(filter.names, db.type)})`];
}

/**
 * Table restriction for search results. Objects that are not tables
 * (columns, views, procedures) pass through.
 */
export function tableConditions(
  db: DatabaseConfig,
  tableColumn: string,
  typeColumn = "object_type"
): string[] {
  const filter = tableFilterOf(db);
  if (!filter) return [];
  const operator = filter.mode === "include" ? "IN" : "NOT IN";
  return [
    `LOWER(${tableColumn}) ${operator} (${literalList(filter.names, db.type)}) OR ${typeColumn} != 'table'`,
  ];
}

export interface SearchColumns {
  schema: string;
  table: string;
  objectType: string;
}

/**
 * Result columns of the `search` catalog query that filters apply to.
 * Snowflake templates use upper-case identifiers; the SQLite template
 * filters on the catalog's own name column.
 */
export function searchColumns(dialect: Dialect): SearchColumns {
  switch (dialect) {
    case "snowflake":
      return { schema: "SCHEMA_NAME", table: "OBJECT_NAME", objectType: "OBJECT_TYPE" };
    case "sqlite":
      return { schema: "schema_name", table: "name", objectType: "object_type" };
    default:
      return { schema: "schema_name", table: "object_name", objectType: "object_type" };
  }
}

export function tableAccessOf(db: DatabaseConfig): TableAccess {
  return { allowed: namesOf(db.allowed_tables), disallowed: namesOf(db.disallowed_tables) };
}

export function assertTableAllowed(db: DatabaseConfig, table: string): void {
  const name = table.toLowerCase();
  const { allowed, disallowed } = tableAccessOf(db);
  if (allowed && !allowed.some((t) => t.toLowerCase() === name)) {
    throw new TableAccessError(name, `Table '${name}' is not in the allowed list`);
  }
  if (disallowed && disallowed.some((t) => t.toLowerCase() === name)) {
    throw new TableAccessError(name, `Table '${name}' is in the excluded list`);
  }
}
