/**
 * Describe a table as one paginated collection: its columns first, then the
 * foreign keys that touch it (outgoing and incoming), with a few sample rows.
 */

import { type CatalogQueryName, catalogQuery, hasCatalogQuery } from "../catalog.js";
import type { DatabaseManager } from "../db.js";
import { type Dialect, qualifiedName } from "../dialect.js";
import { TableNotFoundError, errorMessage } from "../errors.js";
import { assertTableAllowed } from "../policy.js";
import { QueryTransformer } from "../transformer.js";
import { toCount, truncate } from "../utils.js";
import { executeQuery, resolvePaging } from "./executeQuery.js";

const SAMPLE_ROWS = 5;
const UNMAPPED = "(column mapping not available)";

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  default: unknown;
  primaryKey: boolean;
  enumValues: string | null;
}

export interface ForeignKey {
  fromTable: string;
  fromColumns: string[];
  toTable: string;
  toColumns: string[];
  constraintName: string;
}

export interface TableSummary {
  table: string;
  columns: ColumnInfo[];
  sampleColumns: string[];
  sampleRows: unknown[][];
  foreignKeys: ForeignKey[];
  incomingForeignKeys: ForeignKey[];
  totalCount: number;
  currentPage: number;
  totalPages: number;
}

export interface TableSummaryOptions {
  schema?: string;
  limit?: number;
  page?: number;
}

interface CatalogContext {
  manager: DatabaseManager;
  database: string;
  dialect: Dialect;
  params: Record<string, string>;
}

function text(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

/** Filled catalog template, parsed and held to a single read-only statement. */
function catalogStatement(ctx: CatalogContext, name: CatalogQueryName): QueryTransformer {
  return new QueryTransformer(catalogQuery(ctx.dialect, name, ctx.params), ctx.dialect).validateReadOnly();
}

async function runCatalog(ctx: CatalogContext, name: CatalogQueryName): Promise<unknown[][]> {
  const sql = catalogStatement(ctx, name).sql();
  return (await ctx.manager.execute(ctx.database, sql)).fetchAll();
}

async function fetchPage(
  ctx: CatalogContext,
  name: "columns" | "foreign_key",
  limit: number,
  offset: number
): Promise<unknown[][]> {
  const sql = catalogStatement(ctx, name).addPagination(limit, offset).sql();
  return (await ctx.manager.execute(ctx.database, sql)).fetchAll();
}

async function countOf(ctx: CatalogContext, name: "columns" | "foreign_key"): Promise<number> {
  const sql = catalogStatement(ctx, name).toCountQuery();
  return toCount((await ctx.manager.execute(ctx.database, sql)).scalar());
}

async function primaryKeysOf(ctx: CatalogContext): Promise<Set<string>> {
  if (!hasCatalogQuery(ctx.dialect, "primary_key")) return new Set();
  const rows = await runCatalog(ctx, "primary_key");
  return new Set(rows.map((row) => text(row[0])));
}

/**
 * Enum annotations are optional; any failure yields no annotations. Rows
 * carry one or more labels per column and are joined in row order.
 */
async function enumValuesOf(ctx: CatalogContext): Promise<Map<string, string>> {
  const values = new Map<string, string>();
  if (!hasCatalogQuery(ctx.dialect, "enum_values")) return values;
  try {
    for (const [column, labels] of await runCatalog(ctx, "enum_values")) {
      if (!column || !labels) continue;
      const name = text(column);
      const seen = values.get(name);
      values.set(name, seen ? `${seen}, ${text(labels)}` : text(labels));
    }
  } catch (error) {
    console.error(`[sqlgate] Enum lookup failed for ${ctx.database}: ${errorMessage(error)}`);
  }
  return values;
}

function toColumn(row: unknown[], primaryKeys: Set<string>, enums: Map<string, string>): ColumnInfo {
  const [name, type, isNullable, columnDefault] = row;
  const columnName = text(name);
  return {
    name: columnName,
    type: text(type),
    nullable: isNullable ? String(isNullable).toUpperCase() === "YES" : true,
    default: columnDefault ?? null,
    primaryKey: primaryKeys.has(columnName),
    enumValues: enums.get(columnName) ?? null,
  };
}

/**
 * Foreign key rows carry one column pair each; multi-column constraints are
 * regrouped by constraint name in first-seen order.
 */
export function groupForeignKeys(rows: unknown[][]): ForeignKey[] {
  const groups = new Map<string, ForeignKey>();
  for (const row of rows) {
    const [sourceSchema, sourceTable, sourceColumn, destSchema, destTable, destColumn, constraint] =
      row;
    const key = text(constraint);
    let fk = groups.get(key);
    if (!fk) {
      fk = {
        fromTable: sourceSchema ? `${text(sourceSchema)}.${text(sourceTable)}` : text(sourceTable),
        fromColumns: [],
        toTable: destSchema ? `${text(destSchema)}.${text(destTable)}` : text(destTable),
        toColumns: [],
        constraintName: key,
      };
      groups.set(key, fk);
    }
    if (sourceColumn) fk.fromColumns.push(text(sourceColumn));
    if (destColumn) fk.toColumns.push(text(destColumn));
  }

  return [...groups.values()].map((fk) => ({
    ...fk,
    fromColumns: fk.fromColumns.length > 0 ? fk.fromColumns : [UNMAPPED],
    toColumns: fk.toColumns.length > 0 ? fk.toColumns : [UNMAPPED],
  }));
}

export async function tableSummary(
  manager: DatabaseManager,
  database: string,
  table: string,
  options: TableSummaryOptions = {}
): Promise<TableSummary> {
  const page = options.page ?? 1;
  const limit = resolvePaging(options.limit ?? 250, page, manager.settings.max_rows_per_query);
  const db = manager.getDatabase(database);
  assertTableAllowed(db, table);

  const schema = options.schema || manager.defaultSchemaOf(database) || "";
  const ctx: CatalogContext = {
    manager,
    database,
    dialect: db.type,
    params: { table_name: table, schema_name: schema },
  };

  const [existing] = await runCatalog(ctx, "table_exists");
  if (!existing) {
    throw new TableNotFoundError(table, database);
  }
  // the catalog's spelling, since the sample query quotes the name
  const storedName = text(existing[0]) || table;

  const columnCount = await countOf(ctx, "columns");
  const fkCount = await countOf(ctx, "foreign_key");
  const totalCount = columnCount + fkCount;
  const totalPages = Math.max(1, Math.ceil(totalCount / limit));

  const primaryKeys = await primaryKeysOf(ctx);
  const enums = await enumValuesOf(ctx);

  const sample = await executeQuery(
    manager,
    database,
    `SELECT * FROM ${qualifiedName(ctx.dialect, schema || undefined, storedName)}`,
    { limit: SAMPLE_ROWS, page: 1 }
  );

  let remaining = limit;
  let offset = (page - 1) * limit;
  let columns: ColumnInfo[] = [];
  const outgoing: ForeignKey[] = [];
  const incoming: ForeignKey[] = [];

  if (offset < columnCount && remaining > 0) {
    const rows = await fetchPage(ctx, "columns", Math.min(remaining, columnCount - offset), offset);
    columns = rows.map((row) => toColumn(row, primaryKeys, enums));
    remaining -= columns.length;
    offset = 0;
  } else {
    offset -= columnCount;
  }

  if (offset < fkCount && remaining > 0) {
    const rows = await fetchPage(ctx, "foreign_key", Math.min(remaining, fkCount - offset), offset);
    for (const fk of groupForeignKeys(rows)) {
      const source = fk.fromTable.split(".").pop() ?? fk.fromTable;
      (source.toLowerCase() === table.toLowerCase() ? outgoing : incoming).push(fk);
    }
  }

  return {
    table: schema ? `${schema}.${table}` : table,
    columns,
    sampleColumns: sample.columns,
    sampleRows: sample.rows.map((row) => sample.columns.map((column) => row[column])),
    foreignKeys: outgoing,
    incomingForeignKeys: incoming,
    totalCount,
    currentPage: page,
    totalPages,
  };
}

function sampleCell(value: unknown): string {
  if (value === null || value === undefined) return "NULL";
  return truncate(String(value), 53);
}

export function formatTableSummary(summary: TableSummary): string {
  const lines = [`Table "${summary.table}"`];

  if (summary.columns.length > 0) {
    lines.push("", "COLUMNS:");
    for (const col of summary.columns) {
      const parts = [col.type];
      if (col.primaryKey) parts.push("PRIMARY KEY");
      parts.push(col.nullable ? "nullable" : "not null");
      if (col.default !== null && col.default !== undefined) parts.push(`default: ${String(col.default)}`);
      if (col.enumValues) parts.push(`values: ${col.enumValues}`);
      lines.push(`  ${col.name}: ${parts.join(", ")}`);
    }
  }

  if (summary.sampleRows.length > 0) {
    const header = summary.sampleColumns.join(" | ");
    lines.push("", "SAMPLE ROWS:", `  ${header}`, `  ${"-".repeat(header.length)}`);
    for (const row of summary.sampleRows) {
      lines.push(`  ${row.map(sampleCell).join(" | ")}`);
    }
  }

  if (summary.foreignKeys.length > 0) {
    lines.push("", "FOREIGN KEY CONSTRAINTS:");
    for (const fk of summary.foreignKeys) {
      lines.push(`  ${fk.fromColumns.join(", ")} → ${fk.toTable}(${fk.toColumns.join(", ")})`);
    }
  }

  if (summary.incomingForeignKeys.length > 0) {
    lines.push("", "REFERENCED BY:");
    for (const fk of summary.incomingForeignKeys) {
      lines.push(`  ${fk.fromTable}.${fk.fromColumns.join(", ")} → ${fk.toColumns.join(", ")}`);
    }
  }

  lines.push(
    "",
    `Page ${summary.currentPage} of ${summary.totalPages} (Total: ${summary.totalCount} items)`
  );
  return lines.join("\n");
}
