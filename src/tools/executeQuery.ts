import type { DatabaseManager } from "../db.js";
import { InvalidPaginationError } from "../errors.js";
import { tableAccessOf } from "../policy.js";
import { QueryTransformer } from "../transformer.js";
import { formatValue, toCount } from "../utils.js";

export interface QueryPage {
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
  currentPage: number;
  totalPages: number;
  truncated: boolean;
  /** Exact total, only when an accurate count was requested. */
  totalRows: number | null;
}

export interface ExecuteQueryOptions {
  limit?: number;
  page?: number;
  accurateCount?: boolean;
}

/**
 * Validate a requested page window and clamp the limit to the configured
 * maximum rows per query.
 */
export function resolvePaging(limit: number, page: number, maxRows: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidPaginationError("Limit must be greater than 0");
  }
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidPaginationError("Page number must be greater than 0");
  }
  return Math.min(limit, maxRows);
}

export async function executeQuery(
  manager: DatabaseManager,
  database: string,
  query: string,
  options: ExecuteQueryOptions = {}
): Promise<QueryPage> {
  const page = options.page ?? 1;
  const limit = resolvePaging(options.limit ?? 100, page, manager.settings.max_rows_per_query);
  const db = manager.getDatabase(database);

  const transformer = new QueryTransformer(query.trim(), db.type)
    .validateReadOnly()
    .validateTableAccess(tableAccessOf(db));

  let totalRows: number | null = null;
  if (options.accurateCount) {
    const counted = await manager.execute(database, transformer.toCountQuery());
    totalRows = toCount(counted.scalar());
  }

  const offset = (page - 1) * limit;
  const result = await manager.execute(database, transformer.addPagination(limit, offset).sql());
  const rowCount = result.rowCount;

  return {
    columns: result.columns,
    rows: result.records(),
    rowCount,
    currentPage: page,
    totalPages: totalRows === null ? page : Math.max(1, Math.ceil(totalRows / limit)),
    truncated: totalRows === null ? rowCount === limit : page * limit < totalRows,
    totalRows,
  };
}

export function formatQueryPage(page: QueryPage): string {
  if (page.rows.length === 0) return "Query returned 0 rows";

  const widths = page.columns.map((column) =>
    Math.max(column.length, ...page.rows.map((row) => formatValue(row[column]).length))
  );
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join("  ");

  const lines = [line(page.columns)];
  for (const row of page.rows) {
    lines.push(line(page.columns.map((column) => formatValue(row[column]))));
  }

  let footer: string;
  if (page.totalRows !== null) {
    footer = `Page ${page.currentPage} of ${page.totalPages} (showing ${page.rowCount} of ${page.totalRows} rows)`;
  } else if (page.truncated) {
    footer = `Page ${page.currentPage} (showing ${page.rowCount} rows, more may exist)`;
  } else {
    footer = `Page ${page.currentPage} of ${page.totalPages} (showing ${page.rowCount} rows)`;
  }
  return `${lines.join("\n")}\n\n${footer}`;
}
