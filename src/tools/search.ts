import { catalogQuery } from "../catalog.js";
import type { DatabaseManager } from "../db.js";
import { schemaConditions, searchColumns, tableConditions } from "../policy.js";
import { QueryTransformer } from "../transformer.js";

const SEARCH_LIMIT = 250;

export interface SearchResult {
  objectType: string;
  schemaName: string;
  descriptor: string;
  dataType: string | null;
}

export interface SearchOptions {
  schema?: string;
}

/**
 * Find tables and columns whose names match a term, restricted by the
 * database's schema and table filters.
 */
export async function search(
  manager: DatabaseManager,
  database: string,
  term: string,
  options: SearchOptions = {}
): Promise<SearchResult[]> {
  const db = manager.getDatabase(database);
  const columns = searchColumns(db.type);
  const limit = Math.min(SEARCH_LIMIT, manager.settings.max_rows_per_query);

  const transformer = new QueryTransformer(
    catalogQuery(db.type, "search", { search_term: term }),
    db.type
  );
  const conditions = [
    ...schemaConditions(db, options.schema, columns.schema),
    ...tableConditions(db, columns.table, columns.objectType),
  ];
  for (const condition of conditions) {
    transformer.addWhereCondition(condition);
  }

  const sql = transformer.addPagination(limit).validateReadOnly().sql();
  const result = await manager.execute(database, sql);

  return result.fetchAll().map(([objectType, schemaName, descriptor, dataType]) => ({
    objectType: String(objectType ?? ""),
    schemaName: String(schemaName ?? ""),
    descriptor: String(descriptor ?? ""),
    dataType: dataType === null || dataType === undefined ? null : String(dataType),
  }));
}

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) return "No results found";

  return results
    .map((r) => {
      if (r.objectType === "table") return `table: ${r.descriptor}`;
      if (r.dataType) return `${r.objectType}: ${r.descriptor} (${r.dataType}) in ${r.schemaName}`;
      return `${r.objectType}: ${r.descriptor} in ${r.schemaName}`;
    })
    .join("\n");
}
