import type { DatabaseManager } from "../db.js";
import { qualifiedName } from "../dialect.js";
import { type QueryPage, executeQuery } from "./executeQuery.js";

export interface SampleTableOptions {
  schema?: string;
}

export async function sampleTable(
  manager: DatabaseManager,
  database: string,
  table: string,
  options: SampleTableOptions = {}
): Promise<QueryPage> {
  const dialect = manager.dialectOf(database);
  const query = `SELECT * FROM ${qualifiedName(dialect, options.schema, table)}`;
  return executeQuery(manager, database, query, {
    limit: manager.settings.sample_size,
    page: 1,
  });
}
