/**
 * MCP tool registration.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { TOOL_NAMES, type ToolName } from "./config.js";
import type { DatabaseManager } from "./db.js";
import { errorMessage } from "./errors.js";
import { executeQuery, formatQueryPage } from "./tools/executeQuery.js";
import { formatDatabaseListing, listDatabases } from "./tools/listDatabases.js";
import { formatConfigChanges, reloadConfig } from "./tools/reloadConfig.js";
import { sampleTable } from "./tools/sampleTable.js";
import { formatSearchResults, search } from "./tools/search.js";
import { formatTableSummary, tableSummary } from "./tools/tableSummary.js";
import { formatConnectionStatus, testConnection } from "./tools/testConnection.js";

export const SERVER_NAME = "sqlgate-mcp";
export const SERVER_VERSION = "0.1.0";

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

async function run(action: () => Promise<string> | string): Promise<ToolResult> {
  try {
    return { content: [{ type: "text", text: await action() }] };
  } catch (error) {
    return { content: [{ type: "text", text: `Error: ${errorMessage(error)}` }], isError: true };
  }
}

const databaseArg = z.string().describe("Database name from list_databases");
const schemaArg = z.string().optional().describe("Schema name (default: the database's default schema)");

export function enabledTools(available: readonly ToolName[] | undefined): Set<ToolName> {
  return new Set(available ?? TOOL_NAMES);
}

export function createServer(manager: DatabaseManager): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  const enabled = enabledTools(manager.settings.available_tools);

  // ==========================================================================
  // TOOLS: Databases
  // ==========================================================================

  if (enabled.has("list_databases")) {
    server.tool(
      "list_databases",
      "List the configured databases with their type and connection details",
      {},
      async () => run(() => formatDatabaseListing(listDatabases(manager)))
    );
  }

  if (enabled.has("test_connection")) {
    server.tool(
      "test_connection",
      "Check that a database answers, with latency and circuit breaker state",
      { database: databaseArg },
      async ({ database }) =>
        run(async () => formatConnectionStatus(await testConnection(manager, database)))
    );
  }

  if (enabled.has("reload_config")) {
    server.tool(
      "reload_config",
      "Reload the configuration file and report which databases changed",
      {},
      async () => run(async () => formatConfigChanges(await reloadConfig(manager)))
    );
  }

  // ==========================================================================
  // TOOLS: Query Execution
  // ==========================================================================

  if (enabled.has("execute_query")) {
    server.tool(
      "execute_query",
      "Execute a read-only SQL query with pagination",
      {
        database: databaseArg,
        query: z.string().describe("SQL SELECT query"),
        limit: z.number().int().optional().describe("Rows per page (default 100)"),
        page: z.number().int().optional().describe("Page number, starting at 1"),
        accurate_count: z
          .boolean()
          .optional()
          .describe("Count all matching rows to report an exact page total"),
      },
      async ({ database, query, limit, page, accurate_count }) =>
        run(async () =>
          formatQueryPage(
            await executeQuery(manager, database, query, {
              limit,
              page,
              accurateCount: accurate_count,
            })
          )
        )
    );
  }

  // ==========================================================================
  // TOOLS: Schema Introspection
  // ==========================================================================

  if (enabled.has("table_summary")) {
    server.tool(
      "table_summary",
      "Describe a table: columns, sample rows, and foreign keys",
      {
        database: databaseArg,
        table: z.string().describe("Table name"),
        schema: schemaArg,
        limit: z.number().int().optional().describe("Items per page (default 250)"),
        page: z.number().int().optional().describe("Page number, starting at 1"),
      },
      async ({ database, table, schema, limit, page }) =>
        run(async () =>
          formatTableSummary(await tableSummary(manager, database, table, { schema, limit, page }))
        )
    );
  }

  if (enabled.has("search")) {
    server.tool(
      "search",
      "Search table and column names",
      {
        database: databaseArg,
        term: z.string().min(1).describe("Text to look for in object names"),
        schema: schemaArg,
      },
      async ({ database, term, schema }) =>
        run(async () => formatSearchResults(await search(manager, database, term, { schema })))
    );
  }

  if (enabled.has("sample_table")) {
    server.tool(
      "sample_table",
      "Show a few rows from a table",
      {
        database: databaseArg,
        table: z.string().describe("Table name"),
        schema: z.string().optional().describe("Schema name"),
      },
      async ({ database, table, schema }) =>
        run(async () => formatQueryPage(await sampleTable(manager, database, table, { schema })))
    );
  }

  return server;
}
