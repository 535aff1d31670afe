#!/usr/bin/env node
/**
 * sqlgate-mcp
 * Read-only SQL gateway over MCP
 *
 * @license MIT
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { DatabaseManager } from "./db.js";
import { createServer, enabledTools } from "./server.js";

async function main() {
  const loaded = loadConfig();
  const manager = new DatabaseManager(loaded);
  const server = createServer(manager);

  const shutdown = async () => {
    await manager.close();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const settings = manager.settings;
  console.error("[sqlgate] Running on stdio");
  console.error(`[sqlgate] Databases: ${manager.databaseNames().join(", ") || "(none)"}`);
  console.error(`[sqlgate] Tools: ${[...enabledTools(settings.available_tools)].join(", ")}`);
  console.error(
    `[sqlgate] Limits: max_rows=${settings.max_rows_per_query}, query_timeout=${settings.query_timeout_ms}ms`
  );
}

main().catch((error) => {
  console.error("[sqlgate] Fatal error:", error);
  process.exit(1);
});
