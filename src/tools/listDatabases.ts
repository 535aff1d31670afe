import type { DatabaseManager } from "../db.js";
import type { Dialect } from "../dialect.js";
import { sqlitePath } from "../drivers.js";

export interface DatabaseInfo {
  name: string;
  description: string;
  type: Dialect;
  host: string | null;
  port: number | null;
  username: string | null;
  database: string | null;
}

export interface DatabaseListing {
  configFile: string | null;
  databases: DatabaseInfo[];
}

export function listDatabases(manager: DatabaseManager): DatabaseListing {
  return {
    configFile: manager.configFile,
    databases: manager.databaseNames().map((name) => {
      const db = manager.getDatabase(name);
      return {
        name,
        description: db.description,
        type: db.type,
        host: db.host ?? null,
        port: db.port ?? null,
        username: db.username ?? null,
        database: db.type === "sqlite" ? sqlitePath(db) : (db.database ?? null),
      };
    }),
  };
}

function shortDescription(description: string): string {
  const text = description.length > 20 ? `${description.slice(0, 17)}..` : description;
  return text.padEnd(20);
}

function connectionInfo(db: DatabaseInfo): string {
  if (db.type === "sqlite") return db.database ?? "";
  const user = db.username ? `${db.username}@` : "";
  const port = db.port ? `:${db.port}` : "";
  return `${user}${db.host ?? "?"}${port}/${db.database ?? ""}`;
}

export function formatDatabaseListing(listing: DatabaseListing): string {
  const header = listing.configFile ? `Config: ${listing.configFile}` : "Config: (in memory)";
  if (listing.databases.length === 0) return `${header}\n\nNo databases configured`;

  const width = Math.max(...listing.databases.map((db) => db.name.length));
  const lines = listing.databases.map(
    (db) => `${db.name.padEnd(width)}  ${db.type.padEnd(10)}  ${shortDescription(db.description)}  ${connectionInfo(db)}`
  );
  return `${header}\n\n${lines.join("\n")}`;
}
