import { describe, it, expect, beforeEach, vi } from "vitest";
import { parseConfig } from "./config.js";
import { DatabaseManager, QueryResult } from "./db.js";
import type { Connector, RawResult } from "./drivers.js";
import { ConfigurationError, QueryError } from "./errors.js";

class ScriptedConnector implements Connector {
  readonly statements: string[] = [];
  closed = false;

  constructor(private readonly respond: (text: string) => Promise<RawResult>) {}

  query(text: string): Promise<RawResult> {
    this.statements.push(text);
    return this.respond(text);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function connectionRefused(): Error {
  return Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), { code: "ECONNREFUSED" });
}

const config = parseConfig({
  databases: {
    Shop: { type: "postgresql", host: "localhost", database: "shop", username: "reader" },
    local: { type: "sqlite", database: "/tmp/local.db" },
  },
  settings: { query_timeout_ms: 50, circuit_failure_threshold: 2 },
});

describe("QueryResult", () => {
  it("exposes rows positionally and as records", () => {
    const result = new QueryResult(["id", "name"], [[1, "ann"], [2, null]]);
    expect(result.rowCount).toBe(2);
    expect(result.scalar()).toBe(1);
    expect(result.fetchOne()).toEqual([1, "ann"]);
    expect(result.records()).toEqual([
      { id: 1, name: "ann" },
      { id: 2, name: null },
    ]);
  });

  it("returns null for an empty result", () => {
    const result = new QueryResult(["n"], []);
    expect(result.scalar()).toBeNull();
    expect(result.fetchOne()).toBeNull();
  });
});

describe("DatabaseManager", () => {
  let connectors: Map<string, ScriptedConnector>;
  let respond: (text: string) => Promise<RawResult>;
  let manager: DatabaseManager;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    connectors = new Map();
    respond = async () => ({ columns: ["one"], rows: [[1]] });
    manager = new DatabaseManager(config, (name) => {
      const connector = new ScriptedConnector((text) => respond(text));
      connectors.set(name, connector);
      return connector;
    });
  });

  it("resolves database names ignoring case", () => {
    expect(manager.resolveName("shop")).toBe("Shop");
    expect(manager.dialectOf("SHOP")).toBe("postgresql");
    expect(manager.defaultSchemaOf("local")).toBe("main");
    expect(() => manager.resolveName("missing")).toThrow(ConfigurationError);
    expect(() => manager.resolveName("missing")).toThrow(
      "Database 'missing' not found in configuration"
    );
  });

  it("executes through a lazily created connector", async () => {
    expect(connectors.size).toBe(0);
    const result = await manager.execute("shop", "SELECT 1");
    expect(result.scalar()).toBe(1);
    expect(connectors.get("Shop")?.statements).toEqual(["SELECT 1"]);

    await manager.execute("shop", "SELECT 2");
    expect(connectors.size).toBe(1);
  });

  it("wraps SQL errors without tripping the circuit", async () => {
    respond = async () => {
      throw new Error('relation "nope" does not exist');
    };
    for (let i = 0; i < 3; i++) {
      await expect(manager.execute("shop", "SELECT * FROM nope")).rejects.toMatchObject({
        type: "query_error",
        database: "Shop",
        retryable: false,
      });
    }
    expect(manager.circuitState("shop")).toBe("closed");
    expect(manager.recentFailures("shop")).toBe(0);
  });

  it("reports timeouts", async () => {
    respond = () => new Promise<never>(() => {});
    const failure = manager.execute("shop", "SELECT pg_sleep(10)");
    await expect(failure).rejects.toBeInstanceOf(QueryError);
    await expect(failure).rejects.toMatchObject({
      type: "timeout",
      message: "Query timed out after 50ms",
    });
  });

  it("opens the circuit after repeated connection failures", async () => {
    respond = async () => {
      throw connectionRefused();
    };
    for (let i = 0; i < 2; i++) {
      await expect(manager.execute("shop", "SELECT 1")).rejects.toMatchObject({
        type: "connection_failed",
      });
    }
    expect(manager.circuitState("shop")).toBe("open");
    expect(manager.recentFailures("shop")).toBe(2);

    await expect(manager.execute("shop", "SELECT 1")).rejects.toMatchObject({
      type: "circuit_open",
    });
    expect(connectors.get("Shop")?.statements).toHaveLength(2);
  });

  it("closes connectors of removed and modified databases on reconfiguration", async () => {
    await manager.execute("shop", "SELECT 1");
    await manager.execute("local", "SELECT 1");
    const shop = connectors.get("Shop");
    const local = connectors.get("local");

    const next = parseConfig({
      databases: {
        Shop: { type: "postgresql", host: "replica", database: "shop", username: "reader" },
        archive: { type: "sqlite", database: "/tmp/archive.db" },
      },
    });
    const changes = await manager.replaceConfig(next);

    expect(changes).toEqual({ added: ["archive"], removed: ["local"], modified: ["Shop"] });
    expect(shop?.closed).toBe(true);
    expect(local?.closed).toBe(true);
    expect(manager.databaseNames()).toEqual(["Shop", "archive"]);
  });

  it("closes every open connector", async () => {
    await manager.execute("shop", "SELECT 1");
    await manager.close();
    expect(connectors.get("Shop")?.closed).toBe(true);
  });
});
