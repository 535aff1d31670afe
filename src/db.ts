/**
 * Database manager: configured databases, lazily opened connectors, and
 * per-database circuit breakers around every statement.
 */

import {
  type Config,
  type ConfigChanges,
  type DatabaseConfig,
  type LoadedConfig,
  type Settings,
  defaultSchemaOf,
  diffDatabases,
  loadConfig,
} from "./config.js";
import { CircuitBreaker, type CircuitState } from "./circuit.js";
import type { Dialect } from "./dialect.js";
import { type Connector, type ConnectorFactory, createConnector } from "./drivers.js";
import { ConfigurationError, type QueryFailureType, QueryError, errorMessage } from "./errors.js";
import { TimeoutError, formatDuration, withTimeout } from "./utils.js";

export class QueryResult {
  constructor(
    readonly columns: string[],
    readonly rows: unknown[][],
    readonly durationMs = 0
  ) {}

  get rowCount(): number {
    return this.rows.length;
  }

  /** First column of the first row, or null for an empty result. */
  scalar(): unknown {
    return this.rows[0]?.[0] ?? null;
  }

  fetchOne(): unknown[] | null {
    return this.rows[0] ?? null;
  }

  fetchAll(): unknown[][] {
    return this.rows;
  }

  records(): Record<string, unknown>[] {
    return this.rows.map((row) =>
      Object.fromEntries(this.columns.map((column, i) => [column, row[i] ?? null]))
    );
  }
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "ESOCKET",
  "ELOGIN",
  "PROTOCOL_CONNECTION_LOST",
]);

function classifyFailure(error: unknown): QueryFailureType {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof Error) {
    if ("code" in error && typeof error.code === "string" && CONNECTION_ERROR_CODES.has(error.code)) {
      return "connection_failed";
    }
    if (/ECONNREFUSED|ENOTFOUND|Connection terminated|Failed to connect/i.test(error.message)) {
      return "connection_failed";
    }
  }
  return "query_error";
}

export class DatabaseManager {
  private config: Config;
  private configPath: string | null;
  private readonly connectors = new Map<string, Connector>();
  private readonly circuits = new Map<string, CircuitBreaker>();

  constructor(
    source: LoadedConfig | Config,
    private readonly connectorFactory: ConnectorFactory = createConnector
  ) {
    if ("path" in source) {
      this.config = source.config;
      this.configPath = source.path;
    } else {
      this.config = source;
      this.configPath = null;
    }
  }

  get settings(): Settings {
    return this.config.settings;
  }

  get configFile(): string | null {
    return this.configPath;
  }

  databaseNames(): string[] {
    return Object.keys(this.config.databases);
  }

  /** Resolve a database name, exact match first, then ignoring case. */
  resolveName(name: string): string {
    if (name in this.config.databases) return name;
    const match = this.databaseNames().find((n) => n.toLowerCase() === name.toLowerCase());
    if (!match) {
      throw new ConfigurationError(`Database '${name}' not found in configuration`);
    }
    return match;
  }

  getDatabase(name: string): DatabaseConfig {
    return this.config.databases[this.resolveName(name)];
  }

  dialectOf(name: string): Dialect {
    return this.getDatabase(name).type;
  }

  defaultSchemaOf(name: string): string | undefined {
    return defaultSchemaOf(this.getDatabase(name));
  }

  circuitState(name: string): CircuitState {
    return this.circuitFor(this.resolveName(name)).getState();
  }

  /** Failures counted by the breaker within its failure window. */
  recentFailures(name: string): number {
    return this.circuitFor(this.resolveName(name)).getRecentFailures();
  }

  async execute(database: string, text: string): Promise<QueryResult> {
    const name = this.resolveName(database);
    const circuit = this.circuitFor(name);
    const start = Date.now();

    if (!circuit.canExecute()) {
      const wait = circuit.getTimeUntilHalfOpen() ?? 0;
      throw new QueryError(
        "circuit_open",
        name,
        `Database '${name}' is marked unhealthy, retry in ${formatDuration(wait)}`,
        0
      );
    }

    const connector = this.connectorFor(name);
    const timeout = this.settings.query_timeout_ms;
    try {
      const raw = await withTimeout(
        connector.query(text),
        timeout,
        `Query timed out after ${timeout}ms`
      );
      circuit.recordSuccess();
      return new QueryResult(raw.columns, raw.rows, Date.now() - start);
    } catch (error) {
      const type = classifyFailure(error);
      // SQL errors say nothing about database health
      if (type !== "query_error") circuit.recordFailure();
      throw new QueryError(type, name, errorMessage(error), Date.now() - start, { cause: error });
    }
  }

  /**
   * Reload the configuration file and swap it in. Connectors of removed or
   * modified databases are closed; the rest stay open.
   */
  async reload(path?: string): Promise<ConfigChanges> {
    const loaded = loadConfig(path ?? this.configPath ?? undefined);
    return this.replaceConfig(loaded.config, loaded.path);
  }

  async replaceConfig(next: Config, path: string | null = this.configPath): Promise<ConfigChanges> {
    const changes = diffDatabases(this.config, next);
    this.config = next;
    this.configPath = path;

    await Promise.all([...changes.removed, ...changes.modified].map((name) => this.closeOne(name)));
    // Breaker thresholds may have changed
    this.circuits.clear();
    return changes;
  }

  async close(): Promise<void> {
    await Promise.all([...this.connectors.keys()].map((name) => this.closeOne(name)));
  }

  private async closeOne(name: string): Promise<void> {
    const connector = this.connectors.get(name);
    this.circuits.delete(name);
    if (!connector) return;
    this.connectors.delete(name);
    try {
      await connector.close();
      console.error(`[sqlgate] Closed connection to ${name}`);
    } catch (error) {
      console.error(`[sqlgate] Failed to close connection to ${name}: ${errorMessage(error)}`);
    }
  }

  private connectorFor(name: string): Connector {
    let connector = this.connectors.get(name);
    if (!connector) {
      connector = this.connectorFactory(name, this.config.databases[name], this.settings);
      this.connectors.set(name, connector);
      console.error(`[sqlgate] Opened ${this.config.databases[name].type} connection to ${name}`);
    }
    return connector;
  }

  private circuitFor(name: string): CircuitBreaker {
    let circuit = this.circuits.get(name);
    if (!circuit) {
      const s = this.settings;
      circuit = new CircuitBreaker(name, {
        failureThreshold: s.circuit_failure_threshold,
        failureWindowMs: s.circuit_failure_window_ms,
        openDurationMs: s.circuit_open_duration_ms,
        recoveryThreshold: s.circuit_recovery_threshold,
      });
      this.circuits.set(name, circuit);
    }
    return circuit;
  }
}
