/**
 * Database drivers behind a common Connector interface.
 *
 * Every connector returns rows as positional arrays alongside the column
 * names in projection order.
 */

import pg from "pg";
import * as mysql from "mysql2/promise";
import sql from "mssql";
import type { ConnectionPool } from "mssql";
import Database from "better-sqlite3";
import snowflake from "snowflake-sdk";
import type { Connection as SnowflakeConnection } from "snowflake-sdk";
import { type DatabaseConfig, type Settings, type SnowflakeLocation, parseSnowflakeUrl } from "./config.js";
import { ConfigurationError } from "./errors.js";

const { Pool } = pg;

export interface RawResult {
  columns: string[];
  rows: unknown[][];
}

export interface Connector {
  query(text: string): Promise<RawResult>;
  close(): Promise<void>;
}

export type ConnectorFactory = (
  name: string,
  db: DatabaseConfig,
  settings: Settings
) => Connector;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPositional(columns: readonly string[], row: unknown): unknown[] {
  if (Array.isArray(row)) return row;
  if (isRecord(row)) return columns.map((column) => row[column]);
  return [row];
}

// ============================================================================
// PostgreSQL
// ============================================================================

export class PostgresConnector implements Connector {
  private readonly pool: pg.Pool;

  constructor(db: DatabaseConfig, settings: Settings) {
    this.pool = new Pool({
      connectionString: db.connection_string,
      host: db.host,
      port: db.port,
      database: db.database,
      user: db.username,
      password: db.password,
      connectionTimeoutMillis: settings.connection_timeout_ms,
      statement_timeout: settings.query_timeout_ms,
      options: "-c default_transaction_read_only=on",
      max: 5,
    });
  }

  async query(text: string): Promise<RawResult> {
    const result = await this.pool.query({ text, rowMode: "array" });
    return {
      columns: result.fields.map((f) => f.name),
      rows: result.rows,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// ============================================================================
// MySQL
// ============================================================================

export class MysqlConnector implements Connector {
  private readonly pool: mysql.Pool;
  private readonly timeout: number;

  constructor(db: DatabaseConfig, settings: Settings) {
    this.timeout = settings.query_timeout_ms;
    this.pool = db.connection_string
      ? mysql.createPool({ uri: db.connection_string, connectionLimit: 5 })
      : mysql.createPool({
          host: db.host,
          port: db.port,
          database: db.database,
          user: db.username,
          password: db.password,
          connectTimeout: settings.connection_timeout_ms,
          connectionLimit: 5,
        });
  }

  async query(text: string): Promise<RawResult> {
    const [rows, fields] = await this.pool.query<mysql.RowDataPacket[]>({
      sql: text,
      rowsAsArray: true,
      timeout: this.timeout,
    });
    const columns = fields.map((f) => f.name);
    return { columns, rows: rows.map((row) => toPositional(columns, row)) };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// ============================================================================
// SQLite
// ============================================================================

export function sqlitePath(db: DatabaseConfig): string {
  if (db.database) return db.database;
  const connection = db.connection_string ?? "";
  return connection.replace(/^sqlite3?:(\/\/)?/, "");
}

export class SqliteConnector implements Connector {
  private db: Database.Database | null;
  private readonly path: string;

  /** Accepts a file path, ":memory:", or an already open database. */
  constructor(source: string | Database.Database) {
    if (typeof source === "string") {
      this.path = source;
      this.db = null;
    } else {
      this.path = source.name;
      this.db = source;
    }
  }

  private open(): Database.Database {
    if (!this.db) {
      const memory = this.path === ":memory:" || this.path === "";
      this.db = new Database(this.path, { readonly: !memory, fileMustExist: !memory });
    }
    return this.db;
  }

  async query(text: string): Promise<RawResult> {
    const statement = this.open().prepare(text);
    if (!statement.reader) {
      throw new Error("Statement does not return rows");
    }
    const columns = statement.columns().map((c) => c.name);
    const rows = statement.raw(true).all();
    return { columns, rows: rows.map((row) => toPositional(columns, row)) };
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}

// ============================================================================
// SQL Server
// ============================================================================

export class MssqlConnector implements Connector {
  private readonly pool: ConnectionPool;
  private connecting: Promise<ConnectionPool> | null = null;

  constructor(db: DatabaseConfig, settings: Settings) {
    this.pool = db.connection_string
      ? new sql.ConnectionPool(db.connection_string)
      : new sql.ConnectionPool({
          server: db.host ?? "localhost",
          port: db.port,
          database: db.database,
          user: db.username,
          password: db.password,
          connectionTimeout: settings.connection_timeout_ms,
          requestTimeout: settings.query_timeout_ms,
          options: { encrypt: true, trustServerCertificate: true },
        });
  }

  private connect(): Promise<ConnectionPool> {
    if (!this.connecting) {
      this.connecting = this.pool.connect().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }
    return this.connecting;
  }

  async query(text: string): Promise<RawResult> {
    const pool = await this.connect();
    const result = await pool.request().query<Record<string, unknown>>(text);
    const recordset = result.recordset;
    if (!recordset) return { columns: [], rows: [] };

    const columns = Object.values(recordset.columns)
      .sort((a, b) => a.index - b.index)
      .map((c) => c.name);
    return { columns, rows: recordset.map((row) => toPositional(columns, row)) };
  }

  async close(): Promise<void> {
    this.connecting = null;
    await this.pool.close();
  }
}

// ============================================================================
// Snowflake
// ============================================================================

/**
 * Connection settings for snowflake-sdk. Explicit fields win over the parts
 * of a `snowflake://` connection_string.
 */
export function snowflakeOptions(db: DatabaseConfig): SnowflakeLocation {
  const fromUrl = db.connection_string ? parseSnowflakeUrl(db.connection_string) : null;
  const account =
    db.account ?? db.host?.replace(/\.snowflakecomputing\.com$/i, "") ?? fromUrl?.account;
  if (!account) {
    throw new ConfigurationError("Snowflake databases require an account, host or connection_string");
  }
  return {
    account,
    username: db.username ?? fromUrl?.username,
    password: db.password ?? fromUrl?.password,
    database: db.database ?? fromUrl?.database,
    schema: db.default_schema ?? fromUrl?.schema,
    warehouse: db.warehouse ?? fromUrl?.warehouse,
    role: db.role ?? fromUrl?.role,
  };
}

export class SnowflakeConnector implements Connector {
  private readonly connection: SnowflakeConnection;
  private connecting: Promise<void> | null = null;

  constructor(db: DatabaseConfig) {
    this.connection = snowflake.createConnection(snowflakeOptions(db));
  }

  private connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = new Promise<void>((resolve, reject) => {
        this.connection.connect((error) => {
          if (error) {
            this.connecting = null;
            reject(error);
          } else {
            resolve();
          }
        });
      });
    }
    return this.connecting;
  }

  async query(text: string): Promise<RawResult> {
    await this.connect();
    return new Promise<RawResult>((resolve, reject) => {
      this.connection.execute({
        sqlText: text,
        complete: (error, statement, rows) => {
          if (error) {
            reject(error);
            return;
          }
          const columns = (statement.getColumns() ?? []).map((c) => c.getName());
          resolve({ columns, rows: (rows ?? []).map((row: unknown) => toPositional(columns, row)) });
        },
      });
    });
  }

  async close(): Promise<void> {
    if (!this.connecting) return;
    this.connecting = null;
    await new Promise<void>((resolve, reject) => {
      this.connection.destroy((error) => (error ? reject(error) : resolve()));
    });
  }
}

export const createConnector: ConnectorFactory = (_name, db, settings) => {
  switch (db.type) {
    case "postgresql":
      return new PostgresConnector(db, settings);
    case "mysql":
      return new MysqlConnector(db, settings);
    case "sqlite":
      return new SqliteConnector(sqlitePath(db));
    case "mssql":
      return new MssqlConnector(db, settings);
    case "snowflake":
      return new SnowflakeConnector(db);
  }
};
