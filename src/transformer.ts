/**
 * SQL statement rewriting on top of node-sql-parser.
 *
 * A QueryTransformer owns exactly one parsed statement. Rewrites mutate that
 * statement in place and return the transformer so calls can be chained:
 *
 *   new QueryTransformer(sql, "postgresql")
 *     .validateReadOnly()
 *     .validateTableAccess({ allowed: ["orders"] })
 *     .addPagination(100, 200)
 *     .sql();
 */

import pkg from "node-sql-parser";
import type { AST, Option } from "node-sql-parser";
import { normalizeDialect, parserDatabase } from "./dialect.js";
import {
  InvalidPaginationError,
  InvalidSqlError,
  ReadOnlyViolationError,
  TableAccessError,
  errorMessage,
} from "./errors.js";

const { Parser } = pkg;

type SqlNode = Record<string, unknown>;

export interface TableAccess {
  allowed?: readonly string[];
  disallowed?: readonly string[];
}

interface Window {
  limit?: number;
  offset?: number;
}

const MUTATING_TYPES = new Set([
  "insert",
  "replace",
  "update",
  "delete",
  "create",
  "drop",
  "alter",
  "truncate",
  "rename",
]);

const parser = new Parser();

function isNode(value: unknown): value is SqlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childNodes(node: SqlNode, skip?: string): SqlNode[] {
  const children: SqlNode[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key === "loc" || key === skip) continue;
    if (Array.isArray(value)) {
      for (const item of value) if (isNode(item)) children.push(item);
    } else if (isNode(value)) {
      children.push(value);
    }
  }
  return children;
}

function walk(node: SqlNode, visit: (node: SqlNode) => void): void {
  visit(node);
  for (const child of childNodes(node)) walk(child, visit);
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (isNode(value) && value.type === "number") {
    const n = Number(value.value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function numberNode(value: number): SqlNode {
  return { type: "number", value };
}

function assertWindowValue(name: "Limit" | "Offset", value: number): void {
  if (!Number.isInteger(value)) {
    throw new InvalidPaginationError(`${name} must be an integer`);
  }
  if (value < 0) {
    throw new InvalidPaginationError(`${name} must be non-negative`);
  }
}

function parseStatements(sql: string, options: Option): AST[] {
  let parsed: AST | AST[];
  try {
    parsed = parser.astify(sql, options);
  } catch (error) {
    throw new InvalidSqlError(`Invalid SQL: ${errorMessage(error)}`, { cause: error });
  }
  return Array.isArray(parsed) ? parsed : [parsed];
}

interface Parsed {
  ast: AST;
  node: SqlNode;
}

function parseSingle(sql: string, options: Option): Parsed {
  const trimmed = sql.trim().replace(/[;\s]+$/, "");
  if (!trimmed) {
    throw new InvalidSqlError("Invalid SQL: empty statement");
  }
  const statements = parseStatements(trimmed, options);
  if (statements.length !== 1) {
    throw new InvalidSqlError(
      `Invalid SQL: expected a single statement, found ${statements.length}`
    );
  }
  const statement = statements[0];
  if (!isNode(statement)) {
    throw new InvalidSqlError("Invalid SQL: could not parse statement");
  }
  return { ast: statement, node: statement };
}

function cteName(cte: SqlNode): string | undefined {
  const name = isNode(cte.name) ? cte.name.value : cte.name;
  return typeof name === "string" ? name.toLowerCase() : undefined;
}

/**
 * Collect table names, skipping references to CTEs that are in scope. A CTE
 * body sees only the CTEs defined before it (and itself when recursive), so
 * `WITH t AS (SELECT * FROM t)` still reads the real table `t`.
 */
function collectTables(node: SqlNode, visible: ReadonlySet<string>, tables: string[]): void {
  let scope = visible;
  const ctes = node.with;
  if (Array.isArray(ctes)) {
    const recursive = ctes.some((cte) => isNode(cte) && cte.recursive === true);
    const defined = new Set(visible);
    for (const cte of ctes) {
      if (!isNode(cte)) continue;
      const name = cteName(cte);
      const bodyScope = new Set(defined);
      if (recursive && name) bodyScope.add(name);
      for (const child of childNodes(cte)) collectTables(child, bodyScope, tables);
      if (name) defined.add(name);
    }
    scope = defined;
  }

  if (typeof node.table === "string" && node.type !== "column_ref" && !("column" in node)) {
    const name = node.table.toLowerCase();
    if (!scope.has(name) && !tables.includes(name)) tables.push(name);
  }
  for (const child of childNodes(node, "with")) collectTables(child, scope, tables);
}

/** `SELECT ... INTO` writes a table or a file. */
function hasIntoTarget(node: SqlNode): boolean {
  const into = node.into;
  if (!isNode(into)) return false;
  return isPresent(into.expr) || typeof into.keyword === "string" || typeof into.position === "string";
}

/** Identifiers written between double quotes, outside string literals. */
function quotedIdentifiers(sql: string): Set<string> {
  const names = new Set<string>();
  const withoutStrings = sql.replace(/'(?:[^']|'')*'/g, "''");
  for (const match of withoutStrings.matchAll(/"((?:[^"]|"")*)"/g)) {
    names.add(match[1].replace(/""/g, '"'));
  }
  return names;
}

/**
 * How the engine folds unquoted identifiers. The parser prints every
 * identifier quoted, so unquoted names are folded before rendering.
 */
function identifierFolding(dialect: string | undefined): ((name: string) => string) | null {
  switch (dialect) {
    case "postgresql":
      return (name) => name.toLowerCase();
    case "snowflake":
      return (name) => name.toUpperCase();
    default:
      return null;
  }
}

function foldIdentifiers(
  root: SqlNode,
  fold: (name: string) => string,
  quoted: ReadonlySet<string>
): void {
  const foldName = (value: unknown): unknown =>
    typeof value === "string" && !quoted.has(value) ? fold(value) : value;

  walk(root, (node) => {
    const isColumn = node.type === "column_ref";
    if (isColumn || typeof node.table === "string") {
      for (const key of ["db", "schema", "table"]) {
        if (key in node) node[key] = foldName(node[key]);
      }
    }
    if (typeof node.as === "string") node.as = foldName(node.as);
    if (isColumn) {
      const column = node.column;
      if (typeof column === "string") {
        node.column = foldName(column);
      } else if (isNode(column) && isNode(column.expr) && column.expr.type === "default") {
        column.expr.value = foldName(column.expr.value);
      }
    }
    if (Array.isArray(node.with)) {
      for (const cte of node.with) {
        if (!isNode(cte)) continue;
        if (isNode(cte.name)) {
          if (cte.name.type === "default") cte.name.value = foldName(cte.name.value);
        } else {
          cte.name = foldName(cte.name);
        }
      }
    }
  });
}

export class QueryTransformer {
  readonly dialect: string | undefined;
  private readonly options: Option;
  private readonly statement: AST;
  private readonly root: SqlNode;

  constructor(sql: string, dialect?: string) {
    this.dialect = dialect === undefined ? undefined : normalizeDialect(dialect);
    this.options = dialect === undefined ? {} : { database: parserDatabase(dialect) };
    const parsed = this.parse(sql);
    this.statement = parsed.ast;
    this.root = parsed.node;
  }

  private get isMssql(): boolean {
    return this.dialect === "mssql";
  }

  isSelect(): boolean {
    return this.root.type === "select";
  }

  isReadOnly(): boolean {
    let mutating = false;
    walk(this.root, (node) => {
      if (typeof node.type !== "string") return;
      const type = node.type.toLowerCase();
      if (MUTATING_TYPES.has(type) || (type === "select" && hasIntoTarget(node))) {
        mutating = true;
      }
    });
    return !mutating;
  }

  validateReadOnly(): this {
    if (!this.isReadOnly()) {
      throw new ReadOnlyViolationError();
    }
    return this;
  }

  /**
   * Distinct table names referenced anywhere in the statement, lower-cased,
   * in order of first appearance. References to a CTE in scope are skipped.
   */
  referencedTables(): string[] {
    const tables: string[] = [];
    collectTables(this.root, new Set(), tables);
    return tables;
  }

  validateTableAccess(access: TableAccess): this {
    const allowed = access.allowed?.map((t) => t.toLowerCase());
    const disallowed = access.disallowed?.map((t) => t.toLowerCase());
    if (!allowed && !disallowed) return this;

    for (const table of this.referencedTables()) {
      if (allowed && !allowed.includes(table)) {
        throw new TableAccessError(table, `Table '${table}' is not in the allowed list`);
      }
      if (disallowed && disallowed.includes(table)) {
        throw new TableAccessError(table, `Table '${table}' is in the excluded list`);
      }
    }
    return this;
  }

  /**
   * Apply a LIMIT/OFFSET window to the top level of a SELECT. An existing
   * LIMIT is only ever tightened. OFFSET is written when one already exists
   * or when `offset` is positive.
   */
  addPagination(limit: number, offset = 0): this {
    assertWindowValue("Limit", limit);
    assertWindowValue("Offset", offset);
    if (!this.isSelect()) return this;

    const existing = this.isMssql ? this.readMssqlWindow() : this.readWindow();
    const effectiveLimit = existing.limit === undefined ? limit : Math.min(limit, existing.limit);

    if (this.isMssql) {
      this.writeMssqlWindow(effectiveLimit, offset);
      return this;
    }

    const writeOffset = existing.offset !== undefined || offset > 0;
    const holder = this.windowHolder();
    holder.node[holder.key] = {
      seperator: writeOffset ? "offset" : "",
      value: writeOffset
        ? [numberNode(effectiveLimit), numberNode(offset)]
        : [numberNode(effectiveLimit)],
    };
    return this;
  }

  /**
   * COUNT(*) over the statement with its top-level window removed.
   * Non-SELECT statements count as zero rows.
   */
  toCountQuery(): string {
    if (!this.isSelect()) return "SELECT 0";

    const inner = structuredClone(this.root);
    this.stripWindow(inner);

    const template = this.parse("SELECT COUNT(*) FROM (SELECT 1) AS count_subquery");
    const target = template.node;
    const from = target.from;
    const source = Array.isArray(from) ? from[0] : undefined;
    if (!isNode(source) || !isNode(source.expr) || !isNode(source.expr.ast)) {
      throw new InvalidSqlError("Invalid SQL: could not build count query");
    }
    const placeholder = source.expr.ast;
    for (const key of ["parentheses", "parentheses_symbol", "_parentheses"]) {
      if (key in placeholder) inner[key] = placeholder[key];
    }

    // CTEs may not be nested in a derived table on every engine
    if (inner.with) {
      target.with = inner.with;
      inner.with = null;
    }
    source.expr.ast = inner;
    return parser.sqlify(template.ast, this.options);
  }

  /**
   * AND a boolean SQL fragment into the WHERE clause of every SELECT branch.
   */
  addWhereCondition(condition: string): this {
    if (!this.isSelect()) return this;
    const parsed = this.parseCondition(condition);

    for (const branch of this.branches()) {
      const existing = branch.where;
      const addition = structuredClone(parsed);
      if (isNode(existing)) {
        for (const side of [existing, addition]) {
          if (side.type === "binary_expr") side.parentheses = true;
        }
        branch.where = { type: "binary_expr", operator: "AND", left: existing, right: addition };
      } else {
        branch.where = addition;
      }
    }
    return this;
  }

  sql(): string {
    return parser.sqlify(this.statement, this.options);
  }

  /** Parse one statement and fold its unquoted identifiers the way the engine would. */
  private parse(sql: string): Parsed {
    const parsed = parseSingle(sql, this.options);
    const fold = identifierFolding(this.dialect);
    if (fold) foldIdentifiers(parsed.node, fold, quotedIdentifiers(sql));
    return parsed;
  }

  private parseCondition(condition: string): SqlNode {
    if (!condition.trim()) {
      throw new InvalidSqlError("Invalid SQL: empty condition");
    }
    const wrapper = this.parse(`SELECT * FROM condition_holder WHERE ${condition}`).node;
    const trailing = [wrapper.groupby, wrapper.having, wrapper.orderby, wrapper._next];
    const where = wrapper.where;
    if (!isNode(where) || hasWindow(wrapper.limit) || trailing.some(isPresent)) {
      throw new InvalidSqlError(`Invalid SQL condition: ${condition}`);
    }
    return where;
  }

  private branches(): SqlNode[] {
    const result: SqlNode[] = [];
    let current: unknown = this.root;
    while (isNode(current)) {
      result.push(current);
      current = current._next;
    }
    return result;
  }

  private isCompound(): boolean {
    return isNode(this.root._next);
  }

  private lastBranch(): SqlNode {
    const all = this.branches();
    return all[all.length - 1];
  }

  /**
   * Where the top-level window lives. A trailing LIMIT on the last branch of
   * an unparenthesized compound statement applies to the whole statement.
   */
  private windowHolder(): { node: SqlNode; key: string } {
    if (!this.isCompound()) return { node: this.root, key: "limit" };
    if (hasWindow(this.root._limit)) return { node: this.root, key: "_limit" };
    const last = this.lastBranch();
    if (!last.parentheses_symbol && hasWindow(last.limit)) return { node: last, key: "limit" };
    return { node: this.root, key: "_limit" };
  }

  private readWindow(): Window {
    const holder = this.windowHolder();
    const limit = holder.node[holder.key];
    if (!isNode(limit) || !Array.isArray(limit.value) || limit.value.length === 0) return {};
    const values = limit.value.map(numberOf);
    switch (limit.seperator) {
      case ",":
        return { offset: values[0] ?? 0, limit: values[1] };
      case "offset":
        return limit.value.length === 1
          ? { offset: values[0] ?? 0 }
          : { limit: values[0], offset: values[1] ?? 0 };
      default:
        return { limit: values[0] };
    }
  }

  private readMssqlWindow(): Window {
    const window: Window = {};
    const top = this.root.top;
    if (isNode(top) && !top.percent) {
      window.limit = numberOf(top.value);
    }

    const holder = this.windowHolder();
    if (hasWindow(holder.node[holder.key])) {
      const holderStatement = parseSingle("SELECT 1 AS one ORDER BY 1", this.options);
      holderStatement.node.limit = holder.node[holder.key];
      const rendered = parser.sqlify(holderStatement.ast, this.options);
      const offset = /\bOFFSET\s+(\d+)\s+ROWS?\b/i.exec(rendered);
      const fetch = /\bFETCH\s+(?:NEXT|FIRST)\s+(\d+)\s+ROWS?\s+ONLY\b/i.exec(rendered);
      if (offset) window.offset = Number(offset[1]);
      if (fetch) {
        const fetched = Number(fetch[1]);
        window.limit = window.limit === undefined ? fetched : Math.min(window.limit, fetched);
      }
    }
    return window;
  }

  private writeMssqlWindow(limit: number, offset: number): void {
    const template = parseSingle(
      `SELECT 1 AS one ORDER BY 1 OFFSET ${offset} ROWS FETCH NEXT ${limit} ROWS ONLY`,
      this.options
    ).node;
    const compound = this.isCompound();
    const node = this.root;
    const limitKey = compound ? "_limit" : "limit";
    const orderKey = compound ? "_orderby" : "orderby";

    if (compound) {
      const last = this.lastBranch();
      if (!last.parentheses_symbol) {
        if (hasWindow(last.limit)) last.limit = null;
        if (!node[orderKey] && last.orderby) {
          node[orderKey] = last.orderby;
          last.orderby = null;
        }
      }
    }

    node.top = null;
    node[limitKey] = template.limit;
    const order = node[orderKey];
    if (!Array.isArray(order) || order.length === 0) {
      node[orderKey] = template.orderby;
    }
  }

  private stripWindow(root: SqlNode): void {
    root.limit = null;
    let last: SqlNode = root;
    while (isNode(last._next)) last = last._next;
    if (last !== root) {
      root._limit = null;
      if (!last.parentheses_symbol) {
        last.limit = null;
        if (this.isMssql) last.orderby = null;
      }
    }
    if (this.isMssql) {
      root.top = null;
      root.orderby = null;
      root._orderby = null;
    }
  }
}

function hasWindow(limit: unknown): boolean {
  return isNode(limit) && Array.isArray(limit.value) && limit.value.length > 0;
}

function isPresent(part: unknown): boolean {
  if (part === undefined || part === null) return false;
  if (Array.isArray(part)) return part.length > 0;
  if (isNode(part) && "columns" in part) {
    return Array.isArray(part.columns) && part.columns.length > 0;
  }
  return true;
}
