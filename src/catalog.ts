/**
 * Dialect catalog queries, stored as SQL templates under sql/<dialect>/.
 *
 * Templates use {{name}} placeholders that are substituted inside string
 * literals, so values are escaped for the dialect on the way in.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { type Dialect, escapeLiteral } from "./dialect.js";
import { InvalidSqlError, UnsupportedDialectError } from "./errors.js";

export type CatalogQueryName =
  | "table_exists"
  | "columns"
  | "foreign_key"
  | "primary_key"
  | "enum_values"
  | "search";

const SQL_DIR = fileURLToPath(new URL("../sql/", import.meta.url));

const templates = new Map<string, string | null>();

function readTemplate(dialect: Dialect, name: CatalogQueryName): string | null {
  const key = `${dialect}/${name}`;
  const cached = templates.get(key);
  if (cached !== undefined) return cached;

  const path = join(SQL_DIR, dialect, `${name}.sql`);
  const template = existsSync(path) ? readFileSync(path, "utf-8").trim() : null;
  templates.set(key, template);
  return template;
}

export function hasCatalogQuery(dialect: Dialect, name: CatalogQueryName): boolean {
  return readTemplate(dialect, name) !== null;
}

export function fillTemplate(
  template: string,
  params: Record<string, string>,
  dialect?: Dialect
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => {
    const value = params[key];
    if (value === undefined) {
      throw new InvalidSqlError(`Missing value for template placeholder ${placeholder}`);
    }
    return escapeLiteral(value, dialect);
  });
}

export function catalogQuery(
  dialect: Dialect,
  name: CatalogQueryName,
  params: Record<string, string>
): string {
  const template = readTemplate(dialect, name);
  if (template === null) {
    throw new UnsupportedDialectError(dialect, name);
  }
  return fillTemplate(template, params, dialect);
}
