/**
 * Table references of a query, via node-sql-parser in the matching dialect.
 *
 * The parser does not cover every dialect's syntax, so when it rejects a
 * query the FROM/JOIN text scan takes over. Neither path is authoritative.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();

const PARSER_DATABASE: Record<string, string> = {
  postgresql: 'PostgresQL',
  mysql: 'MySQL',
  sqlite: 'Sqlite',
  mssql: 'TransactSQL',
};

export function parserDatabase(dialect: string): string {
  return PARSER_DATABASE[dialect] ?? 'PostgresQL';
}

/**
 * Replace string literals and comments so keyword scans only see SQL text.
 * Literal positions keep a `''` placeholder.
 */
export function maskLiterals(sql: string): string {
  return sql
    .replace(/--[^\n]*/g, ' ')
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/'(?:[^']|'')*'/g, "''");
}

/** Contents of every single-quoted literal, escapes undone. */
export function stringLiterals(sql: string): string[] {
  const found: string[] = [];
  for (const match of sql.matchAll(/'((?:[^']|'')*)'/g)) {
    found.push(match[1].replace(/''/g, "'"));
  }
  return found;
}

function bareName(ref: string): string {
  const last = ref.split('.').pop() ?? ref;
  return last.replace(/^["`[]|["`\]]$/g, '').toLowerCase();
}

/** Names the query defines itself in a WITH clause. */
export function cteNames(sql: string): Set<string> {
  const masked = maskLiterals(sql);
  const names = new Set<string>();
  if (!/^\s*WITH\b/i.test(masked)) return names;
  for (const match of masked.matchAll(/(?:\bWITH(?:\s+RECURSIVE)?|,)\s*([A-Za-z_][\w$]*)\s*(?:\([^)]*\))?\s+AS\s*\(/gi)) {
    names.add(match[1].toLowerCase());
  }
  return names;
}

// FROM inside these calls is not a table reference
const FROM_FUNCTIONS = /\b(EXTRACT|SUBSTRING|TRIM|POSITION|OVERLAY)\s*\([^()]*\)/gi;

function scanTables(sql: string): string[] {
  const masked = maskLiterals(sql).replace(FROM_FUNCTIONS, ' ');
  const names: string[] = [];
  for (const match of masked.matchAll(/\b(?:FROM|JOIN)\s+((?:["`[]?[\w$]+["`\]]?\.)*["`[]?[\w$]+["`\]]?)/gi)) {
    names.push(bareName(match[1]));
  }
  return names;
}

function parsedTables(sql: string, dialect: string): string[] | undefined {
  try {
    const list = parser.tableList(sql.trim().replace(/;+\s*$/, ''), { database: parserDatabase(dialect) });
    // entries look like "select::schema::table"
    return list.map((entry) => bareName(entry.split('::').pop() ?? entry));
  } catch {
    return undefined;
  }
}

/**
 * Lowercased names of the tables a query reads or writes, without CTE
 * names, deduplicated in order of appearance.
 */
export function referencedTables(sql: string, dialect: string): string[] {
  const ctes = cteNames(sql);
  const names = parsedTables(sql, dialect) ?? scanTables(sql);
  return Array.from(new Set(names.filter((name) => name && name !== 'null' && !ctes.has(name))));
}
