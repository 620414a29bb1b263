/**
 * Static checks run on every generated query before execution.
 * Each check is independent; the validator unions their findings.
 */

import { featureSet } from '../dialect/catalog.js';
import { maskLiterals, referencedTables, stringLiterals } from './parse.js';

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  check: 'structure' | 'smell' | 'schema';
  /** errors make a query not worth executing; warnings are advisory */
  severity: IssueSeverity;
  message: string;
}

export const MISSING_FROM = 'SELECT statement is missing FROM clause.';
export const MISSING_SEMICOLON = 'Query is missing a semicolon at the end.';
export const LIMIT_WITHOUT_ORDER = 'LIMIT is used without ORDER BY, which may lead to inconsistent results.';
export const GROUP_BY_WITHOUT_AGGREGATE = 'GROUP BY without aggregation: no aggregate function is called.';
export const INJECTION_PATTERN = 'Potential SQL injection pattern detected in a string literal.';
export const NULL_COMPARISON = 'Incorrect NULL comparison. Use IS NULL or IS NOT NULL instead of = NULL.';
export const DISTINCT_SCOPE = 'DISTINCT applies to all columns in the SELECT list, not just the first one.';

export function unknownTable(table: string): string {
  return `Table '${table}' is not found in the schema.`;
}

// ── Structure ────────────────────────────────────────────────────────

export function checkStructure(sql: string): ValidationIssue[] {
  const masked = maskLiterals(sql).trim();
  const isSelect = /^(SELECT|WITH)\b/i.test(masked) && /\bSELECT\b/i.test(masked);
  if (isSelect && !/\bFROM\b/i.test(masked)) {
    return [{ check: 'structure', severity: 'error', message: MISSING_FROM }];
  }
  return [];
}

// ── Smells ───────────────────────────────────────────────────────────

function hasAggregate(masked: string, dialect: string): boolean {
  return featureSet(dialect).aggregateFunctions.some((fn) => new RegExp(`\\b${fn}\\s*\\(`, 'i').test(masked));
}

function looksInjected(sql: string): boolean {
  if (stringLiterals(sql).some((text) => /\s(OR|AND)\s/i.test(text))) return true;
  // tautologies such as OR '1'='1' or OR 1=1
  return /\bOR\s+'([^']*)'\s*=\s*'\1'/i.test(sql) || /\bOR\s+(\d+)\s*=\s*\1\b/i.test(sql);
}

export function checkSmells(sql: string, dialect: string): ValidationIssue[] {
  const masked = maskLiterals(sql);
  const found: string[] = [];

  if (!sql.trim().endsWith(';')) found.push(MISSING_SEMICOLON);
  if (/\bLIMIT\s+\d+/i.test(masked) && !/\bORDER\s+BY\b/i.test(masked)) found.push(LIMIT_WITHOUT_ORDER);
  if (/\bGROUP\s+BY\b/i.test(masked) && !hasAggregate(masked, dialect)) found.push(GROUP_BY_WITHOUT_AGGREGATE);
  if (looksInjected(sql)) found.push(INJECTION_PATTERN);
  if (/(?<![:<>!])=\s*NULL\b/i.test(masked) || /\bNULL\s*=/i.test(masked) || /(?:!=|<>)\s*NULL\b/i.test(masked)) {
    found.push(NULL_COMPARISON);
  }
  if (/\bSELECT\s+DISTINCT\s+[^,]*?\s*,[\s\S]*?\bFROM\b/i.test(masked)) found.push(DISTINCT_SCOPE);

  return found.map((message): ValidationIssue => ({ check: 'smell', severity: 'warning', message }));
}

// ── Schema existence ─────────────────────────────────────────────────

/** Every referenced table must be one of `knownTables`, case-insensitively. */
export function checkSchema(sql: string, knownTables: string[], dialect: string): ValidationIssue[] {
  const known = new Set(knownTables.map((t) => t.toLowerCase()));
  return referencedTables(sql, dialect)
    .filter((table) => !known.has(table))
    .map((table): ValidationIssue => ({ check: 'schema', severity: 'error', message: unknownTable(table) }));
}

export function runChecks(sql: string, knownTables: string[], dialect: string): ValidationIssue[] {
  return [...checkStructure(sql), ...checkSmells(sql, dialect), ...checkSchema(sql, knownTables, dialect)];
}
