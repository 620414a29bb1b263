/**
 * Dialect adaptation: targeted textual rewrites that move generated SQL
 * toward the connected engine's syntax. This is not a parser. Each rule is
 * a best-effort transform that is a no-op when its pattern is absent, and
 * each runs once per call, in table order.
 *
 * String literals and quoted identifiers are masked before any rule runs,
 * so rewrites never touch their contents.
 */

import { isKnownDialect, normalizeDialect, type KnownDialect } from './catalog.js';

export interface RewriteRule {
  name: string;
  apply(sql: string): string;
}

export interface AdaptResult {
  sql: string;
  dialect: string;
  applied: string[];
}

// ── Literal masking ──────────────────────────────────────────────────

const MASK = '\u0000';
const MASK_PATTERN = /\u0000(\d+)\u0000/g;

function maskQuoted(sql: string): { text: string; literals: string[] } {
  const literals: string[] = [];
  let text = '';
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === "'" || ch === '"' || ch === '`') {
      let j = i + 1;
      while (j < sql.length) {
        if (sql[j] === ch) {
          // doubled quote is an escaped quote
          if (sql[j + 1] === ch) {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      const end = Math.min(j + 1, sql.length);
      literals.push(sql.slice(i, end));
      text += `${MASK}${literals.length - 1}${MASK}`;
      i = end;
      continue;
    }
    text += ch;
    i++;
  }
  return { text, literals };
}

function unmask(text: string, literals: string[]): string {
  return text.replace(MASK_PATTERN, (whole, index: string) => literals[Number(index)] ?? whole);
}

// ── Expression helpers ───────────────────────────────────────────────

/** Index of the `)` matching the `(` at openIdx, or -1. */
function findClosingParen(text: string, openIdx: number): number {
  let depth = 0;
  for (let i = openIdx; i < text.length; i++) {
    if (text[i] === '(') depth++;
    else if (text[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Index of the `(` matching the `)` at closeIdx, or -1. */
function findOpeningParen(text: string, closeIdx: number): number {
  let depth = 0;
  for (let i = closeIdx; i >= 0; i--) {
    if (text[i] === ')') depth++;
    else if (text[i] === '(') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }
  parts.push(text.slice(start).trim());
  return parts;
}

const OPERAND_CHAR = /[\w.$\u0000]/;

/**
 * Start index of the operand ending at `end` (inclusive). A `::type` cast
 * belongs to the operand it follows.
 */
function operandStart(text: string, end: number): number {
  let i = end;
  for (;;) {
    if (text[i] === ')') {
      const open = findOpeningParen(text, i);
      if (open < 0) return end;
      i = open - 1;
    }
    while (i >= 0 && OPERAND_CHAR.test(text[i])) i--;
    if (i >= 1 && text[i] === ':' && text[i - 1] === ':') {
      i -= 2;
      continue;
    }
    return i + 1;
  }
}

/** Exclusive end index of the operand starting at `start`, casts included. */
function operandEnd(text: string, start: number): number {
  let i = start;
  for (;;) {
    while (i < text.length && OPERAND_CHAR.test(text[i])) i++;
    if (text[i] === '(') {
      const close = findClosingParen(text, i);
      if (close < 0) return i;
      i = close + 1;
    }
    if (!text.startsWith('::', i)) return i;
    i += 2;
  }
}

function skipSpaceForward(text: string, i: number): number {
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

function skipSpaceBackward(text: string, i: number): number {
  while (i >= 0 && /\s/.test(text[i])) i--;
  return i;
}

/**
 * Rewrite every call to `name(...)`. Calls are visited right to left, so an
 * inner call is rewritten before the call that encloses it. Returning
 * undefined from `render` keeps the call as written.
 */
function rewriteCalls(text: string, name: string, render: (args: string[]) => string | undefined): string {
  const pattern = new RegExp(`\\b${name}\\s*\\(`, 'gi');
  const starts = Array.from(text.matchAll(pattern), (m) => ({ index: m.index ?? 0, length: m[0].length }));
  let result = text;
  for (let k = starts.length - 1; k >= 0; k--) {
    const { index, length } = starts[k];
    const open = index + length - 1;
    const close = findClosingParen(result, open);
    if (close < 0) continue;
    const args = splitTopLevel(result.slice(open + 1, close));
    const replacement = render(args);
    if (replacement === undefined) continue;
    result = result.slice(0, index) + replacement + result.slice(close + 1);
  }
  return result;
}

// ── Rules ────────────────────────────────────────────────────────────

const TRAILING_LIMIT = /\s*\bLIMIT\s+(\d+)(?:\s+OFFSET\s+(\d+))?\s*$/i;

const offsetRows: RewriteRule = {
  name: 'offset-rows',
  apply: (sql) =>
    sql.replace(
      /\bOFFSET\s+(\d+)\s+ROWS?\b(?:\s+FETCH\s+(?:NEXT|FIRST)\s+(\d+)\s+ROWS?\s+ONLY\b)?/gi,
      (_whole, offset: string, fetch: string | undefined) =>
        fetch === undefined ? `OFFSET ${offset}` : `LIMIT ${fetch} OFFSET ${offset}`,
    ),
};

const pipesToConcat: RewriteRule = {
  name: 'pipes-to-concat',
  apply: (sql) => {
    let text = sql;
    let from = 0;
    for (;;) {
      const op = text.indexOf('||', from);
      if (op < 0) return text;
      const leftEnd = skipSpaceBackward(text, op - 1);
      if (leftEnd < 0) return text;
      const leftStart = operandStart(text, leftEnd);
      const operands = [text.slice(leftStart, leftEnd + 1)];
      let cursor = op;
      let spanEnd = leftEnd + 1;
      while (text.startsWith('||', cursor)) {
        const rightStart = skipSpaceForward(text, cursor + 2);
        const rightEnd = operandEnd(text, rightStart);
        if (rightEnd === rightStart) break;
        operands.push(text.slice(rightStart, rightEnd));
        spanEnd = rightEnd;
        cursor = skipSpaceForward(text, rightEnd);
      }
      if (operands.length < 2) {
        from = op + 2;
        continue;
      }
      const replacement = `CONCAT(${operands.join(', ')})`;
      text = text.slice(0, leftStart) + replacement + text.slice(spanEnd);
      from = leftStart + replacement.length;
    }
  },
};

function regexpLikeTo(operator: 'REGEXP' | 'LIKE'): RewriteRule {
  return {
    name: `regexp-like-to-${operator.toLowerCase()}`,
    apply: (sql) => rewriteCalls(sql, 'REGEXP_LIKE', (args) => (args.length >= 2 ? `${args[0]} ${operator} ${args[1]}` : undefined)),
  };
}

function renameBinaryCall(from: string, to: string): RewriteRule {
  return {
    name: `${from.toLowerCase()}-to-${to.toLowerCase()}`,
    apply: (sql) => rewriteCalls(sql, from, (args) => (args.length === 2 ? `${to}(${args[0]}, ${args[1]})` : undefined)),
  };
}

const concatToPlus: RewriteRule = {
  name: 'concat-to-plus',
  apply: (sql) => rewriteCalls(sql, 'CONCAT', (args) => (args.length >= 2 ? args.join(' + ') : undefined)),
};

const topToLimit: RewriteRule = {
  name: 'top-to-limit',
  apply: (sql) => {
    const match = /\bSELECT\s+(DISTINCT\s+)?TOP\s*\(?\s*(\d+)\s*\)?\s+/i.exec(sql);
    if (!match) return sql;
    const head = `SELECT ${match[1] ?? ''}`;
    const rest = sql.slice(0, match.index) + head + sql.slice(match.index + match[0].length);
    return /\bLIMIT\s+\d+/i.test(rest) ? rest : `${rest.trimEnd()} LIMIT ${match[2]}`;
  },
};

const limitToTop: RewriteRule = {
  name: 'limit-to-top',
  apply: (sql) => {
    const limit = TRAILING_LIMIT.exec(sql);
    if (!limit) return sql;
    const body = sql.slice(0, limit.index).trimEnd();
    const [, rows, offset] = limit;
    if (offset !== undefined) {
      const ordered = /\bORDER\s+BY\b/i.test(body) ? body : `${body} ORDER BY (SELECT NULL)`;
      return `${ordered} OFFSET ${offset} ROWS FETCH NEXT ${rows} ROWS ONLY`;
    }
    // TOP goes after DISTINCT when present: SELECT DISTINCT TOP n
    return body.replace(/\bSELECT(\s+DISTINCT)?\b/i, (head) => `${head} TOP ${rows}`);
  },
};

const limitToRownum: RewriteRule = {
  name: 'limit-to-rownum',
  apply: (sql) => {
    const limit = TRAILING_LIMIT.exec(sql);
    if (!limit) return sql;
    const body = sql.slice(0, limit.index).trimEnd();
    const [, rows, offset] = limit;
    if (offset !== undefined) {
      return `${body} OFFSET ${offset} ROWS FETCH NEXT ${rows} ROWS ONLY`;
    }
    return `SELECT * FROM (${body}) WHERE ROWNUM <= ${rows}`;
  },
};

const RULES: Record<KnownDialect, readonly RewriteRule[]> = {
  postgresql: [],
  mysql: [offsetRows, pipesToConcat, regexpLikeTo('REGEXP')],
  sqlite: [offsetRows, renameBinaryCall('ISNULL', 'IFNULL'), topToLimit],
  mssql: [limitToTop, concatToPlus, regexpLikeTo('LIKE')],
  oracle: [limitToRownum, renameBinaryCall('ISNULL', 'NVL')],
};

export function rulesFor(dialect: string): readonly RewriteRule[] {
  const normalized = normalizeDialect(dialect);
  return isKnownDialect(normalized) ? RULES[normalized] : [];
}

// ── Entry points ─────────────────────────────────────────────────────

export function adaptWithTrace(sql: string, dialect: string): AdaptResult {
  const normalized = normalizeDialect(dialect);
  const rules = rulesFor(normalized);
  if (rules.length === 0) {
    return { sql, dialect: normalized, applied: [] };
  }

  const trimmed = sql.trim();
  const terminated = trimmed.endsWith(';');
  const statement = terminated ? trimmed.replace(/;+\s*$/, '').trimEnd() : trimmed;

  const { text, literals } = maskQuoted(statement);
  const applied: string[] = [];
  let current = text;
  for (const rule of rules) {
    const next = rule.apply(current);
    if (next !== current) applied.push(rule.name);
    current = next;
  }

  if (applied.length === 0) {
    return { sql, dialect: normalized, applied };
  }
  const restored = unmask(current, literals);
  return { sql: terminated ? `${restored};` : restored, dialect: normalized, applied };
}

/** Pure: the same (sql, dialect) always yields the same output. */
export function adapt(sql: string, dialect: string): string {
  return adaptWithTrace(sql, dialect).sql;
}
